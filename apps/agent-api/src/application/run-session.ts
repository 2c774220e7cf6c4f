import type { RunSessionRequest } from "@promptsmith/contracts";
import {
  PROMPT_ENGINEERING_CATEGORY,
  refinePrompt,
  type CategoryCatalog,
} from "../domain/categories.js";
import type { PromptClient } from "../orchestrator/prompt-client.js";
import type { SessionOutput } from "./output-writer.js";
import type { PromptAgent } from "./prompt-agent.js";

export interface SessionDeps {
  categories: CategoryCatalog;
  client: PromptClient;
  promptAgent: PromptAgent;
}

/**
 * Runs a prompt chosen for a category. Prompt-engineering prompts are routed to the
 * matching agent operation; every other category sends the prompt as written.
 */
export async function runCategorySession(
  req: RunSessionRequest,
  deps: SessionDeps,
): Promise<SessionOutput> {
  const category = deps.categories.get(req.categoryId);
  const prompt = req.refinement ? refinePrompt(req.prompt, req.refinement) : req.prompt;

  if (category.id !== PROMPT_ENGINEERING_CATEGORY) {
    return { category: category.label, prompt, result: await deps.client.complete(prompt) };
  }

  const lowered = prompt.toLowerCase();
  const subject = req.details.prompt ?? "";

  if (lowered.includes("analyze")) {
    const result = await deps.promptAgent.analyzePrompt({
      prompt: subject,
      context: req.details.context ?? "",
    });
    return { category: category.label, prompt, result };
  }

  if (lowered.includes("optimize")) {
    const result = await deps.promptAgent.optimizePrompt({
      originalPrompt: subject,
      issues: req.details.issues ?? "",
      goal: req.details.goal ?? "",
    });
    return { category: category.label, prompt, result };
  }

  const result = await deps.promptAgent.generatePrompt("role_based", {
    role: "software engineer",
    task: "analyze prompt",
    input_text: prompt,
  });
  return { category: category.label, prompt, result };
}
