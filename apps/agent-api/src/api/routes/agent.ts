import type { FastifyInstance } from "fastify";
import {
  AnalyzePromptRequestSchema,
  ComparePromptsRequestSchema,
  EvaluateResponseRequestSchema,
  OptimizeContextRequestSchema,
  OptimizePromptRequestSchema,
  RenderTemplateRequestSchema,
} from "@promptsmith/contracts";
import type { Services } from "../../services.js";
import { jsonHandler, sendError, sendInvalidRequest } from "../http.js";

export async function registerAgentRoutes(app: FastifyInstance, services: Services): Promise<void> {
  const agent = services.promptAgent;

  app.post(
    "/agent/analyze",
    jsonHandler(AnalyzePromptRequestSchema, (body) => agent.analyzePrompt(body)),
  );

  app.post(
    "/agent/optimize",
    jsonHandler(OptimizePromptRequestSchema, async (body) => ({
      response: await agent.optimizePrompt(body),
    })),
  );

  app.post(
    "/agent/compare",
    jsonHandler(ComparePromptsRequestSchema, (body) => agent.comparePrompts(body)),
  );

  app.post(
    "/agent/evaluate",
    jsonHandler(EvaluateResponseRequestSchema, (body) => agent.evaluateResponse(body)),
  );

  app.post(
    "/agent/optimize-context",
    jsonHandler(OptimizeContextRequestSchema, async (body) => ({
      response: await agent.optimizeContext(body),
    })),
  );

  app.post<{ Params: { technique: string } }>(
    "/agent/generate/:technique",
    async (request, reply) => {
      const payload = RenderTemplateRequestSchema.safeParse(request.body ?? {});
      if (!payload.success) {
        return sendInvalidRequest(reply, payload.error.issues);
      }

      try {
        const response = await agent.generatePrompt(request.params.technique, payload.data.slots);
        return reply.send({ response });
      } catch (error) {
        return sendError(reply, error);
      }
    },
  );
}
