import type { TemplateDefinitionInput } from "@promptsmith/contracts";

export const ZERO_SHOT: TemplateDefinitionInput = {
  name: "zero_shot",
  description: "Plain task and input with no examples.",
  slots: ["task", "input_text"],
  body: `Task: {{task}}

Input: {{input_text}}

Please provide a response:`,
};

export const FEW_SHOT: TemplateDefinitionInput = {
  name: "few_shot",
  description: "Task with worked examples before the input.",
  slots: ["task", "examples", "input_text"],
  body: `Task: {{task}}

Examples:
{{examples}}

Input: {{input_text}}

Please provide a response:`,
};

export const CHAIN_OF_THOUGHT: TemplateDefinitionInput = {
  name: "chain_of_thought",
  description: "Asks the model to reason step by step before answering.",
  slots: ["task", "input_text"],
  body: `Task: {{task}}

Input: {{input_text}}

Let's approach this step by step:

1. First, let me understand what needs to be done...
2. Then, I'll consider the key factors...
3. Finally, I'll provide the answer...

Answer:`,
};

export const ROLE_BASED: TemplateDefinitionInput = {
  name: "role_based",
  description: "Frames the model as an expert in a given role.",
  slots: ["role", "task", "input_text"],
  body: `You are an expert {{role}}.

Task: {{task}}

Input: {{input_text}}

As a {{role}}, please provide your response:`,
};

export const PROMPT_ANALYZER: TemplateDefinitionInput = {
  name: "prompt_analyzer",
  description: "Scores a prompt for clarity and specificity and lists improvements.",
  slots: ["prompt", "context"],
  body: `Analyze the following prompt for effectiveness and potential improvements:

Prompt: {{prompt}}
Context: {{context}}

Please provide:
1. Clarity assessment (1-10)
2. Specificity assessment (1-10)
3. Potential ambiguities
4. Suggested improvements
5. Alternative formulations`,
};

export const PROMPT_OPTIMIZER: TemplateDefinitionInput = {
  name: "prompt_optimizer",
  description: "Rewrites a prompt to fix known issues toward a goal.",
  slots: ["original_prompt", "issues", "goal"],
  body: `Original Prompt: {{original_prompt}}

Identified Issues: {{issues}}
Optimization Goal: {{goal}}

Please provide an improved version of this prompt that addresses the issues and achieves the goal:`,
};

export const AB_TEST_COMPARISON: TemplateDefinitionInput = {
  name: "ab_test_comparison",
  description: "Compares two prompts against the same test input.",
  slots: ["prompt_a", "prompt_b", "test_input"],
  body: `Compare the effectiveness of these two prompts:

Prompt A: {{prompt_a}}
Prompt B: {{prompt_b}}

Test Input: {{test_input}}

Please evaluate:
1. Which prompt is clearer?
2. Which prompt is more specific?
3. Which prompt is likely to produce better results?
4. Specific improvements for each prompt`,
};

export const CONTEXT_OPTIMIZER: TemplateDefinitionInput = {
  name: "context_optimizer",
  description: "Condenses a long prompt to fit context constraints.",
  slots: ["long_prompt", "constraints"],
  body: `Optimize this prompt to fit within context constraints while maintaining effectiveness:

Original Prompt: {{long_prompt}}
Constraints: {{constraints}}

Please provide:
1. A condensed version that maintains key information
2. Alternative approaches to reduce length
3. Priority ranking of prompt elements`,
};

export const CREATIVE_WRITING: TemplateDefinitionInput = {
  name: "creative_writing",
  description: "Creative piece in a given genre and style.",
  slots: ["genre", "style", "topic", "length"],
  body: `Write a {{genre}} piece in {{style}} style about {{topic}}.

Requirements:
- Length: {{length}}
- Maintain consistent tone and style
- Include engaging elements appropriate for the genre

Please create the content:`,
};

export const TECHNICAL_WRITING: TemplateDefinitionInput = {
  name: "technical_writing",
  description: "Technical content for a given audience and complexity.",
  slots: ["topic", "audience", "complexity", "format"],
  body: `Create {{format}} content about {{topic}}.

Target Audience: {{audience}}
Complexity Level: {{complexity}}

Requirements:
- Use clear, precise language
- Include relevant technical details
- Structure for easy comprehension
- Include examples where helpful

Please create the content:`,
};

export const EVALUATION_METRICS: TemplateDefinitionInput = {
  name: "evaluation_metrics",
  description: "Rates a prompt-response pair on five metrics out of 50.",
  slots: ["prompt", "response", "criteria"],
  body: `Evaluate the following prompt-response pair:

Prompt: {{prompt}}
Response: {{response}}
Evaluation Criteria: {{criteria}}

Please rate on a scale of 1-10:
1. Relevance: How well does the response address the prompt?
2. Completeness: Does the response cover all aspects of the prompt?
3. Accuracy: Is the information provided correct?
4. Clarity: Is the response clear and well-structured?
5. Creativity: Does the response show appropriate creativity?

Overall Score: __/50
Comments:`,
};

export const PROMPT_ENGINEERING_TEMPLATES: readonly TemplateDefinitionInput[] = [
  ZERO_SHOT,
  FEW_SHOT,
  CHAIN_OF_THOUGHT,
  ROLE_BASED,
  PROMPT_ANALYZER,
  PROMPT_OPTIMIZER,
  AB_TEST_COMPARISON,
  CONTEXT_OPTIMIZER,
  CREATIVE_WRITING,
  TECHNICAL_WRITING,
  EVALUATION_METRICS,
];
