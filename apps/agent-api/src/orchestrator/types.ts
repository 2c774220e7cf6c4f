export interface CompletionRequest {
  prompt: string;
  model: string;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
}

export interface CompletionResult {
  text: string;
  meta: Record<string, unknown>;
}

export interface LlmProvider {
  execute(req: CompletionRequest): Promise<CompletionResult>;
}
