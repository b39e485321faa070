export interface TextGenerationRequest {
  systemPrompt: string;
  prompt: string;
  temperature?: number;
  maxTokens?: number;
}

export interface TextGenerationOptions {
  signal?: AbortSignal;
}
