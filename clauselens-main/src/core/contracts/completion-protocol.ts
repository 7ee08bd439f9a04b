export interface CompletionPrompt {
  system: string;
  user: string;
}

export interface CompletionOptions {
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
}
