export interface VlmRequest {
  prompt: string;
  system?: string;
  /** Local image paths, sent in order after the prompt text */
  images?: string[];
}

export interface VlmUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

export interface VlmResponse {
  text: string;
  usage?: VlmUsage;
}

/**
 * Request/response boundary to the vision-language model. Implementations
 * enforce their own timeout and bounded retries and throw
 * AgentError('VlmUnavailable') once those are spent.
 */
export interface VlmClient {
  readonly model: string;
  complete(request: VlmRequest): Promise<VlmResponse>;
}
