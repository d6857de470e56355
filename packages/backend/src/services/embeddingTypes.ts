export interface EmbeddingConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  dimensions?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

export interface RateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export interface EmbeddingCreateParams {
  model: string;
  input: string;
  dimensions?: number;
}

/** The slice of an OpenAI-compatible client the gateway calls. */
export interface OpenAICompatibleEmbeddingClient {
  embeddings: {
    create: (params: EmbeddingCreateParams) => Promise<unknown>;
  };
}

export interface EmbeddingGateway {
  /** Resolves to `null` on blank input or any failure; never rejects. */
  embed(text: string): Promise<number[] | null>;
  healthCheck?(): Promise<boolean>;
}
