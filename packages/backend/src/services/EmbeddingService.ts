import OpenAI from "openai";
import { z } from "zod";
import { appConfig } from "../config.js";
import { componentLogger, type Logger } from "../utils/logger.js";
import { RequestRateLimiter } from "./RequestRateLimiter.js";
import type {
  EmbeddingConfig,
  EmbeddingGateway,
  OpenAICompatibleEmbeddingClient
} from "./embeddingTypes.js";

const embeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        embedding: z.array(z.number().finite())
      })
    )
    .min(1)
});

export class EmbeddingService implements EmbeddingGateway {
  private readonly client: OpenAICompatibleEmbeddingClient;
  private readonly rateLimiter: RequestRateLimiter;
  private readonly config: EmbeddingConfig;
  private readonly logger: Logger;

  constructor(
    config: EmbeddingConfig,
    deps?: {
      client?: OpenAICompatibleEmbeddingClient;
      rateLimiter?: RequestRateLimiter;
      logger?: Logger;
    }
  ) {
    this.config = config;
    this.logger = deps?.logger ?? componentLogger("EmbeddingService");

    this.client =
      deps?.client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL
      });

    this.rateLimiter =
      deps?.rateLimiter ??
      new RequestRateLimiter({
        maxConcurrent: config.maxConcurrent,
        maxRetries: config.maxRetries,
        retryDelayMs: config.retryDelayMs,
        requestsPerMinute: config.requestsPerMinute,
        timeoutMs: config.timeoutMs
      });
  }

  static fromEnv(): EmbeddingService {
    return new EmbeddingService({
      apiKey: appConfig.EMBEDDING_API_KEY,
      baseURL: appConfig.EMBEDDING_BASE_URL,
      model: appConfig.EMBEDDING_MODEL,
      dimensions: appConfig.EMBEDDING_DIMENSIONS,
      maxConcurrent: appConfig.EMBEDDING_MAX_CONCURRENT,
      maxRetries: appConfig.EMBEDDING_MAX_RETRIES,
      retryDelayMs: appConfig.EMBEDDING_RETRY_DELAY_MS,
      requestsPerMinute: appConfig.EMBEDDING_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.EMBEDDING_TIMEOUT_MS
    });
  }

  async embed(text: string): Promise<number[] | null> {
    const input = text.trim();
    if (input.length === 0) {
      return null;
    }

    let response: unknown;
    try {
      response = await this.rateLimiter.run(() =>
        this.client.embeddings.create({
          model: this.config.model,
          input,
          ...(this.config.dimensions ? { dimensions: this.config.dimensions } : {})
        })
      );
    } catch (error) {
      this.logger.warn(
        { err: error instanceof Error ? error.message : String(error), model: this.config.model },
        "Embedding request failed"
      );
      return null;
    }

    const parsed = embeddingResponseSchema.safeParse(response);
    if (!parsed.success) {
      this.logger.warn({ model: this.config.model }, "Malformed embedding response");
      return null;
    }

    const embedding = parsed.data.data[0]?.embedding ?? [];
    return embedding.length > 0 ? embedding : null;
  }

  async healthCheck(): Promise<boolean> {
    return (await this.embed("health check")) !== null;
  }
}
