import type { EmbeddingGateway } from "../../src/services/embeddingTypes.js";

/** Returns fixed vectors keyed by the exact embedding text. */
export class FakeEmbeddingGateway implements EmbeddingGateway {
  readonly requests: string[] = [];

  constructor(private readonly vectors: Record<string, number[]> = {}) {}

  async embed(text: string): Promise<number[] | null> {
    this.requests.push(text);
    return this.vectors[text] ?? null;
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
