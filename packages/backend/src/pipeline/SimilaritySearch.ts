import type { SimilarNode, VectorStore } from "@graphmerge/shared";
import { componentLogger, type Logger } from "../utils/logger.js";
import type { NodeMatcherRegistry } from "./matchers/NodeMatcherRegistry.js";

export interface SimilaritySearchOptions {
  /** Per-type thresholds keyed by label, e.g. `{ Address: 0.75 }`. */
  thresholdOverrides?: Record<string, number>;
  limit?: number;
  logger?: Logger;
}

export class SimilaritySearch {
  private readonly overrides: Map<string, number>;
  private readonly limit: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: VectorStore,
    private readonly registry: NodeMatcherRegistry,
    options: SimilaritySearchOptions = {}
  ) {
    this.overrides = new Map(
      Object.entries(options.thresholdOverrides ?? {}).map(([type, threshold]): [string, number] => [type.toLowerCase(), threshold])
    );
    this.limit = Math.max(1, options.limit ?? 5);
    this.logger = options.logger ?? componentLogger("SimilaritySearch");
  }

  thresholdFor(type: string, explicit?: number): number {
    return (
      explicit ??
      this.overrides.get(type.toLowerCase()) ??
      this.registry.forType(type).similarityThreshold()
    );
  }

  /** Ranked descending; only results at or above the threshold. */
  async findSimilar(type: string, vector: number[], threshold?: number): Promise<SimilarNode[]> {
    if (vector.length === 0) {
      return [];
    }

    const minimum = this.thresholdFor(type, threshold);
    try {
      const results = await this.store.vectorSearch(type, vector, { limit: this.limit, threshold: minimum });
      return results
        .filter((result) => result.similarity >= minimum)
        .sort((a, b) => b.similarity - a.similarity)
        .slice(0, this.limit);
    } catch (error) {
      this.logger.warn(
        { type, err: error instanceof Error ? error.message : String(error) },
        "Vector search failed"
      );
      return [];
    }
  }

  async bestMatch(type: string, vector: number[], threshold?: number): Promise<SimilarNode | null> {
    const [top] = await this.findSimilar(type, vector, threshold);
    return top ?? null;
  }
}
