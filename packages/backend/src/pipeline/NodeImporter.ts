import type {
  CandidateNode,
  GraphNode,
  GraphNodeWriter,
  ImportOptions,
  NodeImportStats,
  PropertyMap,
  ReviewRecord,
  StoredProperties
} from "@graphmerge/shared";
import type { ReviewQueue } from "../services/ReviewQueue.js";
import type { EmbeddingGateway } from "../services/embeddingTypes.js";
import { chunk, KeyedLock, runWithConcurrency, withTimeout } from "../utils/async.js";
import { componentLogger, type Logger } from "../utils/logger.js";
import { ImportStatsRecorder, type NodeImportOutcome } from "./ImportStatsRecorder.js";
import type { NodeMatcherRegistry } from "./matchers/NodeMatcherRegistry.js";
import { sameStoredValue, type NodeResolver } from "./NodeResolver.js";
import type { PropertyNormalizer } from "./PropertyNormalizer.js";
import { firstNonBlank, isPlainRecord, textOf } from "./propertyAccess.js";

export interface NodeImporterDeps {
  store: GraphNodeWriter;
  resolver: NodeResolver;
  normalizer: PropertyNormalizer;
  registry: NodeMatcherRegistry;
  embeddings?: EmbeddingGateway | null;
  reviewQueue?: ReviewQueue | null;
  operationTimeoutMs?: number;
  logger?: Logger;
}

/** An array `name` collapses to its first non-blank entry. */
export function coerceName(properties: PropertyMap): PropertyMap {
  const name = properties["name"];
  if (!Array.isArray(name)) {
    return properties;
  }
  const first = firstNonBlank(name);
  const coerced: PropertyMap = { ...properties };
  if (first === undefined) {
    delete coerced["name"];
  } else {
    coerced["name"] = first;
  }
  return coerced;
}

/** Nodes without a usable `name` are written as "Unnamed <type>". */
export function withFallbackName(type: string, properties: StoredProperties): StoredProperties {
  const name = properties["name"];
  if (typeof name === "string" && name.trim().length > 0) {
    return properties;
  }
  return { ...properties, name: `Unnamed ${type}` };
}

function withoutId(properties: StoredProperties): StoredProperties {
  const { id: _id, ...rest } = properties;
  return rest;
}

export class NodeImporter {
  private readonly store: GraphNodeWriter;
  private readonly resolver: NodeResolver;
  private readonly normalizer: PropertyNormalizer;
  private readonly registry: NodeMatcherRegistry;
  private readonly embeddings: EmbeddingGateway | null;
  private readonly reviewQueue: ReviewQueue | null;
  private readonly operationTimeoutMs: number;
  private readonly logger: Logger;
  private readonly locks = new KeyedLock();

  constructor(deps: NodeImporterDeps) {
    this.store = deps.store;
    this.resolver = deps.resolver;
    this.normalizer = deps.normalizer;
    this.registry = deps.registry;
    this.embeddings = deps.embeddings ?? null;
    this.reviewQueue = deps.reviewQueue ?? null;
    this.operationTimeoutMs = deps.operationTimeoutMs ?? 30_000;
    this.logger = deps.logger ?? componentLogger("NodeImporter");
  }

  async importAll(
    candidates: readonly CandidateNode[],
    options: ImportOptions,
    recorder = new ImportStatsRecorder(),
    signal?: AbortSignal
  ): Promise<NodeImportStats> {
    for (const batch of chunk(candidates, options.batchSize)) {
      if (signal?.aborted) {
        break;
      }
      await runWithConcurrency(
        batch,
        options.concurrency,
        async (candidate) => {
          recorder.recordNode(await this.importNode(candidate, options));
        },
        signal
      );
    }
    return recorder.nodes;
  }

  async importNode(candidate: CandidateNode, options: ImportOptions): Promise<NodeImportOutcome> {
    const type = typeof candidate.type === "string" ? candidate.type.trim() : "";
    if (type.length === 0 || !isPlainRecord(candidate.properties)) {
      this.logger.warn({ type: candidate.type }, "Skipping malformed candidate node: missing type or properties");
      return { status: "skipped", duplicate: false, reviewsQueued: 0, reason: "malformed candidate" };
    }

    const properties = coerceName(candidate.properties);
    const stored = this.normalizer.normalizeProperties(properties);
    // Resolve-then-create is serialized per node type: two spellings of the
    // same entity in one run must not both resolve as new.
    return this.locks.run(type.toLowerCase(), async () => {
      const resolution = await this.resolver.resolve({
        type,
        properties,
        stored,
        options: {
          enableVectorSearch: options.enableVectorSearch,
          enableHumanReview: options.enableHumanReview,
          similarityThreshold: options.similarityThreshold
        }
      });

      const reviewsQueued = this.queueReviews(resolution.pendingReviews, options);

      if (resolution.node) {
        const outcome = await this.updateNode(resolution.node, stored, options);
        return { ...outcome, duplicate: true, reviewsQueued };
      }

      const outcome = await this.createNode(type, properties, stored, options, resolution.embedding);
      return { ...outcome, duplicate: false, reviewsQueued };
    });
  }

  /** Naive per-field inequality over the candidate's own keys. */
  needsUpdate(existing: GraphNode, stored: StoredProperties): boolean {
    return Object.entries(withoutId(stored)).some(([key, value]) => !sameStoredValue(existing.properties[key], value));
  }

  private async createNode(
    type: string,
    properties: PropertyMap,
    stored: StoredProperties,
    options: ImportOptions,
    embedding?: number[]
  ): Promise<Omit<NodeImportOutcome, "duplicate" | "reviewsQueued">> {
    if (options.dryRun) {
      this.logger.debug({ type, name: textOf(properties, "name") }, "Dry run: would create node");
      return { status: options.dryRunCountsAs, reason: "dry run" };
    }

    try {
      const vector = embedding ?? (await this.embedFor(type, properties, options));
      const node = await withTimeout(
        this.store.createNode(type, withFallbackName(type, stored), vector ?? undefined),
        this.operationTimeoutMs,
        "Node create"
      );
      return { status: "created", nodeId: node.id };
    } catch (error) {
      this.logger.error(
        { type, name: textOf(properties, "name"), err: error instanceof Error ? error.message : String(error) },
        "Failed to create node"
      );
      return { status: "error", reason: error instanceof Error ? error.message : String(error) };
    }
  }

  private async updateNode(
    existing: GraphNode,
    stored: StoredProperties,
    options: ImportOptions
  ): Promise<Omit<NodeImportOutcome, "duplicate" | "reviewsQueued">> {
    if (!this.needsUpdate(existing, stored)) {
      return { status: "skipped", nodeId: existing.id, reason: "unchanged" };
    }

    if (options.dryRun) {
      this.logger.debug({ nodeId: existing.id }, "Dry run: would update node");
      return {
        status: options.dryRunCountsAs === "created" ? "updated" : "skipped",
        nodeId: existing.id,
        reason: "dry run"
      };
    }

    try {
      const updated = await withTimeout(
        this.store.updateNodeProperties(existing.id, withoutId(stored)),
        this.operationTimeoutMs,
        "Node update"
      );
      if (!updated) {
        this.logger.warn({ nodeId: existing.id }, "Resolved node disappeared before update");
        return { status: "error", nodeId: existing.id, reason: "node not found" };
      }
      return { status: "updated", nodeId: updated.id };
    } catch (error) {
      this.logger.error(
        { nodeId: existing.id, err: error instanceof Error ? error.message : String(error) },
        "Failed to update node"
      );
      return { status: "error", nodeId: existing.id, reason: error instanceof Error ? error.message : String(error) };
    }
  }

  private async embedFor(type: string, properties: PropertyMap, options: ImportOptions): Promise<number[] | null> {
    if (!options.enableVectorSearch || !this.embeddings) {
      return null;
    }
    return this.embeddings.embed(this.registry.forType(type).embeddingText(properties));
  }

  private queueReviews(pending: readonly ReviewRecord[], options: ImportOptions): number {
    if (pending.length === 0) {
      return 0;
    }
    if (options.dryRun || !this.reviewQueue) {
      this.logger.info({ count: pending.length, dryRun: options.dryRun }, "Pending reviews not persisted");
      return 0;
    }
    for (const review of pending) {
      this.reviewQueue.enqueue(review);
    }
    return pending.length;
  }
}
