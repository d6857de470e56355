import type {
  GraphNode,
  GraphNodeReader,
  MatchDecision,
  PropertyMap,
  ReviewRecord,
  StoredProperties,
  StoredPropertyValue
} from "@graphmerge/shared";
import type { EmbeddingGateway } from "../services/embeddingTypes.js";
import { withTimeout } from "../utils/async.js";
import { componentLogger, type Logger } from "../utils/logger.js";
import type { HumanReviewManager } from "./HumanReviewManager.js";
import type { NodeMatcherRegistry } from "./matchers/NodeMatcherRegistry.js";
import type { SimilaritySearch } from "./SimilaritySearch.js";

export type ResolutionStrategyName = "constraint" | "vector" | "fuzzy" | "property";

export interface ResolveOptions {
  enableVectorSearch: boolean;
  enableHumanReview: boolean;
  similarityThreshold?: number;
}

export interface ResolveRequest {
  type: string;
  /** Candidate properties as received, after name coercion. */
  properties: PropertyMap;
  /** The same properties after normalization. */
  stored: StoredProperties;
  options: ResolveOptions;
}

export interface NodeResolution {
  node: GraphNode | null;
  strategy: ResolutionStrategyName | "new";
  similarity?: number;
  decision?: MatchDecision;
  pendingReviews: ReviewRecord[];
  /** Computed by the vector step; reused when the node is created. */
  embedding?: number[];
}

interface StrategyMatch {
  node: GraphNode;
  similarity?: number;
  decision?: MatchDecision;
}

interface ResolutionState extends ResolveRequest {
  pendingReviews: ReviewRecord[];
  embedding?: number[];
}

interface ResolutionStrategy {
  readonly name: ResolutionStrategyName;
  resolve(state: ResolutionState): Promise<StrategyMatch | null>;
}

export interface NodeResolverDeps {
  store: GraphNodeReader;
  registry: NodeMatcherRegistry;
  similaritySearch: SimilaritySearch;
  reviewManager: HumanReviewManager;
  embeddings?: EmbeddingGateway | null;
  uniqueKeys?: string[];
  fuzzyCandidateLimit?: number;
  /** Client-side bound on each store round trip. */
  operationTimeoutMs?: number;
  logger?: Logger;
}

function isPresent(value: StoredPropertyValue | undefined): value is StoredPropertyValue {
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value === "string") {
    return value.trim().length > 0;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  return true;
}

export function sameStoredValue(a: StoredPropertyValue | undefined, b: StoredPropertyValue | undefined): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    return JSON.stringify(a ?? null) === JSON.stringify(b ?? null);
  }
  return (a ?? null) === (b ?? null);
}

/** Every populated candidate property is already stored with the same value. */
function containsAll(existing: StoredProperties, candidate: StoredProperties): boolean {
  const entries = Object.entries(candidate).filter(([, value]) => isPresent(value));
  return entries.length > 0 && entries.every(([key, value]) => sameStoredValue(existing[key], value));
}

export class NodeResolver {
  private readonly store: GraphNodeReader;
  private readonly registry: NodeMatcherRegistry;
  private readonly similaritySearch: SimilaritySearch;
  private readonly reviewManager: HumanReviewManager;
  private readonly embeddings: EmbeddingGateway | null;
  private readonly uniqueKeys: string[];
  private readonly fuzzyCandidateLimit: number;
  private readonly operationTimeoutMs: number;
  private readonly logger: Logger;
  private readonly strategies: ResolutionStrategy[];

  constructor(deps: NodeResolverDeps) {
    this.store = deps.store;
    this.registry = deps.registry;
    this.similaritySearch = deps.similaritySearch;
    this.reviewManager = deps.reviewManager;
    this.embeddings = deps.embeddings ?? null;
    this.uniqueKeys = deps.uniqueKeys ?? ["email", "ssn", "serial_number", "vin", "license_plate"];
    this.fuzzyCandidateLimit = Math.max(1, deps.fuzzyCandidateLimit ?? 500);
    this.operationTimeoutMs = deps.operationTimeoutMs ?? 30_000;
    this.logger = deps.logger ?? componentLogger("NodeResolver");

    this.strategies = [
      { name: "constraint", resolve: (state) => this.matchByConstraint(state) },
      { name: "vector", resolve: (state) => this.matchByVector(state) },
      { name: "fuzzy", resolve: (state) => this.matchByFuzzyRules(state) },
      { name: "property", resolve: (state) => this.matchByProperties(state) }
    ];
  }

  async resolve(request: ResolveRequest): Promise<NodeResolution> {
    const state: ResolutionState = { ...request, pendingReviews: [] };

    for (const strategy of this.strategies) {
      let match: StrategyMatch | null = null;
      try {
        match = await strategy.resolve(state);
      } catch (error) {
        this.logger.warn(
          {
            type: request.type,
            strategy: strategy.name,
            err: error instanceof Error ? error.message : String(error)
          },
          "Resolution strategy failed"
        );
      }

      if (match) {
        this.logger.debug(
          { type: request.type, strategy: strategy.name, nodeId: match.node.id, similarity: match.similarity },
          "Candidate resolved to existing node"
        );
        return {
          node: match.node,
          strategy: strategy.name,
          similarity: match.similarity,
          decision: match.decision,
          pendingReviews: state.pendingReviews,
          embedding: state.embedding
        };
      }
    }

    return {
      node: null,
      strategy: "new",
      pendingReviews: state.pendingReviews,
      embedding: state.embedding
    };
  }

  private async matchByConstraint(state: ResolutionState): Promise<StrategyMatch | null> {
    const id = state.stored["id"];
    if (isPresent(id)) {
      const byId = await this.findOne(state.type, { id });
      if (byId) {
        return { node: byId };
      }
    }

    const unique: StoredProperties = {};
    for (const key of this.uniqueKeys) {
      const value = state.stored[key];
      if (isPresent(value)) {
        unique[key] = value;
      }
    }
    if (Object.keys(unique).length === 0) {
      return null;
    }

    const byUnique = await this.findOne(state.type, unique);
    return byUnique ? { node: byUnique } : null;
  }

  private async matchByVector(state: ResolutionState): Promise<StrategyMatch | null> {
    if (!state.options.enableVectorSearch || !this.embeddings) {
      return null;
    }

    if (!state.embedding) {
      const text = this.registry.forType(state.type).embeddingText(state.properties);
      const vector = await this.embeddings.embed(text);
      if (!vector) {
        return null;
      }
      state.embedding = vector;
    }

    const best = await this.similaritySearch.bestMatch(
      state.type,
      state.embedding,
      state.options.similarityThreshold
    );
    return best ? { node: best.node, similarity: best.similarity } : null;
  }

  private async matchByFuzzyRules(state: ResolutionState): Promise<StrategyMatch | null> {
    const matcher = this.registry.forType(state.type);
    const fields = [...new Set([...matcher.projectionFields(), "id", ...Object.keys(state.stored)])];
    const candidates = await withTimeout(
      this.store.listNodes(state.type, { limit: this.fuzzyCandidateLimit, fields }),
      this.operationTimeoutMs,
      "Node enumeration"
    );

    for (const existing of candidates) {
      if (containsAll(existing.properties, state.stored)) {
        return this.hydrate(existing, {
          score: 1,
          action: "auto_merge",
          reason: "all candidate properties already stored"
        });
      }

      if (!state.options.enableHumanReview) {
        if (matcher.matchNodes(existing.properties, state.properties)) {
          return this.hydrate(existing);
        }
        continue;
      }

      const evaluation = this.reviewManager.evaluate(state.type, existing, state.properties);
      if (evaluation.decision.action === "auto_merge") {
        return this.hydrate(existing, evaluation.decision);
      }
      if (evaluation.pendingReview) {
        state.pendingReviews.push(evaluation.pendingReview);
      }
    }

    return null;
  }

  private async matchByProperties(state: ResolutionState): Promise<StrategyMatch | null> {
    const where: StoredProperties = {};
    for (const [key, value] of Object.entries(state.stored)) {
      if (isPresent(value)) {
        where[key] = value;
      }
    }
    if (Object.keys(where).length === 0) {
      return null;
    }

    const node = await this.findOne(state.type, where);
    return node ? { node } : null;
  }

  private async findOne(label: string, where: StoredProperties): Promise<GraphNode | null> {
    const [node] = await withTimeout(
      this.store.findNodes({ label, where, limit: 1 }),
      this.operationTimeoutMs,
      "Node lookup"
    );
    return node ?? null;
  }

  /** Enumeration returns projected nodes; callers need every stored property. */
  private async hydrate(projected: GraphNode, decision?: MatchDecision): Promise<StrategyMatch> {
    const full = await withTimeout(this.store.getNodeById(projected.id), this.operationTimeoutMs, "Node fetch");
    return { node: full ?? projected, decision };
  }
}
