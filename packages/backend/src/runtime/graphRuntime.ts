import type { AbstractGraphStore, ImportOptions } from "@graphmerge/shared";
import { appConfig } from "../config.js";
import { confidenceSettingsFromConfig, ConfidenceScorer } from "../pipeline/ConfidenceScorer.js";
import { HumanReviewManager } from "../pipeline/HumanReviewManager.js";
import { ImportOrchestrator } from "../pipeline/ImportOrchestrator.js";
import { NodeMatcherRegistry } from "../pipeline/matchers/NodeMatcherRegistry.js";
import { NodeImporter } from "../pipeline/NodeImporter.js";
import { NodeResolver } from "../pipeline/NodeResolver.js";
import { PropertyNormalizer } from "../pipeline/PropertyNormalizer.js";
import { RelationshipImporter } from "../pipeline/RelationshipImporter.js";
import { SimilaritySearch } from "../pipeline/SimilaritySearch.js";
import { EmbeddingService } from "../services/EmbeddingService.js";
import type { EmbeddingGateway } from "../services/embeddingTypes.js";
import { InMemoryReviewStore } from "../services/InMemoryReviewStore.js";
import { ReviewQueue } from "../services/ReviewQueue.js";
import { ReviewService } from "../services/ReviewService.js";
import { ReviewStore } from "../services/ReviewStore.js";
import type { ReviewStoreLike } from "../services/reviewTypes.js";
import { Neo4jGraphStore } from "../store/Neo4jGraphStore.js";
import { componentLogger, logger } from "../utils/logger.js";

let graphStoreSingleton: AbstractGraphStore | null = null;
let embeddingServiceSingleton: EmbeddingGateway | null = null;
let reviewStoreSingleton: ReviewStoreLike | null = null;
let reviewServiceSingleton: ReviewService | null = null;
let orchestratorSingleton: ImportOrchestrator | null = null;
let connectPromise: Promise<void> | null = null;

export function getGraphStoreSingleton(): AbstractGraphStore {
  if (!graphStoreSingleton) {
    graphStoreSingleton = Neo4jGraphStore.fromEnv();
  }

  return graphStoreSingleton;
}

export function getEmbeddingServiceSingleton(): EmbeddingGateway {
  if (!embeddingServiceSingleton) {
    embeddingServiceSingleton = EmbeddingService.fromEnv();
  }

  return embeddingServiceSingleton;
}

export function getReviewStoreSingleton(): ReviewStoreLike {
  if (reviewStoreSingleton) {
    return reviewStoreSingleton;
  }

  try {
    reviewStoreSingleton = new ReviewStore({ dbPath: appConfig.REVIEW_DB_PATH });
  } catch (error) {
    logger.warn(
      {
        error: error instanceof Error ? error.message : String(error)
      },
      "SQLite ReviewStore unavailable, falling back to in-memory store"
    );
    reviewStoreSingleton = new InMemoryReviewStore();
  }

  return reviewStoreSingleton;
}

export function getReviewServiceSingleton(): ReviewService {
  if (!reviewServiceSingleton) {
    reviewServiceSingleton = new ReviewService(getReviewStoreSingleton(), getGraphStoreSingleton());
  }

  return reviewServiceSingleton;
}

export function importDefaultsFromConfig(): ImportOptions {
  return {
    dryRun: false,
    enableVectorSearch: appConfig.ENABLE_VECTOR_SEARCH,
    enableHumanReview: appConfig.ENABLE_HUMAN_REVIEW,
    batchSize: appConfig.IMPORT_BATCH_SIZE,
    concurrency: appConfig.IMPORT_CONCURRENCY,
    dryRunCountsAs: appConfig.DRY_RUN_COUNTS_AS
  };
}

export function getImportOrchestratorSingleton(): ImportOrchestrator {
  if (orchestratorSingleton) {
    return orchestratorSingleton;
  }

  const store = getGraphStoreSingleton();
  const embeddings = appConfig.EMBEDDING_API_KEY.trim().length > 0 ? getEmbeddingServiceSingleton() : null;
  const normalizer = new PropertyNormalizer({ logger: componentLogger("PropertyNormalizer") });
  const registry = new NodeMatcherRegistry({ defaultSimilarityThreshold: appConfig.SIMILARITY_THRESHOLD });
  const scorer = new ConfidenceScorer(registry, confidenceSettingsFromConfig(appConfig));
  const reviewQueue = new ReviewQueue(getReviewStoreSingleton());
  const operationTimeoutMs = appConfig.NEO4J_QUERY_TIMEOUT_MS;

  const resolver = new NodeResolver({
    store,
    registry,
    similaritySearch: new SimilaritySearch(store, registry, {
      thresholdOverrides: appConfig.VECTOR_THRESHOLD_OVERRIDES,
      limit: appConfig.VECTOR_SEARCH_LIMIT
    }),
    reviewManager: new HumanReviewManager(scorer),
    embeddings,
    uniqueKeys: appConfig.UNIQUE_PROPERTY_KEYS,
    fuzzyCandidateLimit: appConfig.FUZZY_CANDIDATE_LIMIT,
    operationTimeoutMs
  });

  orchestratorSingleton = new ImportOrchestrator({
    nodeImporter: new NodeImporter({
      store,
      resolver,
      normalizer,
      registry,
      embeddings,
      reviewQueue,
      operationTimeoutMs
    }),
    relationshipImporter: new RelationshipImporter({
      store,
      normalizer,
      fullScanLimit: appConfig.FULL_SCAN_LIMIT,
      operationTimeoutMs
    }),
    ensureConnected: () => ensureGraphStoreConnected(store),
    reviewQueue,
    defaults: importDefaultsFromConfig()
  });

  return orchestratorSingleton;
}

export async function ensureGraphStoreConnected(
  store: AbstractGraphStore = getGraphStoreSingleton()
): Promise<void> {
  if (connectPromise) {
    return connectPromise;
  }

  connectPromise = store.connect().catch((error: unknown) => {
    connectPromise = null;
    throw error;
  });

  return connectPromise;
}

export async function shutdownRuntime(): Promise<void> {
  if (graphStoreSingleton) {
    await graphStoreSingleton.disconnect();
    graphStoreSingleton = null;
    connectPromise = null;
  }
  reviewStoreSingleton?.close();
  reviewStoreSingleton = null;
  reviewServiceSingleton = null;
  orchestratorSingleton = null;
}
