export { createApp, type CreateAppOptions } from "./app.js";
export { appConfig, type AppConfig } from "./config.js";
export { ConfidenceScorer, DEFAULT_CONFIDENCE_SETTINGS, type ConfidenceSettings } from "./pipeline/ConfidenceScorer.js";
export { HumanReviewManager } from "./pipeline/HumanReviewManager.js";
export { ImportOrchestrator, type ImportInput } from "./pipeline/ImportOrchestrator.js";
export { NodeImporter } from "./pipeline/NodeImporter.js";
export { NodeResolver, type NodeResolution } from "./pipeline/NodeResolver.js";
export { PropertyNormalizer } from "./pipeline/PropertyNormalizer.js";
export { RelationshipImporter, formatRelationshipType } from "./pipeline/RelationshipImporter.js";
export { SimilaritySearch } from "./pipeline/SimilaritySearch.js";
export { NodeMatcherRegistry } from "./pipeline/matchers/NodeMatcherRegistry.js";
export type { MatcherKind, NodeMatcher, EqualityMethod } from "./pipeline/matchers/types.js";
export { EmbeddingService } from "./services/EmbeddingService.js";
export type { EmbeddingGateway } from "./services/embeddingTypes.js";
export { InMemoryReviewStore } from "./services/InMemoryReviewStore.js";
export { ReviewQueue } from "./services/ReviewQueue.js";
export { ReviewService, ReviewNotFoundError, ReviewTargetNotFoundError } from "./services/ReviewService.js";
export { ReviewStore } from "./services/ReviewStore.js";
export { Neo4jGraphStore } from "./store/Neo4jGraphStore.js";
