import type { CandidateNode, CandidateRelationship } from "./graph.js";
import type { ImportStatistics } from "./import.js";
import type { ReviewRecord } from "./review.js";

export interface ApiErrorResponse {
  error: string;
  details?: unknown;
}

export type ServiceStatus = "ok" | "failed" | "not_configured";

export interface HealthResponse {
  status: "ok" | "degraded";
  timestamp: string;
  uptimeSec?: number;
  checks?: {
    neo4j: ServiceStatus;
    embedding: ServiceStatus;
  };
  memoryUsage?: {
    rss: number;
    heapUsed: number;
    heapTotal: number;
  };
}

export interface ImportRequest {
  entities: CandidateNode[];
  relationships?: CandidateRelationship[];
  options?: {
    dryRun?: boolean;
    enableVectorSearch?: boolean;
    similarityThreshold?: number;
    enableHumanReview?: boolean;
    batchSize?: number;
    concurrency?: number;
  };
}

export interface ImportResponse {
  statistics: ImportStatistics;
}

export interface ReviewListResponse {
  reviews: ReviewRecord[];
  total: number;
}

export interface ReviewDetailResponse {
  review: ReviewRecord;
}

export interface ReviewActionResponse {
  review: ReviewRecord;
  alreadyResolved: boolean;
}

export interface GraphStatsResponse {
  nodeCount: number;
  relationshipCount: number;
  labelDistribution: Record<string, number>;
  relationshipTypeDistribution: Record<string, number>;
}
