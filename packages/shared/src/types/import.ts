export type MatchAction = "auto_merge" | "auto_reject" | "human_review";

export interface MatchDecision {
  score: number;
  action: MatchAction;
  reason: string;
  reviewId?: string;
}

export type DryRunCounting = "created" | "skipped";

export interface ImportOptions {
  dryRun: boolean;
  enableVectorSearch: boolean;
  similarityThreshold?: number;
  enableHumanReview: boolean;
  batchSize: number;
  concurrency: number;
  dryRunCountsAs: DryRunCounting;
}

export interface NodeImportStats {
  total: number;
  created: number;
  updated: number;
  skipped: number;
  errors: number;
  duplicates: number;
}

export interface RelationshipImportStats {
  total: number;
  created: number;
  skipped: number;
  errors: number;
}

export interface ImportStatistics {
  nodes: NodeImportStats;
  relationships: RelationshipImportStats;
  reviewsQueued: number;
  cancelled: boolean;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  summary: string;
}
