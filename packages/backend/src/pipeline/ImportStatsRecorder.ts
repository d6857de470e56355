import type { NodeImportStats, RelationshipImportStats } from "@graphmerge/shared";

export type NodeOutcomeStatus = "created" | "updated" | "skipped" | "error";
export type RelationshipOutcomeStatus = "created" | "skipped" | "error";

export interface NodeImportOutcome {
  status: NodeOutcomeStatus;
  /** Resolved to a node that was already stored. */
  duplicate: boolean;
  reviewsQueued: number;
  nodeId?: string;
  reason?: string;
}

export interface RelationshipImportOutcome {
  status: RelationshipOutcomeStatus;
  relationshipId?: string;
  reason?: string;
}

/** Workers report outcomes here; nothing else touches the counters. */
export class ImportStatsRecorder {
  private readonly nodeStats: NodeImportStats = {
    total: 0,
    created: 0,
    updated: 0,
    skipped: 0,
    errors: 0,
    duplicates: 0
  };
  private readonly relationshipStats: RelationshipImportStats = {
    total: 0,
    created: 0,
    skipped: 0,
    errors: 0
  };
  private queuedReviews = 0;

  recordNode(outcome: NodeImportOutcome): void {
    this.nodeStats.total += 1;
    switch (outcome.status) {
      case "created":
        this.nodeStats.created += 1;
        break;
      case "updated":
        this.nodeStats.updated += 1;
        break;
      case "skipped":
        this.nodeStats.skipped += 1;
        break;
      case "error":
        this.nodeStats.errors += 1;
        break;
    }
    if (outcome.duplicate) {
      this.nodeStats.duplicates += 1;
    }
    this.queuedReviews += outcome.reviewsQueued;
  }

  recordRelationship(outcome: RelationshipImportOutcome): void {
    this.relationshipStats.total += 1;
    switch (outcome.status) {
      case "created":
        this.relationshipStats.created += 1;
        break;
      case "skipped":
        this.relationshipStats.skipped += 1;
        break;
      case "error":
        this.relationshipStats.errors += 1;
        break;
    }
  }

  get nodes(): NodeImportStats {
    return { ...this.nodeStats };
  }

  get relationships(): RelationshipImportStats {
    return { ...this.relationshipStats };
  }

  get reviewsQueued(): number {
    return this.queuedReviews;
  }
}

export function formatDuration(durationMs: number): string {
  if (durationMs < 1000) {
    return `${Math.round(durationMs)}ms`;
  }
  return `${(durationMs / 1000).toFixed(2)}s`;
}
