import type { ReviewListQuery, ReviewRecord, ReviewResolution, ReviewStatus } from "@graphmerge/shared";
import type { ReviewStoreLike } from "./reviewTypes.js";

export class InMemoryReviewStore implements ReviewStoreLike {
  private readonly records = new Map<string, ReviewRecord>();

  close(): void {
    this.records.clear();
  }

  create(record: ReviewRecord): ReviewRecord {
    if (this.records.has(record.id)) {
      throw new Error(`Review record already exists: ${record.id}`);
    }
    this.records.set(record.id, structuredClone(record));
    return structuredClone(record);
  }

  getById(id: string): ReviewRecord | null {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  list(query: ReviewListQuery = {}): ReviewRecord[] {
    const limit = Math.max(1, query.limit ?? 100);
    const offset = Math.max(0, query.offset ?? 0);
    return [...this.records.values()]
      .filter((record) => query.status === undefined || record.status === query.status)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .slice(offset, offset + limit)
      .map((record) => structuredClone(record));
  }

  count(status?: ReviewStatus): number {
    return [...this.records.values()].filter((record) => status === undefined || record.status === status)
      .length;
  }

  resolve(id: string, resolution: ReviewResolution, reviewedAt = new Date()): ReviewRecord | null {
    const record = this.records.get(id);
    if (!record || record.status !== "pending") {
      return null;
    }

    const resolved: ReviewRecord = {
      ...record,
      status: resolution.status,
      decision: resolution.decision,
      reviewer: resolution.reviewer,
      reviewedAt
    };
    if (resolution.targetNodeId !== undefined) {
      resolved.targetNodeId = resolution.targetNodeId;
    }
    if (resolution.notes !== undefined) {
      resolved.notes = resolution.notes;
    }

    this.records.set(id, resolved);
    return structuredClone(resolved);
  }
}
