import type { ReviewListQuery, ReviewRecord, ReviewResolution, ReviewStatus } from "@graphmerge/shared";

export interface ReviewStoreLike {
  close(): void;
  create(record: ReviewRecord): ReviewRecord;
  getById(id: string): ReviewRecord | null;
  list(query?: ReviewListQuery): ReviewRecord[];
  count(status?: ReviewStatus): number;
  /** Applies the resolution only to a pending record; `null` otherwise. */
  resolve(id: string, resolution: ReviewResolution, reviewedAt?: Date): ReviewRecord | null;
}
