import type {
  AbstractGraphStore,
  ReviewDecision,
  ReviewListQuery,
  ReviewRecord,
  ReviewStatus
} from "@graphmerge/shared";
import { PropertyNormalizer } from "../pipeline/PropertyNormalizer.js";
import { componentLogger, type Logger } from "../utils/logger.js";
import type { ReviewStoreLike } from "./reviewTypes.js";

export class ReviewNotFoundError extends Error {
  constructor(readonly reviewId: string) {
    super(`Review not found: ${reviewId}`);
    this.name = "ReviewNotFoundError";
  }
}

export class ReviewTargetNotFoundError extends Error {
  constructor(readonly nodeId: string) {
    super(`Target node not found: ${nodeId}`);
    this.name = "ReviewTargetNotFoundError";
  }
}

export interface ReviewActionResult {
  review: ReviewRecord;
  alreadyResolved: boolean;
}

export interface ReviewerInput {
  reviewer: string;
  notes?: string;
}

export class ReviewService {
  private readonly normalizer: PropertyNormalizer;
  private readonly logger: Logger;

  constructor(
    private readonly reviews: ReviewStoreLike,
    private readonly graph: AbstractGraphStore,
    options: { normalizer?: PropertyNormalizer; logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? componentLogger("ReviewService");
    this.normalizer = options.normalizer ?? new PropertyNormalizer({ logger: this.logger });
  }

  list(query: ReviewListQuery = {}): { reviews: ReviewRecord[]; total: number } {
    return {
      reviews: this.reviews.list(query),
      total: this.reviews.count(query.status)
    };
  }

  listPending(limit?: number, offset?: number): ReviewRecord[] {
    return this.reviews.list({ status: "pending", limit, offset });
  }

  getReview(id: string): ReviewRecord {
    const review = this.reviews.getById(id);
    if (!review) {
      throw new ReviewNotFoundError(id);
    }
    return review;
  }

  /** Merges the candidate into `nodeId`, or into the node it was compared with. */
  async approve(id: string, input: ReviewerInput & { nodeId?: string }): Promise<ReviewActionResult> {
    const review = this.getReview(id);
    if (review.status !== "pending") {
      return { review, alreadyResolved: true };
    }
    const targetNodeId = input.nodeId ?? review.existingNodeId;
    await this.applyCandidate(review, targetNodeId);
    return this.finish(review, "approved", "approve", input, targetNodeId);
  }

  async merge(id: string, input: ReviewerInput & { targetNodeId: string }): Promise<ReviewActionResult> {
    const review = this.getReview(id);
    if (review.status !== "pending") {
      return { review, alreadyResolved: true };
    }
    await this.applyCandidate(review, input.targetNodeId);
    return this.finish(review, "approved", "merge", input, input.targetNodeId);
  }

  reject(id: string, input: ReviewerInput): ReviewActionResult {
    const review = this.getReview(id);
    if (review.status !== "pending") {
      return { review, alreadyResolved: true };
    }
    return this.finish(review, "rejected", "reject", input);
  }

  private async applyCandidate(review: ReviewRecord, targetNodeId: string): Promise<void> {
    const target = await this.graph.getNodeById(targetNodeId);
    if (!target) {
      throw new ReviewTargetNotFoundError(targetNodeId);
    }

    const { id: _ignored, ...candidate } = review.candidateProperties;
    await this.graph.updateNodeProperties(target.id, this.normalizer.normalizeProperties(candidate));
  }

  private finish(
    review: ReviewRecord,
    status: Exclude<ReviewStatus, "pending">,
    decision: ReviewDecision,
    input: ReviewerInput,
    targetNodeId?: string
  ): ReviewActionResult {
    const resolved = this.reviews.resolve(review.id, {
      status,
      decision,
      reviewer: input.reviewer,
      targetNodeId,
      notes: input.notes
    });

    // Lost a race with another reviewer: report what they decided.
    if (!resolved) {
      return { review: this.getReview(review.id), alreadyResolved: true };
    }

    this.logger.info(
      { reviewId: review.id, decision, reviewer: input.reviewer, targetNodeId },
      "Review resolved"
    );
    return { review: resolved, alreadyResolved: false };
  }
}
