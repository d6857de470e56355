import { randomUUID } from "node:crypto";
import type { GraphNode, MatchDecision, PropertyMap, ReviewRecord } from "@graphmerge/shared";
import type { ConfidenceScore, ConfidenceScorer } from "./ConfidenceScorer.js";

export interface ReviewEvaluation {
  decision: MatchDecision;
  score: ConfidenceScore;
  /** Present only for `human_review`; the caller decides when to persist it. */
  pendingReview?: ReviewRecord;
}

function describe(score: ConfidenceScore): string {
  if (score.universalMatch !== null) {
    return `exact ${score.universalMatch} match`;
  }
  if (score.firedMethods.length === 0) {
    return "no equality method matched";
  }
  return `matched by ${score.firedMethods.map((method) => method.id).join(", ")}`;
}

export class HumanReviewManager {
  private readonly createId: () => string;
  private readonly now: () => Date;

  constructor(
    private readonly scorer: ConfidenceScorer,
    options: { createId?: () => string; now?: () => Date } = {}
  ) {
    this.createId = options.createId ?? randomUUID;
    this.now = options.now ?? (() => new Date());
  }

  evaluate(type: string, existing: GraphNode, candidate: PropertyMap): ReviewEvaluation {
    const score = this.scorer.score(type, existing.properties, candidate);
    const action = this.scorer.decide(score.confidence);
    const reason = `${describe(score)} (confidence ${score.confidence.toFixed(3)})`;

    if (action !== "human_review") {
      return { decision: { score: score.confidence, action, reason }, score };
    }

    const pendingReview: ReviewRecord = {
      id: this.createId(),
      nodeType: type,
      existingNodeId: existing.id,
      existingProperties: existing.properties,
      candidateProperties: candidate,
      confidenceScore: score.confidence,
      status: "pending",
      createdAt: this.now()
    };

    return {
      decision: { score: score.confidence, action, reason, reviewId: pendingReview.id },
      score,
      pendingReview
    };
  }
}
