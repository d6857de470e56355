import type { PropertyMap, StoredProperties } from "./properties.js";

export type ReviewStatus = "pending" | "approved" | "rejected";

export type ReviewDecision = "approve" | "reject" | "merge";

export interface ReviewRecord {
  id: string;
  nodeType: string;
  existingNodeId: string;
  existingProperties: StoredProperties;
  candidateProperties: PropertyMap;
  confidenceScore: number;
  status: ReviewStatus;
  decision?: ReviewDecision;
  targetNodeId?: string;
  reviewer?: string;
  notes?: string;
  createdAt: Date;
  reviewedAt?: Date;
}

export interface ReviewResolution {
  status: Exclude<ReviewStatus, "pending">;
  decision: ReviewDecision;
  reviewer: string;
  targetNodeId?: string;
  notes?: string;
}

export interface ReviewListQuery {
  status?: ReviewStatus;
  limit?: number;
  offset?: number;
}
