import type { PropertyMap, StoredProperties } from "./properties.js";

export interface GraphNode {
  /** Store-assigned identifier (not the `id` property a candidate may carry). */
  id: string;
  labels: string[];
  properties: StoredProperties;
  embedding?: number[];
}

export interface GraphRelationship {
  id: string;
  type: string;
  sourceId: string;
  targetId: string;
  properties: StoredProperties;
}

export interface CandidateNode {
  type: string;
  properties: PropertyMap;
}

export interface CandidateRelationship {
  source: string | string[];
  target: string | string[];
  type?: string;
  properties?: PropertyMap;
  sourceType?: string;
  targetType?: string;
}
