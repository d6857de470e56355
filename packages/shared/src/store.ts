import type { GraphNode, GraphRelationship } from "./types/graph.js";
import type { StoredProperties } from "./types/properties.js";

export interface NodeQuery {
  label?: string;
  where: StoredProperties;
  limit?: number;
}

export interface NodeListOptions {
  limit?: number;
  /** Property projection; every property is returned when omitted. */
  fields?: string[];
}

export interface SubstringSearchOptions {
  label?: string;
  limit?: number;
}

export interface VectorSearchOptions {
  limit?: number;
  threshold?: number;
}

export interface SimilarNode {
  node: GraphNode;
  similarity: number;
}

export interface GraphStats {
  nodeCount: number;
  relationshipCount: number;
  labelDistribution: Record<string, number>;
  relationshipTypeDistribution: Record<string, number>;
}

export interface GraphNodeReader {
  getNodeById(id: string): Promise<GraphNode | null>;
  findNodes(query: NodeQuery): Promise<GraphNode[]>;
  listNodes(label: string | undefined, options?: NodeListOptions): Promise<GraphNode[]>;
  findNodesByPropertySubstring(text: string, options?: SubstringSearchOptions): Promise<GraphNode[]>;
}

export interface GraphNodeWriter {
  createNode(label: string, properties: StoredProperties, embedding?: number[]): Promise<GraphNode>;
  updateNodeProperties(id: string, properties: StoredProperties): Promise<GraphNode | null>;
  deleteNode(id: string): Promise<void>;
}

export interface GraphRelationshipStore {
  findRelationship(sourceId: string, type: string, targetId: string): Promise<GraphRelationship | null>;
  createRelationship(
    sourceId: string,
    type: string,
    targetId: string,
    properties: StoredProperties
  ): Promise<GraphRelationship>;
  getRelationshipsByNode(nodeId: string): Promise<GraphRelationship[]>;
}

export interface VectorStore {
  vectorSearch(label: string, vector: number[], options?: VectorSearchOptions): Promise<SimilarNode[]>;
}

export interface AbstractGraphStore
  extends GraphNodeReader,
    GraphNodeWriter,
    GraphRelationshipStore,
    VectorStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  healthCheck(): Promise<boolean>;
  getStats(): Promise<GraphStats>;
}
