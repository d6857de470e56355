import neo4j, {
  Integer,
  isNode,
  isRelationship,
  type Driver,
  type Node,
  type QueryResult,
  type Relationship,
  type Session,
  type SessionConfig
} from "neo4j-driver";
import type {
  AbstractGraphStore,
  GraphNode,
  GraphRelationship,
  GraphStats,
  NodeListOptions,
  NodeQuery,
  SimilarNode,
  StoredProperties,
  StoredPropertyValue,
  SubstringSearchOptions,
  VectorSearchOptions
} from "@graphmerge/shared";
import { appConfig } from "../config.js";

export interface Neo4jGraphStoreConfig {
  uri: string;
  user: string;
  password: string;
  database?: string;
  queryTimeoutMs?: number;
  indexedLabels?: string[];
  embeddingDimensions?: number;
}

type AccessMode = "READ" | "WRITE";

const DEFAULT_INDEXED_LABELS = ["Person", "Address", "Asset", "Vehicle"];
const DEFAULT_EMBEDDING_DIMENSIONS = 1536;

export function quoteIdentifier(name: string): string {
  const trimmed = name.trim();
  if (trimmed.length === 0) {
    throw new Error("Label and relationship type names must not be blank");
  }
  return `\`${trimmed.replace(/`/g, "``")}\``;
}

function labelClause(label: string | undefined): string {
  return label ? `:${quoteIdentifier(label)}` : "";
}

function indexBaseName(label: string): string {
  return label.trim().toLowerCase().replace(/\W/g, "_");
}

export function vectorIndexName(label: string): string {
  return `${indexBaseName(label)}_embedding_idx`;
}

export class Neo4jGraphStore implements AbstractGraphStore {
  private driver: Driver | null = null;
  private statsCache: { data: GraphStats; expiresAt: number } | null = null;
  private readonly vectorIndexes = new Set<string>();
  private static readonly STATS_TTL_MS = 30_000;

  constructor(private readonly config: Neo4jGraphStoreConfig) {}

  static fromEnv(): Neo4jGraphStore {
    return new Neo4jGraphStore({
      uri: appConfig.NEO4J_URI,
      user: appConfig.NEO4J_USER,
      password: appConfig.NEO4J_PASSWORD,
      database: appConfig.NEO4J_DATABASE,
      queryTimeoutMs: appConfig.NEO4J_QUERY_TIMEOUT_MS,
      embeddingDimensions: appConfig.EMBEDDING_DIMENSIONS
    });
  }

  async connect(): Promise<void> {
    if (this.driver) {
      return;
    }

    this.driver = neo4j.driver(
      this.config.uri,
      neo4j.auth.basic(this.config.user, this.config.password)
    );

    try {
      await this.driver.verifyConnectivity();
      await this.ensureIndexes();
    } catch (error) {
      await this.disconnect();
      throw error;
    }
  }

  async disconnect(): Promise<void> {
    if (!this.driver) {
      return;
    }

    await this.driver.close();
    this.driver = null;
    this.vectorIndexes.clear();
  }

  async healthCheck(): Promise<boolean> {
    if (!this.driver) {
      return false;
    }

    try {
      await this.withSession("READ", async (session) => {
        await this.run(session, "RETURN 1 AS ok");
      });
      return true;
    } catch {
      return false;
    }
  }

  async getNodeById(id: string): Promise<GraphNode | null> {
    return this.withSession("READ", async (session) => {
      const result = await this.run(
        session,
        `
        MATCH (n)
        WHERE elementId(n) = $id
        RETURN n
        LIMIT 1
        `,
        { id }
      );
      return this.firstNode(result);
    });
  }

  async findNodes(query: NodeQuery): Promise<GraphNode[]> {
    if (Object.keys(query.where).length === 0) {
      return [];
    }

    return this.withSession("READ", async (session) => {
      const result = await this.run(
        session,
        `
        MATCH (n${labelClause(query.label)})
        WHERE all(key IN keys($where) WHERE n[key] = $where[key])
        RETURN n
        LIMIT $limit
        `,
        { where: query.where, limit: neo4j.int(Math.max(1, query.limit ?? 10)) }
      );
      return this.nodes(result);
    });
  }

  async listNodes(label: string | undefined, options: NodeListOptions = {}): Promise<GraphNode[]> {
    const limit = neo4j.int(Math.max(1, options.limit ?? 100));

    return this.withSession("READ", async (session) => {
      if (!options.fields) {
        const result = await this.run(
          session,
          `
          MATCH (n${labelClause(label)})
          RETURN n
          ORDER BY elementId(n)
          LIMIT $limit
          `,
          { limit }
        );
        return this.nodes(result);
      }

      const result = await this.run(
        session,
        `
        MATCH (n${labelClause(label)})
        RETURN elementId(n) AS id,
               labels(n) AS labels,
               [key IN $fields WHERE n[key] IS NOT NULL | [key, n[key]]] AS pairs
        ORDER BY id
        LIMIT $limit
        `,
        { fields: options.fields, limit }
      );

      return result.records.map((record) => ({
        id: this.toString(record.get("id"), ""),
        labels: this.toStringArray(record.get("labels")),
        properties: this.fromPairs(record.get("pairs"))
      }));
    });
  }

  async findNodesByPropertySubstring(
    text: string,
    options: SubstringSearchOptions = {}
  ): Promise<GraphNode[]> {
    if (text.trim().length === 0) {
      return [];
    }

    return this.withSession("READ", async (session) => {
      const result = await this.run(
        session,
        `
        MATCH (n${labelClause(options.label)})
        WHERE any(key IN keys(n) WHERE key <> 'embedding'
          AND n[key] IS :: STRING
          AND toLower(n[key]) CONTAINS toLower($text))
        RETURN n
        ORDER BY size(keys(n)) ASC
        LIMIT $limit
        `,
        { text, limit: neo4j.int(Math.max(1, options.limit ?? 1)) }
      );
      return this.nodes(result);
    });
  }

  async createNode(label: string, properties: StoredProperties, embedding?: number[]): Promise<GraphNode> {
    this.statsCache = null;
    if (embedding && embedding.length > 0) {
      await this.ensureVectorIndex(label);
    }
    return this.withSession("WRITE", async (session) => {
      const result = await this.run(
        session,
        `
        CREATE (n${labelClause(label)})
        SET n = $properties
        SET n.embedding = $embedding
        RETURN n
        `,
        { properties, embedding: embedding && embedding.length > 0 ? embedding : null }
      );
      const node = this.firstNode(result);
      if (!node) {
        throw new Error(`Node creation returned no node for label ${label}`);
      }
      return node;
    });
  }

  async updateNodeProperties(id: string, properties: StoredProperties): Promise<GraphNode | null> {
    return this.withSession("WRITE", async (session) => {
      const result = await this.run(
        session,
        `
        MATCH (n)
        WHERE elementId(n) = $id
        SET n += $properties
        RETURN n
        `,
        { id, properties }
      );
      return this.firstNode(result);
    });
  }

  async deleteNode(id: string): Promise<void> {
    this.statsCache = null;
    await this.withSession("WRITE", async (session) => {
      await this.run(
        session,
        `
        MATCH (n)
        WHERE elementId(n) = $id
        DETACH DELETE n
        `,
        { id }
      );
    });
  }

  async findRelationship(sourceId: string, type: string, targetId: string): Promise<GraphRelationship | null> {
    return this.withSession("READ", async (session) => {
      const result = await this.run(
        session,
        `
        MATCH (a)-[r:${quoteIdentifier(type)}]->(b)
        WHERE elementId(a) = $sourceId AND elementId(b) = $targetId
        RETURN r, elementId(a) AS sourceId, elementId(b) AS targetId
        LIMIT 1
        `,
        { sourceId, targetId }
      );
      return this.relationships(result)[0] ?? null;
    });
  }

  async createRelationship(
    sourceId: string,
    type: string,
    targetId: string,
    properties: StoredProperties
  ): Promise<GraphRelationship> {
    this.statsCache = null;
    return this.withSession("WRITE", async (session) => {
      const result = await this.run(
        session,
        `
        MATCH (a), (b)
        WHERE elementId(a) = $sourceId AND elementId(b) = $targetId
        CREATE (a)-[r:${quoteIdentifier(type)}]->(b)
        SET r = $properties
        RETURN r, elementId(a) AS sourceId, elementId(b) AS targetId
        `,
        { sourceId, targetId, properties }
      );
      const relationship = this.relationships(result)[0];
      if (!relationship) {
        throw new Error(`Relationship endpoints not found: ${sourceId} -> ${targetId}`);
      }
      return relationship;
    });
  }

  async getRelationshipsByNode(nodeId: string): Promise<GraphRelationship[]> {
    return this.withSession("READ", async (session) => {
      const result = await this.run(
        session,
        `
        MATCH (n)-[r]-()
        WHERE elementId(n) = $nodeId
        RETURN DISTINCT r, elementId(startNode(r)) AS sourceId, elementId(endNode(r)) AS targetId
        `,
        { nodeId }
      );
      return this.relationships(result);
    });
  }

  /**
   * Nearest neighbours from the label's vector index. Scores are Neo4j's
   * cosine similarity, which lies in [0, 1].
   */
  async vectorSearch(label: string, vector: number[], options: VectorSearchOptions = {}): Promise<SimilarNode[]> {
    if (vector.length === 0) {
      return [];
    }
    const dimensions = this.embeddingDimensions();
    if (vector.length !== dimensions) {
      throw new Error(`Query vector has ${vector.length} dimensions, the ${label} index expects ${dimensions}`);
    }

    await this.ensureVectorIndex(label);

    return this.withSession("READ", async (session) => {
      const result = await this.run(
        session,
        `
        CALL db.index.vector.queryNodes($indexName, $limit, $embedding)
        YIELD node AS n, score AS similarity
        WHERE $label IN labels(n) AND similarity >= $threshold
        RETURN n, similarity
        ORDER BY similarity DESC
        `,
        {
          indexName: vectorIndexName(label),
          label: label.trim(),
          embedding: vector,
          threshold: options.threshold ?? 0,
          limit: neo4j.int(Math.max(1, options.limit ?? 5))
        }
      );

      return result.records.flatMap((record) => {
        const value: unknown = record.get("n");
        return isNode(value)
          ? [{ node: this.mapGraphNode(value), similarity: this.toNumber(record.get("similarity")) }]
          : [];
      });
    });
  }

  async getStats(): Promise<GraphStats> {
    if (this.statsCache && Date.now() < this.statsCache.expiresAt) {
      return this.statsCache.data;
    }

    const stats = await this.withSession("READ", async (session) => {
      const counts = await this.run(
        session,
        `
        CALL { MATCH (n) RETURN count(n) AS nodeCount }
        CALL { MATCH ()-[r]->() RETURN count(r) AS relationshipCount }
        RETURN nodeCount, relationshipCount
        `
      );
      const labels = await this.run(
        session,
        `
        MATCH (n)
        UNWIND labels(n) AS name
        RETURN name, count(*) AS value
        `
      );
      const types = await this.run(
        session,
        `
        MATCH ()-[r]->()
        RETURN type(r) AS name, count(*) AS value
        `
      );

      const row = counts.records[0];
      return {
        nodeCount: this.toNumber(row?.get("nodeCount")),
        relationshipCount: this.toNumber(row?.get("relationshipCount")),
        labelDistribution: this.toDistributionMap(labels),
        relationshipTypeDistribution: this.toDistributionMap(types)
      };
    });

    this.statsCache = {
      data: stats,
      expiresAt: Date.now() + Neo4jGraphStore.STATS_TTL_MS
    };

    return stats;
  }

  private async ensureIndexes(): Promise<void> {
    const labels = this.config.indexedLabels ?? DEFAULT_INDEXED_LABELS;

    await this.withSession("WRITE", async (session) => {
      for (const label of labels) {
        const indexBase = indexBaseName(label);
        await this.run(
          session,
          `CREATE INDEX ${indexBase}_name_idx IF NOT EXISTS FOR (n${labelClause(label)}) ON (n.name)`
        );
        await this.run(
          session,
          `CREATE INDEX ${indexBase}_id_idx IF NOT EXISTS FOR (n${labelClause(label)}) ON (n.id)`
        );
      }
    });
  }

  private embeddingDimensions(): number {
    return Math.max(1, Math.floor(this.config.embeddingDimensions ?? DEFAULT_EMBEDDING_DIMENSIONS));
  }

  private async ensureVectorIndex(label: string): Promise<void> {
    const indexName = vectorIndexName(label);
    if (this.vectorIndexes.has(indexName)) {
      return;
    }

    await this.withSession("WRITE", async (session) => {
      await this.run(
        session,
        `
        CREATE VECTOR INDEX ${quoteIdentifier(indexName)} IF NOT EXISTS
        FOR (n${labelClause(label)}) ON (n.embedding)
        OPTIONS {indexConfig: {
          \`vector.dimensions\`: ${this.embeddingDimensions()},
          \`vector.similarity_function\`: 'cosine'
        }}
        `
      );
      await this.run(session, "CALL db.awaitIndex($indexName)", { indexName });
    });
    this.vectorIndexes.add(indexName);
  }

  private run(session: Session, cypher: string, params: Record<string, unknown> = {}): Promise<QueryResult> {
    const timeout = this.config.queryTimeoutMs;
    return session.run(cypher, params, timeout ? { timeout } : undefined);
  }

  private withSession<T>(accessMode: AccessMode, fn: (session: Session) => Promise<T>): Promise<T> {
    const sessionConfig: SessionConfig = {
      defaultAccessMode: accessMode === "READ" ? neo4j.session.READ : neo4j.session.WRITE
    };
    if (this.config.database) {
      sessionConfig.database = this.config.database;
    }

    const session = this.getDriver().session(sessionConfig);

    return fn(session).finally(async () => {
      await session.close();
    });
  }

  private getDriver(): Driver {
    if (!this.driver) {
      throw new Error("Neo4jGraphStore is not connected. Call connect() first.");
    }

    return this.driver;
  }

  private firstNode(result: QueryResult): GraphNode | null {
    return this.nodes(result)[0] ?? null;
  }

  private nodes(result: QueryResult): GraphNode[] {
    return result.records.flatMap((record) => {
      const value: unknown = record.get("n");
      return isNode(value) ? [this.mapGraphNode(value)] : [];
    });
  }

  private relationships(result: QueryResult): GraphRelationship[] {
    return result.records.flatMap((record) => {
      const value: unknown = record.get("r");
      if (!isRelationship(value)) {
        return [];
      }
      return [
        this.mapGraphRelationship(
          value,
          this.toString(record.get("sourceId"), ""),
          this.toString(record.get("targetId"), "")
        )
      ];
    });
  }

  private mapGraphNode(node: Node): GraphNode {
    const { embedding, ...rest } = this.asRecord(node.properties);
    const graphNode: GraphNode = {
      id: node.elementId,
      labels: [...node.labels],
      properties: this.toStoredProperties(rest)
    };

    const vector = this.toOptionalNumberArray(embedding);
    if (vector) {
      graphNode.embedding = vector;
    }

    return graphNode;
  }

  private mapGraphRelationship(relationship: Relationship, sourceId: string, targetId: string): GraphRelationship {
    return {
      id: relationship.elementId,
      type: relationship.type,
      sourceId,
      targetId,
      properties: this.toStoredProperties(this.asRecord(relationship.properties))
    };
  }

  private fromPairs(value: unknown): StoredProperties {
    const properties: StoredProperties = {};
    if (!Array.isArray(value)) {
      return properties;
    }
    for (const pair of value) {
      if (Array.isArray(pair) && typeof pair[0] === "string") {
        properties[pair[0]] = this.toStoredValue(pair[1]);
      }
    }
    return properties;
  }

  private toStoredProperties(record: Record<string, unknown>): StoredProperties {
    const properties: StoredProperties = {};
    for (const [key, value] of Object.entries(record)) {
      properties[key] = this.toStoredValue(value);
    }
    return properties;
  }

  private toStoredValue(value: unknown): StoredPropertyValue {
    if (value === null || value === undefined) {
      return null;
    }
    if (typeof value === "string" || typeof value === "boolean") {
      return value;
    }
    if (typeof value === "number" || value instanceof Integer) {
      return this.toNumber(value);
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => this.toStoredValue(item));
    }
    // Temporal and spatial values.
    return String(value);
  }

  private toDistributionMap(result: QueryResult): Record<string, number> {
    const distribution: Record<string, number> = {};
    for (const record of result.records) {
      const name = this.toString(record.get("name"), "Unknown");
      distribution[name] = this.toNumber(record.get("value"), 0);
    }
    return distribution;
  }

  private asRecord(value: unknown): Record<string, unknown> {
    if (value && typeof value === "object" && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value));
    }
    return {};
  }

  private toString(value: unknown, fallback: string): string {
    if (typeof value === "string") {
      return value;
    }
    if (typeof value === "number" || typeof value === "boolean") {
      return String(value);
    }
    return fallback;
  }

  private toStringArray(value: unknown): string[] {
    if (!Array.isArray(value)) {
      return [];
    }
    return value.map((item) => String(item));
  }

  private toNumber(value: unknown, fallback = 0): number {
    if (typeof value === "number") {
      return Number.isFinite(value) ? value : fallback;
    }
    if (value instanceof Integer) {
      return value.toNumber();
    }
    if (typeof value === "string" && value.trim() !== "") {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) {
        return parsed;
      }
    }
    return fallback;
  }

  private toOptionalNumberArray(value: unknown): number[] | undefined {
    if (!Array.isArray(value)) {
      return undefined;
    }
    return value.map((item) => this.toNumber(item));
  }
}
