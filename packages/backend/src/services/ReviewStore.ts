import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import type { ReviewListQuery, ReviewRecord, ReviewResolution, ReviewStatus } from "@graphmerge/shared";
import { propertyMapSchema, storedPropertiesSchema } from "../pipeline/propertySchema.js";
import type { ReviewStoreLike } from "./reviewTypes.js";

export interface ReviewStoreOptions {
  dbPath?: string;
}

interface ReviewRow {
  id: string;
  node_type: string;
  existing_node_id: string;
  existing_properties_json: string;
  candidate_properties_json: string;
  confidence_score: number;
  status: string;
  decision: string | null;
  target_node_id: string | null;
  reviewer: string | null;
  notes: string | null;
  created_at: string;
  reviewed_at: string | null;
}

const reviewStatusSchema = z.enum(["pending", "approved", "rejected"]);
const reviewDecisionSchema = z.enum(["approve", "reject", "merge"]);

const SELECT_COLUMNS = `
  id, node_type, existing_node_id, existing_properties_json, candidate_properties_json,
  confidence_score, status, decision, target_node_id, reviewer, notes, created_at, reviewed_at
`;

export class ReviewStore implements ReviewStoreLike {
  private readonly db: Database.Database;

  constructor(options: ReviewStoreOptions = {}) {
    const dbPath = resolve(options.dbPath ?? "data/reviews.db");
    mkdirSync(dirname(dbPath), { recursive: true });

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");

    this.initializeSchema();
  }

  close(): void {
    this.db.close();
  }

  create(record: ReviewRecord): ReviewRecord {
    this.db
      .prepare(
        `
        INSERT INTO review_records (
          id, node_type, existing_node_id, existing_properties_json, candidate_properties_json,
          confidence_score, status, decision, target_node_id, reviewer, notes, created_at, reviewed_at
        )
        VALUES (
          @id, @node_type, @existing_node_id, @existing_properties_json, @candidate_properties_json,
          @confidence_score, @status, @decision, @target_node_id, @reviewer, @notes, @created_at, @reviewed_at
        )
        `
      )
      .run({
        id: record.id,
        node_type: record.nodeType,
        existing_node_id: record.existingNodeId,
        existing_properties_json: JSON.stringify(record.existingProperties),
        candidate_properties_json: JSON.stringify(record.candidateProperties),
        confidence_score: record.confidenceScore,
        status: record.status,
        decision: record.decision ?? null,
        target_node_id: record.targetNodeId ?? null,
        reviewer: record.reviewer ?? null,
        notes: record.notes ?? null,
        created_at: record.createdAt.toISOString(),
        reviewed_at: record.reviewedAt?.toISOString() ?? null
      });

    const created = this.getById(record.id);
    if (!created) {
      throw new Error(`Review record was not persisted: ${record.id}`);
    }
    return created;
  }

  getById(id: string): ReviewRecord | null {
    const row = this.db
      .prepare<[string], ReviewRow>(
        `
        SELECT ${SELECT_COLUMNS}
        FROM review_records
        WHERE id = ?
        LIMIT 1
        `
      )
      .get(id);

    return row ? this.mapRow(row) : null;
  }

  list(query: ReviewListQuery = {}): ReviewRecord[] {
    const limit = Math.max(1, query.limit ?? 100);
    const offset = Math.max(0, query.offset ?? 0);
    const rows = this.db
      .prepare<[string | null, string | null, number, number], ReviewRow>(
        `
        SELECT ${SELECT_COLUMNS}
        FROM review_records
        WHERE (? IS NULL OR status = ?)
        ORDER BY created_at ASC, id ASC
        LIMIT ? OFFSET ?
        `
      )
      .all(query.status ?? null, query.status ?? null, limit, offset);

    return rows.map((row) => this.mapRow(row));
  }

  count(status?: ReviewStatus): number {
    const row = this.db
      .prepare<[string | null, string | null], { total: number }>(
        `
        SELECT count(*) AS total
        FROM review_records
        WHERE (? IS NULL OR status = ?)
        `
      )
      .get(status ?? null, status ?? null);

    return row?.total ?? 0;
  }

  resolve(id: string, resolution: ReviewResolution, reviewedAt = new Date()): ReviewRecord | null {
    const result = this.db
      .prepare(
        `
        UPDATE review_records
        SET status = @status,
            decision = @decision,
            reviewer = @reviewer,
            target_node_id = @target_node_id,
            notes = @notes,
            reviewed_at = @reviewed_at
        WHERE id = @id AND status = 'pending'
        `
      )
      .run({
        id,
        status: resolution.status,
        decision: resolution.decision,
        reviewer: resolution.reviewer,
        target_node_id: resolution.targetNodeId ?? null,
        notes: resolution.notes ?? null,
        reviewed_at: reviewedAt.toISOString()
      });

    return result.changes > 0 ? this.getById(id) : null;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS review_records (
        id TEXT PRIMARY KEY,
        node_type TEXT NOT NULL,
        existing_node_id TEXT NOT NULL,
        existing_properties_json TEXT NOT NULL,
        candidate_properties_json TEXT NOT NULL,
        confidence_score REAL NOT NULL,
        status TEXT NOT NULL CHECK(status IN ('pending', 'approved', 'rejected')),
        decision TEXT CHECK(decision IS NULL OR decision IN ('approve', 'reject', 'merge')),
        target_node_id TEXT,
        reviewer TEXT,
        notes TEXT,
        created_at TEXT NOT NULL,
        reviewed_at TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_review_records_status
        ON review_records(status, created_at);
    `);
  }

  private mapRow(row: ReviewRow): ReviewRecord {
    const record: ReviewRecord = {
      id: row.id,
      nodeType: row.node_type,
      existingNodeId: row.existing_node_id,
      existingProperties: storedPropertiesSchema.parse(JSON.parse(row.existing_properties_json)),
      candidateProperties: propertyMapSchema.parse(JSON.parse(row.candidate_properties_json)),
      confidenceScore: row.confidence_score,
      status: reviewStatusSchema.parse(row.status),
      createdAt: new Date(row.created_at)
    };

    if (row.decision !== null) {
      record.decision = reviewDecisionSchema.parse(row.decision);
    }
    if (row.target_node_id !== null) {
      record.targetNodeId = row.target_node_id;
    }
    if (row.reviewer !== null) {
      record.reviewer = row.reviewer;
    }
    if (row.notes !== null) {
      record.notes = row.notes;
    }
    if (row.reviewed_at !== null) {
      record.reviewedAt = new Date(row.reviewed_at);
    }
    return record;
  }
}
