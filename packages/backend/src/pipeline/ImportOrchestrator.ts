import type {
  CandidateNode,
  CandidateRelationship,
  ImportOptions,
  ImportStatistics
} from "@graphmerge/shared";
import type { ReviewQueue } from "../services/ReviewQueue.js";
import { componentLogger, type Logger } from "../utils/logger.js";
import { formatDuration, ImportStatsRecorder } from "./ImportStatsRecorder.js";
import type { NodeImporter } from "./NodeImporter.js";
import type { RelationshipImporter } from "./RelationshipImporter.js";

export interface ImportInput {
  entities: readonly CandidateNode[];
  relationships?: readonly CandidateRelationship[];
}

export interface ImportOrchestratorDeps {
  nodeImporter: NodeImporter;
  relationshipImporter: RelationshipImporter;
  /** Rejects when the graph store cannot be reached. */
  ensureConnected: () => Promise<void>;
  reviewQueue?: ReviewQueue | null;
  defaults: ImportOptions;
  logger?: Logger;
  now?: () => Date;
}

export function summarizeImport(stats: Omit<ImportStatistics, "summary" | "startedAt" | "finishedAt">): string {
  const { nodes, relationships } = stats;
  const parts = [
    `Imported ${nodes.total} nodes (created ${nodes.created}, updated ${nodes.updated}, skipped ${nodes.skipped}, errors ${nodes.errors}, duplicates ${nodes.duplicates})`,
    `${relationships.total} relationships (created ${relationships.created}, skipped ${relationships.skipped}, errors ${relationships.errors})`
  ];
  let summary = `${parts.join(" and ")} in ${formatDuration(stats.durationMs)}`;
  if (stats.reviewsQueued > 0) {
    summary += `; ${stats.reviewsQueued} queued for review`;
  }
  if (stats.cancelled) {
    summary += "; cancelled";
  }
  return summary;
}

export class ImportOrchestrator {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(private readonly deps: ImportOrchestratorDeps) {
    this.logger = deps.logger ?? componentLogger("ImportOrchestrator");
    this.now = deps.now ?? (() => new Date());
  }

  get defaults(): ImportOptions {
    return { ...this.deps.defaults };
  }

  async import(
    input: ImportInput,
    overrides: Partial<ImportOptions> = {},
    signal?: AbortSignal
  ): Promise<ImportStatistics> {
    const options: ImportOptions = { ...this.deps.defaults, ...stripUndefined(overrides) };
    const startedAt = this.now();

    await this.deps.ensureConnected();

    const recorder = new ImportStatsRecorder();
    const relationships = input.relationships ?? [];

    this.logger.info(
      { entities: input.entities.length, relationships: relationships.length, dryRun: options.dryRun },
      "Import started"
    );

    await this.deps.nodeImporter.importAll(input.entities, options, recorder, signal);
    if (!signal?.aborted) {
      await this.deps.relationshipImporter.importAll(relationships, options, recorder, signal);
    }
    await this.deps.reviewQueue?.flush();

    const finishedAt = this.now();
    const base = {
      nodes: recorder.nodes,
      relationships: recorder.relationships,
      reviewsQueued: recorder.reviewsQueued,
      cancelled: signal?.aborted ?? false,
      durationMs: Math.max(0, finishedAt.getTime() - startedAt.getTime())
    };
    const statistics: ImportStatistics = {
      ...base,
      startedAt,
      finishedAt,
      summary: summarizeImport(base)
    };

    this.logger.info(
      { nodes: statistics.nodes, relationships: statistics.relationships, cancelled: statistics.cancelled },
      statistics.summary
    );
    return statistics;
  }
}

function stripUndefined(options: Partial<ImportOptions>): Partial<ImportOptions> {
  const result: Partial<ImportOptions> = {};
  if (options.dryRun !== undefined) result.dryRun = options.dryRun;
  if (options.enableVectorSearch !== undefined) result.enableVectorSearch = options.enableVectorSearch;
  if (options.similarityThreshold !== undefined) result.similarityThreshold = options.similarityThreshold;
  if (options.enableHumanReview !== undefined) result.enableHumanReview = options.enableHumanReview;
  if (options.batchSize !== undefined) result.batchSize = Math.max(1, options.batchSize);
  if (options.concurrency !== undefined) result.concurrency = Math.max(1, options.concurrency);
  if (options.dryRunCountsAs !== undefined) result.dryRunCountsAs = options.dryRunCountsAs;
  return result;
}
