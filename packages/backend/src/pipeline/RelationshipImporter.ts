import type {
  CandidateRelationship,
  GraphNode,
  GraphNodeReader,
  GraphRelationshipStore,
  ImportOptions,
  RelationshipImportStats,
  StoredPropertyValue
} from "@graphmerge/shared";
import { chunk, KeyedLock, runWithConcurrency, withTimeout } from "../utils/async.js";
import { componentLogger, type Logger } from "../utils/logger.js";
import { ImportStatsRecorder, type RelationshipImportOutcome } from "./ImportStatsRecorder.js";
import type { PropertyNormalizer } from "./PropertyNormalizer.js";
import { firstNonBlank } from "./propertyAccess.js";

export const DEFAULT_RELATIONSHIP_TYPE = "RELATED_TO";

export interface RelationshipImporterDeps {
  store: GraphNodeReader & GraphRelationshipStore;
  normalizer: PropertyNormalizer;
  fullScanLimit?: number;
  operationTimeoutMs?: number;
  logger?: Logger;
}

export function formatRelationshipType(type: string | undefined): string {
  const formatted = (type ?? "")
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9_]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_|_$/g, "");
  return formatted.length > 0 ? formatted : DEFAULT_RELATIONSHIP_TYPE;
}

function endpointName(value: string | string[] | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  return firstNonBlank(value);
}

function containsText(value: StoredPropertyValue | undefined, needle: string): boolean {
  if (Array.isArray(value)) {
    return value.some((item) => containsText(item, needle));
  }
  if (typeof value === "string") {
    return value.toLowerCase().includes(needle);
  }
  if (typeof value === "number") {
    return String(value).includes(needle);
  }
  return false;
}

export class RelationshipImporter {
  private readonly store: GraphNodeReader & GraphRelationshipStore;
  private readonly normalizer: PropertyNormalizer;
  private readonly fullScanLimit: number;
  private readonly operationTimeoutMs: number;
  private readonly logger: Logger;
  private readonly locks = new KeyedLock();

  constructor(deps: RelationshipImporterDeps) {
    this.store = deps.store;
    this.normalizer = deps.normalizer;
    this.fullScanLimit = Math.max(1, deps.fullScanLimit ?? 5000);
    this.operationTimeoutMs = deps.operationTimeoutMs ?? 30_000;
    this.logger = deps.logger ?? componentLogger("RelationshipImporter");
  }

  async importAll(
    candidates: readonly CandidateRelationship[],
    options: ImportOptions,
    recorder = new ImportStatsRecorder(),
    signal?: AbortSignal
  ): Promise<RelationshipImportStats> {
    for (const batch of chunk(candidates, options.batchSize)) {
      if (signal?.aborted) {
        break;
      }
      await runWithConcurrency(
        batch,
        options.concurrency,
        async (candidate) => {
          recorder.recordRelationship(await this.importRelationship(candidate, options));
        },
        signal
      );
    }
    return recorder.relationships;
  }

  async importRelationship(
    candidate: CandidateRelationship,
    options: Pick<ImportOptions, "dryRun">
  ): Promise<RelationshipImportOutcome> {
    const sourceName = endpointName(candidate.source);
    const targetName = endpointName(candidate.target);
    if (!sourceName || !targetName) {
      this.logger.warn({ source: candidate.source, target: candidate.target }, "Skipping relationship with blank endpoint");
      return { status: "skipped", reason: "blank endpoint" };
    }

    const type = formatRelationshipType(candidate.type);

    try {
      const source = await this.resolveEndpoint(sourceName, candidate.sourceType);
      const target = await this.resolveEndpoint(targetName, candidate.targetType);
      if (!source || !target) {
        this.logger.warn(
          { type, source: sourceName, target: targetName, sourceFound: Boolean(source), targetFound: Boolean(target) },
          "Skipping relationship with unresolved endpoint"
        );
        return { status: "skipped", reason: "endpoint not found" };
      }

      return await this.locks.run(`${source.id}\u0000${type}\u0000${target.id}`, async () => {
        const existing = await withTimeout(
          this.store.findRelationship(source.id, type, target.id),
          this.operationTimeoutMs,
          "Relationship lookup"
        );
        if (existing) {
          return { status: "skipped", relationshipId: existing.id, reason: "already exists" };
        }

        if (options.dryRun) {
          this.logger.debug({ type, sourceId: source.id, targetId: target.id }, "Dry run: would create relationship");
          return { status: "created", reason: "dry run" };
        }

        const created = await withTimeout(
          this.store.createRelationship(
            source.id,
            type,
            target.id,
            this.normalizer.normalizeProperties(candidate.properties ?? {})
          ),
          this.operationTimeoutMs,
          "Relationship create"
        );
        return { status: "created", relationshipId: created.id };
      });
    } catch (error) {
      this.logger.error(
        { type, source: sourceName, target: targetName, err: error instanceof Error ? error.message : String(error) },
        "Failed to import relationship"
      );
      return { status: "error", reason: error instanceof Error ? error.message : String(error) };
    }
  }

  /** Exact name, then store-side substring, then a bounded client-side scan. */
  async resolveEndpoint(name: string, label?: string): Promise<GraphNode | null> {
    const scopedLabel = label?.trim() ? label.trim() : undefined;

    const [exact] = await withTimeout(
      this.store.findNodes({ label: scopedLabel, where: { name }, limit: 1 }),
      this.operationTimeoutMs,
      "Endpoint lookup"
    );
    if (exact) {
      return exact;
    }

    const [partial] = await withTimeout(
      this.store.findNodesByPropertySubstring(name, { label: scopedLabel, limit: 1 }),
      this.operationTimeoutMs,
      "Endpoint substring search"
    );
    if (partial) {
      return partial;
    }

    const needle = name.toLowerCase();
    const scanned = await withTimeout(
      this.store.listNodes(scopedLabel, { limit: this.fullScanLimit }),
      this.operationTimeoutMs,
      "Endpoint scan"
    );
    const hits = scanned
      .filter((node) => Object.values(node.properties).some((value) => containsText(value, needle)))
      .sort((a, b) => Object.keys(a.properties).length - Object.keys(b.properties).length);
    return hits[0] ?? null;
  }
}
