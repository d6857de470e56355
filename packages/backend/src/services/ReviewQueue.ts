import type { ReviewRecord } from "@graphmerge/shared";
import { componentLogger, type Logger } from "../utils/logger.js";
import type { ReviewStoreLike } from "./reviewTypes.js";

/**
 * Persists pending reviews off the resolution path. `enqueue` returns at
 * once; `flush` waits for every write started so far.
 */
export class ReviewQueue {
  private readonly inFlight = new Set<Promise<void>>();
  private persisted = 0;
  private failed = 0;
  private readonly logger: Logger;

  constructor(
    private readonly store: ReviewStoreLike,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? componentLogger("ReviewQueue");
  }

  enqueue(record: ReviewRecord): void {
    const write = new Promise<void>((resolve) => {
      setImmediate(resolve);
    })
      .then(() => {
        this.store.create(record);
        this.persisted += 1;
        this.logger.info(
          { reviewId: record.id, nodeType: record.nodeType, existingNodeId: record.existingNodeId },
          "Queued match for human review"
        );
      })
      .catch((error: unknown) => {
        this.failed += 1;
        this.logger.error(
          { reviewId: record.id, err: error instanceof Error ? error.message : String(error) },
          "Failed to persist review record"
        );
      })
      .finally(() => {
        this.inFlight.delete(write);
      });

    this.inFlight.add(write);
  }

  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  get stats(): { persisted: number; failed: number; pending: number } {
    return { persisted: this.persisted, failed: this.failed, pending: this.inFlight.size };
  }
}
