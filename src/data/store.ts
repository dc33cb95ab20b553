import { createTransactionSet, type TransactionSet } from "../analysis/records.js";
import type { Logger } from "../logger.js";

/**
 * Owns the current dataset snapshot.
 *
 * A reload builds the new TransactionSet completely before swapping the
 * reference, so a computation that already holds a snapshot keeps seeing
 * that one snapshot until it finishes.
 */
export class DatasetStore {
  private snapshot: TransactionSet;
  private reloading: Promise<TransactionSet> | null = null;

  constructor(
    private readonly load: () => Promise<TransactionSet>,
    private readonly logger: Logger,
    initial: TransactionSet = createTransactionSet([]),
  ) {
    this.snapshot = initial;
  }

  current(): TransactionSet {
    return this.snapshot;
  }

  replace(next: TransactionSet): void {
    this.snapshot = next;
    this.logger.info("Dataset snapshot published", {
      records: next.records.length,
      rejected: next.rejected.length,
      loadedAt: next.loadedAt,
    });
    if (next.rejected.length > 0) {
      this.logger.warn("Malformed records excluded from analytics", {
        count: next.rejected.length,
        sample: next.rejected.slice(0, 5),
      });
    }
  }

  /**
   * Load a fresh snapshot and publish it. Concurrent calls share one load;
   * a failed load leaves the current snapshot in place.
   */
  async reload(): Promise<TransactionSet> {
    if (this.reloading) return this.reloading;

    this.reloading = this.load();
    try {
      const next = await this.reloading;
      this.replace(next);
      return next;
    } finally {
      this.reloading = null;
    }
  }
}
