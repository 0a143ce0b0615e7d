/**
 * SyncReport
 * Run-level counters rolled up from each bank's result
 */

import chalk from 'chalk';
import * as logger from '../../utils/logger';
import { BankResult, SyncTotals } from '../../interfaces/banks';

export class SyncReport {
  verbosity: number;
  results: BankResult[];
  totals: SyncTotals;

  constructor(verbosity: number = logger.Verbosity.Normal) {
    this.verbosity = verbosity;
    this.results = [];
    this.totals = { total: 0, copied: 0, skipped: 0, deleted: 0, errored: 0 };
  }

  /**
   * Add one bank's counters to the run totals
   */
  record(result: BankResult) {
    this.results.push(result);
    this.totals.total += result.considered;
    this.totals.copied += result.copied;
    this.totals.skipped += result.skipped;
    this.totals.deleted += result.deleted;
    this.totals.errored += result.errored;
  }

  /**
   * Count a bank that failed outside per-file handling
   */
  recordFailure() {
    this.totals.errored++;
  }

  hasErrors() {
    return this.totals.errored > 0;
  }

  exports(): string[] {
    return this.results
      .map((result) => result.exportName)
      .filter((name): name is string => name !== undefined);
  }

  displaySummary() {
    logger.success('Synchronization complete!', this.verbosity);
    logger.info(`Total files: ${this.totals.total}`, this.verbosity);
    logger.info(`Files copied: ${this.totals.copied}`, this.verbosity);
    logger.info(
      `Files skipped (not modified): ${this.totals.skipped}`,
      this.verbosity,
    );
    logger.info(`Files deleted: ${this.totals.deleted}`, this.verbosity);

    for (const name of this.exports()) {
      logger.info(`Export created: ${name}`, this.verbosity);
    }

    if (this.hasErrors()) {
      logger.warning(`Files with errors: ${this.totals.errored}`, this.verbosity);
      logger.always(
        chalk.yellow(
          `Sync finished with issues: ${this.totals.errored} file operations failed.`,
        ),
      );
    }
  }
}
