import * as logger from './utils/logger';
import { resolveVerbosity } from './utils/env-utils';
import { acquireLock, releaseLock } from './utils/lock';
import { errorMessage } from './core/errors';
import { ensureDeviceConnected, prepareBackupRoot } from './core/preflight';
import { BANK_NUMBERS, bankDirName } from './core/banks/slot-mapper';
import { createChangeScanner } from './core/scanner/change-scanner';
import { createActionResolver } from './core/actions/action-resolver';
import {
  createConsoleDecisionSource,
  DecisionSource,
} from './core/actions/decision-source';
import { createBankTransformer } from './core/transform/bank-transformer';
import { createExportStore } from './core/export/export-store';
import { SyncReport } from './core/report/sync-report';
import { SyncConfig } from './interfaces/banks';

export interface SyncOptions {
  quiet?: boolean;
  verbose?: boolean;
}

export interface SyncDependencies {
  createChangeScanner?: typeof createChangeScanner;
  createActionResolver?: typeof createActionResolver;
  createBankTransformer?: typeof createBankTransformer;
  createExportStore?: typeof createExportStore;
  decisionSource?: DecisionSource;
  acquireLock?: typeof acquireLock;
  releaseLock?: typeof releaseLock;
}

export interface SyncOutcome {
  /** False when the device exposed no track directories */
  hasData: boolean;
  report: SyncReport;
}

export async function syncBanks(
  config: SyncConfig,
  options: SyncOptions = {},
  dependencies: SyncDependencies = {},
): Promise<SyncOutcome> {
  const lock = dependencies.acquireLock ?? acquireLock;
  const unlock = dependencies.releaseLock ?? releaseLock;
  const makeChangeScanner =
    dependencies.createChangeScanner ?? createChangeScanner;
  const makeActionResolver =
    dependencies.createActionResolver ?? createActionResolver;
  const makeBankTransformer =
    dependencies.createBankTransformer ?? createBankTransformer;
  const makeExportStore = dependencies.createExportStore ?? createExportStore;

  const verbosity = resolveVerbosity(options);

  try {
    ensureDeviceConnected(config, verbosity);
    prepareBackupRoot(config, verbosity);
    lock(config.backupRoot);
  } catch (error) {
    logger.detachLogFile();
    throw error;
  }

  const decisionSource =
    dependencies.decisionSource ?? createConsoleDecisionSource();

  try {
    logger.info('Starting synchronization of WAV files...', verbosity);

    const report = new SyncReport(verbosity);
    const scanner = makeChangeScanner(config, verbosity);
    const device = scanner.indexDevice();

    if (!device.hasData) {
      logger.warning(
        `No track directories found in ${config.deviceRoot}`,
        verbosity,
      );
      return { hasData: false, report };
    }

    const resolver = makeActionResolver(decisionSource, verbosity);
    const transformer = makeBankTransformer(config, device.bankIndex, verbosity, {
      exportStore: makeExportStore(config, verbosity),
    });

    for (const bank of BANK_NUMBERS) {
      try {
        const changeSet = await scanner.scanBank(bank, device.bankIndex);
        const decision = await resolver.resolve(bank, changeSet);
        if (decision.action === 'none') {
          continue;
        }
        report.record(await transformer.applyBank(bank, changeSet, decision));
      } catch (error) {
        logger.error(`Failed to process ${bankDirName(bank)}: ${errorMessage(error)}`);
        report.recordFailure();
      }
    }

    report.displaySummary();
    return { hasData: true, report };
  } finally {
    decisionSource.close();
    unlock();
    logger.detachLogFile();
  }
}
