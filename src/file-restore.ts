import path from 'node:path';
import * as logger from './utils/logger';
import { isDirectory } from './utils/fs-utils';
import { logFilePath, resolveVerbosity } from './utils/env-utils';
import { acquireLock, releaseLock } from './utils/lock';
import {
  AmbiguousBankError,
  RestoreCancelledError,
  errorMessage,
} from './core/errors';
import { ensureDeviceConnected } from './core/preflight';
import { bankDirName, slotNameFromTrack } from './core/banks/slot-mapper';
import {
  backupBankDir,
  deviceSlotDir,
  deviceTrackPath,
} from './core/banks/track-paths';
import { createExportStore } from './core/export/export-store';
import {
  createConsoleDecisionSource,
  DecisionSource,
} from './core/actions/decision-source';
import {
  FileOperations,
  nodeFileOperations,
} from './core/transform/bank-transformer';
import { RestoreResult, SyncConfig } from './interfaces/banks';

export interface RestoreOptions {
  quiet?: boolean;
  verbose?: boolean;
}

export interface RestoreDependencies {
  createExportStore?: typeof createExportStore;
  decisionSource?: DecisionSource;
  fileOps?: FileOperations;
  acquireLock?: typeof acquireLock;
  releaseLock?: typeof releaseLock;
}

/**
 * Copy every track of an export snapshot back onto the device
 */
export async function restoreExport(
  config: SyncConfig,
  exportName: string,
  options: RestoreOptions = {},
  dependencies: RestoreDependencies = {},
): Promise<RestoreResult> {
  const lock = dependencies.acquireLock ?? acquireLock;
  const unlock = dependencies.releaseLock ?? releaseLock;
  const makeExportStore = dependencies.createExportStore ?? createExportStore;
  const fileOps = dependencies.fileOps ?? nodeFileOperations;
  const verbosity = resolveVerbosity(options);

  const snapshot = makeExportStore(config, verbosity).resolveSnapshot(exportName);

  // The snapshot lives under the backup root, so it exists from here on
  logger.attachLogFile(logFilePath(config));
  try {
    lock(config.backupRoot);
  } catch (error) {
    logger.detachLogFile();
    throw error;
  }

  const decisionSource =
    dependencies.decisionSource ?? createConsoleDecisionSource();

  try {
    logger.info(
      `Restoring export "${snapshot.name}" (${snapshot.files.length} files)`,
      verbosity,
    );

    const bank = snapshot.bank;
    if (bank === null) {
      throw new AmbiguousBankError(snapshot.name, snapshot.files[0] ?? '');
    }

    ensureDeviceConnected(config, verbosity);

    if (!isDirectory(backupBankDir(config, bank))) {
      logger.warning(
        `${bankDirName(bank)} has never been synced to ${config.backupRoot}`,
        verbosity,
      );
      const answer = await decisionSource.ask(
        `Restore "${snapshot.name}" onto the device anyway? Type "yes" to confirm: `,
      );
      if (answer === null || answer.trim().toLowerCase() !== 'yes') {
        throw new RestoreCancelledError(snapshot.name);
      }
    }

    const result: RestoreResult = {
      exportName: snapshot.name,
      bank,
      restored: 0,
      errored: 0,
    };

    for (const fileName of snapshot.files) {
      const slotName = slotNameFromTrack(fileName);
      if (!slotName) {
        continue;
      }

      logger.info(`Restoring: ${fileName} to device`, verbosity);
      try {
        fileOps.ensureDir(deviceSlotDir(config, slotName));
        fileOps.copyFile(
          path.join(snapshot.path, fileName),
          deviceTrackPath(config, slotName),
        );
        result.restored++;
      } catch (error) {
        logger.error(`Failed to restore ${fileName}: ${errorMessage(error)}`);
        result.errored++;
      }
    }

    if (result.errored > 0) {
      logger.warning(
        `Restore finished with issues: ${result.restored} restored, ${result.errored} failed`,
        verbosity,
      );
    } else {
      logger.success(
        `Restored ${result.restored} files from "${snapshot.name}" to ${bankDirName(bank)}`,
        verbosity,
      );
    }

    return result;
  } finally {
    decisionSource.close();
    unlock();
    logger.detachLogFile();
  }
}
