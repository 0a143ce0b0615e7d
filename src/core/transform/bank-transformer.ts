import fs from 'node:fs';
import * as logger from '../../utils/logger';
import { isFile } from '../../utils/fs-utils';
import { CopyFailedError, errorMessage } from '../errors';
import { differs } from '../identity/file-identity';
import { bankDirName, slotsInBank, trackFileName } from '../banks/slot-mapper';
import {
  backupBankDir,
  backupTrackPath,
  deviceSlotDir,
  deviceTrackPath,
  listBackupSlots,
} from '../banks/track-paths';
import { createExportStore, ExportStore } from '../export/export-store';
import {
  BankDecision,
  BankResult,
  ChangeSet,
  SyncConfig,
} from '../../interfaces/banks';

/**
 * Filesystem mutations performed while transforming a bank
 */
export interface FileOperations {
  copyFile(from: string, to: string): void;
  removeFile(filePath: string): void;
  ensureDir(dir: string): void;
  removeDir(dir: string): void;
}

export const nodeFileOperations: FileOperations = {
  copyFile: (from, to) => fs.copyFileSync(from, to),
  removeFile: (filePath) => fs.unlinkSync(filePath),
  ensureDir: (dir) => {
    fs.mkdirSync(dir, { recursive: true });
  },
  removeDir: (dir) => fs.rmSync(dir, { recursive: true, force: true }),
};

export interface BankTransformerDeps {
  fileOps?: FileOperations;
  differs?: typeof differs;
  exportStore?: ExportStore;
}

export function createBankTransformer(
  config: SyncConfig,
  bankIndex: Map<string, number>,
  verbosity: number = logger.Verbosity.Normal,
  deps: BankTransformerDeps = {},
) {
  const fileOps = deps.fileOps ?? nodeFileOperations;
  const compare = deps.differs ?? differs;
  const exportStore = deps.exportStore ?? createExportStore(config, verbosity);

  const emptyResult = (bank: number, decision: BankDecision): BankResult => ({
    bank,
    action: decision.action,
    considered: 0,
    copied: 0,
    skipped: 0,
    deleted: 0,
    errored: 0,
  });

  const copyTrack = (from: string, to: string, result: BankResult): boolean => {
    try {
      fileOps.copyFile(from, to);
      result.copied++;
      return true;
    } catch (err) {
      logger.error(new CopyFailedError(from, to, errorMessage(err)).message);
      result.errored++;
      return false;
    }
  };

  const removeTrack = (filePath: string, result: BankResult): void => {
    try {
      fileOps.removeFile(filePath);
      result.deleted++;
    } catch (err) {
      logger.error(`Failed to delete ${filePath}: ${errorMessage(err)}`);
      result.errored++;
    }
  };

  /**
   * Make the bank's backup match the device. Differences are re-checked
   * here rather than taken from the scan.
   */
  const applyToBackup = async (
    bank: number,
    changeSet: ChangeSet,
    result: BankResult,
  ): Promise<void> => {
    const bankDir = backupBankDir(config, bank);
    const bankName = bankDirName(bank);
    // New tracks only: existing backups are left out of the counts
    const additionsOnly =
      changeSet.added.length > 0 &&
      changeSet.modified.length === 0 &&
      changeSet.deleted.length === 0;

    for (const slotName of slotsInBank(bankIndex, bank)) {
      const deviceFile = deviceTrackPath(config, slotName);
      if (!isFile(deviceFile)) {
        continue;
      }

      const backupFile = backupTrackPath(config, bank, slotName);
      if (additionsOnly && isFile(backupFile)) {
        continue;
      }
      result.considered++;

      let needsCopy: boolean;
      try {
        needsCopy = await compare(deviceFile, backupFile);
      } catch (err) {
        logger.error(
          `Failed to compare ${trackFileName(slotName)}: ${errorMessage(err)}`,
        );
        result.errored++;
        continue;
      }

      if (!needsCopy) {
        result.skipped++;
        continue;
      }

      logger.info(`Copying: ${trackFileName(slotName)} to ${bankName}`, verbosity);
      try {
        fileOps.ensureDir(bankDir);
      } catch (err) {
        logger.error(`Failed to create ${bankDir}: ${errorMessage(err)}`);
        result.errored++;
        continue;
      }
      copyTrack(deviceFile, backupFile, result);
    }

    if (changeSet.deleted.length === 0) {
      return;
    }

    for (const slotName of listBackupSlots(config, bank)) {
      if (isFile(deviceTrackPath(config, slotName))) {
        continue;
      }
      logger.info(`Deleting: ${trackFileName(slotName)} from ${bankName}`, verbosity);
      removeTrack(backupTrackPath(config, bank, slotName), result);
    }
  };

  const exportThenApply = async (
    bank: number,
    changeSet: ChangeSet,
    decision: BankDecision,
    result: BankResult,
  ): Promise<void> => {
    const bankDir = backupBankDir(config, bank);
    const bankName = bankDirName(bank);

    try {
      const snapshot = exportStore.createSnapshot(bank, decision.exportName);
      if (snapshot) {
        result.exportName = snapshot.name;
        logger.success(
          `Exported ${snapshot.files.length} files from ${bankName} to ${snapshot.path}`,
          verbosity,
        );
      }
    } catch (err) {
      logger.error(
        `Export of ${bankName} failed, leaving it untouched: ${errorMessage(err)}`,
      );
      result.errored++;
      return;
    }

    try {
      fileOps.removeDir(bankDir);
      fileOps.ensureDir(bankDir);
    } catch (err) {
      logger.error(`Failed to reset ${bankDir}: ${errorMessage(err)}`);
      result.errored++;
      return;
    }

    await applyToBackup(bank, changeSet, result);
  };

  /**
   * Make the device match the bank's backup
   */
  const revertDevice = (bank: number, result: BankResult): void => {
    const backupSlots = listBackupSlots(config, bank);

    for (const slotName of backupSlots) {
      result.considered++;
      logger.info(`Reverting: ${trackFileName(slotName)} to device`, verbosity);
      try {
        fileOps.ensureDir(deviceSlotDir(config, slotName));
      } catch (err) {
        logger.error(
          `Failed to create ${deviceSlotDir(config, slotName)}: ${errorMessage(err)}`,
        );
        result.errored++;
        continue;
      }
      copyTrack(
        backupTrackPath(config, bank, slotName),
        deviceTrackPath(config, slotName),
        result,
      );
    }

    const keep = new Set(backupSlots);
    for (const slotName of slotsInBank(bankIndex, bank)) {
      const deviceFile = deviceTrackPath(config, slotName);
      if (keep.has(slotName) || !isFile(deviceFile)) {
        continue;
      }
      logger.info(`Deleting: ${trackFileName(slotName)} from device`, verbosity);
      removeTrack(deviceFile, result);
    }
  };

  const applyBank = async (
    bank: number,
    changeSet: ChangeSet,
    decision: BankDecision,
  ): Promise<BankResult> => {
    const result = emptyResult(bank, decision);

    switch (decision.action) {
      case 'apply':
        await applyToBackup(bank, changeSet, result);
        break;
      case 'export':
        await exportThenApply(bank, changeSet, decision, result);
        break;
      case 'revert':
        revertDevice(bank, result);
        break;
      case 'skip':
      case 'none':
        break;
    }

    return result;
  };

  return { applyBank };
}

export type BankTransformer = ReturnType<typeof createBankTransformer>;
