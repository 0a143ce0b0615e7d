import fs from 'node:fs';
import path from 'node:path';
import * as logger from '../../utils/logger';
import { listDirectories, listFiles } from '../../utils/fs-utils';
import {
  ExportNotFoundError,
  InvalidExportNameError,
  MalformedSlotNameError,
} from '../errors';
import {
  TRACK_EXTENSION,
  bankDirName,
  bankOf,
  slotNameFromTrack,
} from '../banks/slot-mapper';
import { backupBankDir, exportsRoot } from '../banks/track-paths';
import { ExportSnapshot, SyncConfig } from '../../interfaces/banks';

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `YYYY-MM-DD_HH-MM-SS_bank_<N>` in local time
 */
export function defaultSnapshotName(bank: number, date: Date = new Date()): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${day}_${time}_${bankDirName(bank)}`;
}

export function isValidExportName(name: string): boolean {
  return (
    name.length > 0 &&
    !name.startsWith('.') &&
    !name.includes('/') &&
    !name.includes('\\')
  );
}

/**
 * Bank of a snapshot, taken from its first track file
 */
export function snapshotBank(files: string[]): number | null {
  const first = files[0];
  if (first === undefined) {
    return null;
  }
  const slotName = slotNameFromTrack(first);
  if (!slotName) {
    return null;
  }
  try {
    return bankOf(slotName);
  } catch (err) {
    if (err instanceof MalformedSlotNameError) {
      return null;
    }
    throw err;
  }
}

export function createExportStore(
  config: SyncConfig,
  verbosity: number = logger.Verbosity.Normal,
) {
  const root = exportsRoot(config);

  const readSnapshot = (name: string): ExportSnapshot => {
    const snapshotPath = path.join(root, name);
    const files = listFiles(snapshotPath, TRACK_EXTENSION);
    return { name, bank: snapshotBank(files), path: snapshotPath, files };
  };

  // Never reuse an existing snapshot directory
  const uniqueName = (name: string): string => {
    let candidate = name;
    let suffix = 2;
    while (fs.existsSync(path.join(root, candidate))) {
      candidate = `${name}_${suffix}`;
      suffix++;
    }
    return candidate;
  };

  /**
   * Copy the bank's backup directory into a fresh snapshot. Resolves to null
   * when the bank has nothing to export.
   */
  const createSnapshot = (
    bank: number,
    name: string = defaultSnapshotName(bank),
  ): ExportSnapshot | null => {
    if (!isValidExportName(name)) {
      throw new InvalidExportNameError(name);
    }

    const bankDir = backupBankDir(config, bank);
    if (listFiles(bankDir, TRACK_EXTENSION).length === 0) {
      logger.warning(`No files to export for ${bankDirName(bank)}`, verbosity);
      return null;
    }

    fs.mkdirSync(root, { recursive: true });
    const finalName = uniqueName(name);
    const snapshotPath = path.join(root, finalName);
    fs.cpSync(bankDir, snapshotPath, { recursive: true, errorOnExist: true });

    const files = listFiles(snapshotPath, TRACK_EXTENSION);
    logger.verbose(
      `Exported ${files.length} track files from ${bankDirName(bank)} to ${snapshotPath}`,
      verbosity,
    );
    return { name: finalName, bank, path: snapshotPath, files };
  };

  const resolveSnapshot = (name: string): ExportSnapshot => {
    if (!isValidExportName(name)) {
      throw new InvalidExportNameError(name);
    }

    const snapshot = readSnapshot(name);
    if (snapshot.files.length === 0) {
      throw new ExportNotFoundError(name, snapshot.path);
    }
    return snapshot;
  };

  const listSnapshots = (): ExportSnapshot[] =>
    listDirectories(root).map((name) => readSnapshot(name));

  return { root, createSnapshot, resolveSnapshot, listSnapshots };
}

export type ExportStore = ReturnType<typeof createExportStore>;
