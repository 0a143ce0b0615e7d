import path from 'node:path';
import { SyncConfig } from '../../interfaces/banks';
import { listFiles } from '../../utils/fs-utils';
import { errorMessage } from '../errors';
import {
  TRACK_EXTENSION,
  bankDirName,
  bankOf,
  slotNameFromTrack,
  trackFileName,
} from './slot-mapper';

export const EXPORTS_DIR_NAME = 'exports';

export function deviceSlotDir(config: SyncConfig, slotName: string): string {
  return path.join(config.deviceRoot, slotName);
}

export function deviceTrackPath(config: SyncConfig, slotName: string): string {
  return path.join(config.deviceRoot, slotName, trackFileName(slotName));
}

export function backupBankDir(config: SyncConfig, bank: number): string {
  return path.join(config.backupRoot, bankDirName(bank));
}

export function backupTrackPath(
  config: SyncConfig,
  bank: number,
  slotName: string,
): string {
  return path.join(config.backupRoot, bankDirName(bank), trackFileName(slotName));
}

export function exportsRoot(config: SyncConfig): string {
  return path.join(config.backupRoot, EXPORTS_DIR_NAME);
}

/**
 * Slot names of the track files stored in a bank's backup directory.
 * Files that are not tracks of this bank are reported through `onSkip`.
 */
export function listBackupSlots(
  config: SyncConfig,
  bank: number,
  onSkip?: (fileName: string, reason: string) => void,
): string[] {
  const slots: string[] = [];

  for (const fileName of listFiles(backupBankDir(config, bank), TRACK_EXTENSION)) {
    const slotName = slotNameFromTrack(fileName);
    if (!slotName) {
      continue;
    }

    let slotBank: number;
    try {
      slotBank = bankOf(slotName);
    } catch (err) {
      onSkip?.(fileName, errorMessage(err));
      continue;
    }

    if (slotBank !== bank) {
      onSkip?.(fileName, `belongs to ${bankDirName(slotBank)}`);
      continue;
    }
    slots.push(slotName);
  }

  return slots;
}
