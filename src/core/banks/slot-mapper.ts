import { MalformedSlotNameError } from '../errors';
import { Slot } from '../../interfaces/banks';

export const SLOTS_PER_BANK = 8;
export const BANK_NUMBERS: readonly number[] = [1, 2, 3, 4, 5, 6, 7, 8];
export const TRACK_EXTENSION = '.WAV';

const SLOT_NAME_PATTERN = /^(\d+)_(\d+)$/;
const DEVICE_SLOT_PATTERN = /^\d{3}_[12]$/;

export function bankDirName(bank: number): string {
  return `bank_${bank}`;
}

export function trackFileName(slotName: string): string {
  return `${slotName}${TRACK_EXTENSION}`;
}

/**
 * Slot name of a track file, or null when the file is not a track
 */
export function slotNameFromTrack(fileName: string): string | null {
  if (!fileName.endsWith(TRACK_EXTENSION)) {
    return null;
  }
  const stem = fileName.slice(0, -TRACK_EXTENSION.length);
  return stem.length > 0 ? stem : null;
}

/**
 * Entries the device exposes for each slot: `NNN_K` with K in {1, 2}
 */
export function isDeviceSlotName(name: string): boolean {
  return DEVICE_SLOT_PATTERN.test(name);
}

export function parseSlotName(name: string): Slot {
  const match = SLOT_NAME_PATTERN.exec(name);
  if (!match) {
    throw new MalformedSlotNameError(name);
  }

  const slotNumber = Number.parseInt(match[1], 10);
  const alternateIndex = Number.parseInt(match[2], 10);
  if (slotNumber < 1) {
    throw new MalformedSlotNameError(name, 'slot numbers start at 1');
  }

  const bank = Math.floor((slotNumber - 1) / SLOTS_PER_BANK) + 1;
  if (bank > BANK_NUMBERS.length) {
    throw new MalformedSlotNameError(
      name,
      `slot ${slotNumber} is outside banks 1-${BANK_NUMBERS.length}`,
    );
  }

  return { name, slotNumber, alternateIndex, bank };
}

export function bankOf(slotName: string): number {
  return parseSlotName(slotName).bank;
}

export interface BankIndex {
  index: Map<string, number>;
  skipped: string[];
}

/**
 * Map each slot name to its bank once; names that do not parse are
 * collected instead of thrown
 */
export function createBankIndex(slotNames: Iterable<string>): BankIndex {
  const index = new Map<string, number>();
  const skipped: string[] = [];

  for (const name of slotNames) {
    try {
      index.set(name, bankOf(name));
    } catch (err) {
      if (err instanceof MalformedSlotNameError) {
        skipped.push(name);
        continue;
      }
      throw err;
    }
  }

  return { index, skipped };
}

export function slotsInBank(index: Map<string, number>, bank: number): string[] {
  const slots: string[] = [];
  for (const [name, slotBank] of index) {
    if (slotBank === bank) {
      slots.push(name);
    }
  }
  return slots.sort();
}
