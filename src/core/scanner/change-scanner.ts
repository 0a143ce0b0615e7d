import * as logger from '../../utils/logger';
import { isFile, listDirectories } from '../../utils/fs-utils';
import { differs } from '../identity/file-identity';
import {
  BANK_NUMBERS,
  bankDirName,
  createBankIndex,
  isDeviceSlotName,
  slotsInBank,
} from '../banks/slot-mapper';
import {
  backupTrackPath,
  deviceTrackPath,
  listBackupSlots,
} from '../banks/track-paths';
import {
  ChangeSet,
  DeviceIndex,
  ScanResult,
  SyncConfig,
} from '../../interfaces/banks';

export interface ChangeScannerDeps {
  differs?: typeof differs;
}

export function createChangeSet(
  bank: number,
  sets: Partial<Omit<ChangeSet, 'bank' | 'hasChanges'>> = {},
): ChangeSet {
  const added = [...(sets.added ?? [])].sort();
  const modified = [...(sets.modified ?? [])].sort();
  const deleted = [...(sets.deleted ?? [])].sort();
  const unchanged = [...(sets.unchanged ?? [])].sort();

  return {
    bank,
    added,
    modified,
    deleted,
    unchanged,
    hasChanges: added.length + modified.length + deleted.length > 0,
  };
}

export function createChangeScanner(
  config: SyncConfig,
  verbosity: number = logger.Verbosity.Normal,
  deps: ChangeScannerDeps = {},
) {
  const compare = deps.differs ?? differs;
  let cachedSlots: string[] | null = null;

  /**
   * Slot-like entries on the device, read once per scanner
   */
  const listDeviceSlots = (): string[] => {
    if (cachedSlots === null) {
      cachedSlots = listDirectories(config.deviceRoot).filter(isDeviceSlotName);
      logger.verbose(
        `Found ${cachedSlots.length} track directories in ${config.deviceRoot}`,
        verbosity,
      );
    }
    return cachedSlots;
  };

  const scanBank = async (
    bank: number,
    bankIndex: Map<string, number>,
  ): Promise<ChangeSet> => {
    const added: string[] = [];
    const modified: string[] = [];
    const deleted: string[] = [];
    const unchanged: string[] = [];

    const backupSlots = listBackupSlots(config, bank, (fileName, reason) => {
      logger.verbose(
        `Ignoring ${bankDirName(bank)}/${fileName}: ${reason}`,
        verbosity,
      );
    });

    for (const slotName of backupSlots) {
      if (!isFile(deviceTrackPath(config, slotName))) {
        deleted.push(slotName);
      }
    }

    for (const slotName of slotsInBank(bankIndex, bank)) {
      const deviceFile = deviceTrackPath(config, slotName);
      if (!isFile(deviceFile)) {
        continue;
      }

      const backupFile = backupTrackPath(config, bank, slotName);
      if (!isFile(backupFile)) {
        added.push(slotName);
      } else if (await compare(deviceFile, backupFile)) {
        modified.push(slotName);
      } else {
        unchanged.push(slotName);
      }
    }

    const changeSet = createChangeSet(bank, {
      added,
      modified,
      deleted,
      unchanged,
    });

    if (changeSet.hasChanges) {
      logger.verbose(
        `${bankDirName(bank)}: ${added.length} new, ${modified.length} modified, ${deleted.length} deleted`,
        verbosity,
      );
    }

    return changeSet;
  };

  /**
   * Precompute the slot to bank mapping for the whole run
   */
  const indexDevice = (): DeviceIndex => {
    const slots = listDeviceSlots();
    const { index, skipped } = createBankIndex(slots);
    for (const name of skipped) {
      logger.verbose(
        `Skipping track directory outside banks 1-8: ${name}`,
        verbosity,
      );
    }
    return { hasData: slots.length > 0, slots, bankIndex: index };
  };

  const scan = async (): Promise<ScanResult> => {
    const device = indexDevice();
    const banks = new Map<number, ChangeSet>();

    if (!device.hasData) {
      return { ...device, banks };
    }

    for (const bank of BANK_NUMBERS) {
      banks.set(bank, await scanBank(bank, device.bankIndex));
    }

    return { ...device, banks };
  };

  return { scan, scanBank, indexDevice, listDeviceSlots };
}

export type ChangeScanner = ReturnType<typeof createChangeScanner>;
