/**
 * Bank, slot and sync result interfaces
 */

/**
 * Paths every core operation works against
 */
export interface SyncConfig {
  deviceRoot: string;
  backupRoot: string;
}

/**
 * One recording location on the device, encoded as `NNN_K`
 */
export interface Slot {
  name: string;
  slotNumber: number;
  alternateIndex: number;
  bank: number;
}

/**
 * Classification of a bank's track files at scan time
 */
export interface ChangeSet {
  bank: number;
  added: string[];
  modified: string[];
  deleted: string[];
  unchanged: string[];
  hasChanges: boolean;
}

/**
 * Device slot listing taken once per run
 */
export interface DeviceIndex {
  hasData: boolean;
  slots: string[];
  bankIndex: Map<string, number>;
}

export interface ScanResult extends DeviceIndex {
  banks: Map<number, ChangeSet>;
}

export type BankAction = 'apply' | 'export' | 'revert' | 'skip' | 'none';

export interface BankDecision {
  action: BankAction;
  exportName?: string;
}

export interface BankResult {
  bank: number;
  action: BankAction;
  considered: number;
  copied: number;
  skipped: number;
  deleted: number;
  errored: number;
  exportName?: string;
}

export interface SyncTotals {
  total: number;
  copied: number;
  skipped: number;
  deleted: number;
  errored: number;
}

export interface ExportSnapshot {
  name: string;
  bank: number | null;
  path: string;
  files: string[];
}

export interface RestoreResult {
  exportName: string;
  bank: number;
  restored: number;
  errored: number;
}
