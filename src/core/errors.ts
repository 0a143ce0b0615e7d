/**
 * Error types raised by the sync and restore flows
 */

/**
 * Base error class for all sync errors
 */
export class SyncError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SyncError';
    this.code = code;
    this.details = details;
  }
}

export class DeviceNotConnectedError extends SyncError {
  constructor(deviceRoot: string) {
    super(`Device not found at ${deviceRoot}`, 'DEVICE_NOT_CONNECTED', {
      deviceRoot,
    });
    this.name = 'DeviceNotConnectedError';
  }
}

export class MissingBackupDirError extends SyncError {
  constructor() {
    super(
      'Please select a backup destination with --dir (or set RC_BACKUP_DIR)',
      'MISSING_BACKUP_DIR',
    );
    this.name = 'MissingBackupDirError';
  }
}

export class BackupDirUnwritableError extends SyncError {
  constructor(backupRoot: string, reason: string) {
    super(
      `Backup directory ${backupRoot} is not usable: ${reason}`,
      'BACKUP_DIR_UNWRITABLE',
      { backupRoot, reason },
    );
    this.name = 'BackupDirUnwritableError';
  }
}

export class MalformedSlotNameError extends SyncError {
  constructor(slotName: string, reason: string = 'expected NNN_K') {
    super(`Malformed slot name "${slotName}": ${reason}`, 'MALFORMED_SLOT_NAME', {
      slotName,
    });
    this.name = 'MalformedSlotNameError';
  }
}

export class CopyFailedError extends SyncError {
  constructor(from: string, to: string, reason: string) {
    super(`Failed to copy ${from} to ${to}: ${reason}`, 'COPY_FAILED', {
      from,
      to,
      reason,
    });
    this.name = 'CopyFailedError';
  }
}

export class ExportNotFoundError extends SyncError {
  constructor(exportName: string, exportPath: string) {
    super(
      `Export "${exportName}" not found or contains no track files (${exportPath})`,
      'EXPORT_NOT_FOUND',
      { exportName, exportPath },
    );
    this.name = 'ExportNotFoundError';
  }
}

export class InvalidExportNameError extends SyncError {
  constructor(exportName: string) {
    super(
      `Invalid export name "${exportName}": must be a single directory name`,
      'INVALID_EXPORT_NAME',
      { exportName },
    );
    this.name = 'InvalidExportNameError';
  }
}

export class AmbiguousBankError extends SyncError {
  constructor(exportName: string, trackName: string) {
    super(
      `Cannot determine the bank for export "${exportName}" from ${trackName}`,
      'AMBIGUOUS_BANK',
      { exportName, trackName },
    );
    this.name = 'AmbiguousBankError';
  }
}

export class InvalidPromptInputError extends SyncError {
  constructor(input: string, expected: string) {
    super(`Invalid choice "${input}". Expected ${expected}`, 'INVALID_PROMPT_INPUT', {
      input,
    });
    this.name = 'InvalidPromptInputError';
  }
}

export class RestoreCancelledError extends SyncError {
  constructor(exportName: string) {
    super(`Restore of "${exportName}" cancelled`, 'RESTORE_CANCELLED', {
      exportName,
    });
    this.name = 'RestoreCancelledError';
  }
}

export class LockHeldError extends SyncError {
  constructor(lockPath: string, pid: number) {
    super(
      `Another instance is already running (PID: ${pid}). ` +
        `Delete ${lockPath} if the process is no longer running.`,
      'LOCK_HELD',
      { lockPath, pid },
    );
    this.name = 'LockHeldError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
