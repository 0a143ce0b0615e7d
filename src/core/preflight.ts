import fs from 'node:fs';
import * as logger from '../utils/logger';
import { isDirectory, isWritableDirectory } from '../utils/fs-utils';
import { logFilePath } from '../utils/env-utils';
import {
  BackupDirUnwritableError,
  DeviceNotConnectedError,
  errorMessage,
} from './errors';
import { SyncConfig } from '../interfaces/banks';

/**
 * The device counts as connected when its track root is mounted
 */
export function ensureDeviceConnected(config: SyncConfig, verbosity: number): void {
  if (!isDirectory(config.deviceRoot)) {
    throw new DeviceNotConnectedError(config.deviceRoot);
  }
  logger.success(`Device detected at ${config.deviceRoot}`, verbosity);
}

/**
 * Create the backup root when missing and start mirroring the log into it
 */
export function prepareBackupRoot(config: SyncConfig, verbosity: number): void {
  const { backupRoot } = config;

  if (!isDirectory(backupRoot)) {
    logger.info(`Creating backup directory: ${backupRoot}`, verbosity);
    try {
      fs.mkdirSync(backupRoot, { recursive: true });
    } catch (err) {
      throw new BackupDirUnwritableError(backupRoot, errorMessage(err));
    }
    logger.success('Backup directory created successfully', verbosity);
  } else {
    logger.info(`Backup directory already exists: ${backupRoot}`, verbosity);
  }

  if (!isWritableDirectory(backupRoot)) {
    throw new BackupDirUnwritableError(backupRoot, 'directory is not writable');
  }

  const logFile = logFilePath(config);
  const created = !fs.existsSync(logFile);
  logger.attachLogFile(logFile);
  if (created) {
    logger.info(`Created log file: ${logFile}`, verbosity);
  }
}
