import path from 'node:path';
import { MissingBackupDirError } from '../core/errors';
import { SyncConfig } from '../interfaces/banks';
import { Verbosity } from '../interfaces/logger';

export const BACKUP_DIR_ENV = 'RC_BACKUP_DIR';
export const DEVICE_DIR_ENV = 'RC_DEVICE_DIR';
export const DEFAULT_DEVICE_ROOT = '/Volumes/BOSS_RC-202/ROLAND/WAVE';
export const LOG_FILE_NAME = 'sync_log.txt';

export interface PathArgs {
  dir?: string;
  device?: string;
}

const nonEmpty = (value: string | undefined): string | undefined =>
  value && value.trim().length > 0 ? value : undefined;

/**
 * Backup root from --dir or RC_BACKUP_DIR, device root from --device,
 * RC_DEVICE_DIR or the default mount point
 */
export function resolveSyncConfig(
  args: PathArgs,
  env: NodeJS.ProcessEnv = process.env,
): SyncConfig {
  const backupRoot = nonEmpty(args.dir) ?? nonEmpty(env[BACKUP_DIR_ENV]);
  if (!backupRoot) {
    throw new MissingBackupDirError();
  }

  const deviceRoot =
    nonEmpty(args.device) ?? nonEmpty(env[DEVICE_DIR_ENV]) ?? DEFAULT_DEVICE_ROOT;

  return {
    deviceRoot: path.resolve(deviceRoot),
    backupRoot: path.resolve(backupRoot),
  };
}

export function logFilePath(config: SyncConfig): string {
  return path.join(config.backupRoot, LOG_FILE_NAME);
}

export function resolveVerbosity(options: {
  quiet?: boolean;
  verbose?: boolean;
}): Verbosity {
  return options.quiet
    ? Verbosity.Quiet
    : options.verbose
      ? Verbosity.Verbose
      : Verbosity.Normal;
}
