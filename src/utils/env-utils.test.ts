/**
 * Tests for Environment Utilities
 */

import { describe, it, expect } from 'vitest';
import path from 'node:path';
import {
  DEFAULT_DEVICE_ROOT,
  logFilePath,
  resolveSyncConfig,
  resolveVerbosity,
} from './env-utils';
import { MissingBackupDirError } from '../core/errors';
import { Verbosity } from '../interfaces/logger';

describe('Environment Utilities', () => {
  describe('resolveSyncConfig', () => {
    it('should prefer --dir over RC_BACKUP_DIR', () => {
      const config = resolveSyncConfig(
        { dir: '/music/backup' },
        { RC_BACKUP_DIR: '/other' },
      );
      expect(config.backupRoot).toBe(path.resolve('/music/backup'));
    });

    it('should fall back to RC_BACKUP_DIR', () => {
      const config = resolveSyncConfig({}, { RC_BACKUP_DIR: '/env/backup' });
      expect(config.backupRoot).toBe(path.resolve('/env/backup'));
    });

    it('should fail without any backup directory', () => {
      expect(() => resolveSyncConfig({}, {})).toThrow(MissingBackupDirError);
      expect(() => resolveSyncConfig({ dir: '  ' }, { RC_BACKUP_DIR: '' })).toThrow(
        MissingBackupDirError,
      );
    });

    it('should resolve the device root from flag, env, then default', () => {
      expect(
        resolveSyncConfig(
          { dir: '/b', device: '/mnt/rc' },
          { RC_DEVICE_DIR: '/env/rc' },
        ).deviceRoot,
      ).toBe(path.resolve('/mnt/rc'));
      expect(
        resolveSyncConfig({ dir: '/b' }, { RC_DEVICE_DIR: '/env/rc' }).deviceRoot,
      ).toBe(path.resolve('/env/rc'));
      expect(resolveSyncConfig({ dir: '/b' }, {}).deviceRoot).toBe(
        path.resolve(DEFAULT_DEVICE_ROOT),
      );
    });

    it('should make relative paths absolute', () => {
      const config = resolveSyncConfig({ dir: 'backup' }, {});
      expect(path.isAbsolute(config.backupRoot)).toBe(true);
    });
  });

  describe('logFilePath', () => {
    it('should place the log in the backup root', () => {
      expect(logFilePath({ deviceRoot: '/d', backupRoot: '/b' })).toBe(
        path.join('/b', 'sync_log.txt'),
      );
    });
  });

  describe('resolveVerbosity', () => {
    it('should map flags to verbosity levels', () => {
      expect(resolveVerbosity({})).toBe(Verbosity.Normal);
      expect(resolveVerbosity({ quiet: true })).toBe(Verbosity.Quiet);
      expect(resolveVerbosity({ verbose: true })).toBe(Verbosity.Verbose);
      expect(resolveVerbosity({ quiet: true, verbose: true })).toBe(
        Verbosity.Quiet,
      );
    });
  });
});
