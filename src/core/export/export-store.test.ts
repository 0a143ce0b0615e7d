import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import {
  createExportStore,
  defaultSnapshotName,
  isValidExportName,
  snapshotBank,
} from './export-store';
import { ExportNotFoundError, InvalidExportNameError } from '../errors';
import { Verbosity } from '../../interfaces/logger';
import {
  captureStdout,
  createTempLayout,
  TempLayout,
  writeBackupTrack,
  writeExportTrack,
  writeFile,
} from '../../../test-config/mocks/test-helpers';

describe('export store', () => {
  let layout: TempLayout;
  let output: ReturnType<typeof captureStdout>;

  beforeEach(() => {
    output = captureStdout();
    layout = createTempLayout('rc-export-test-');
  });

  afterEach(() => {
    layout.cleanup();
  });

  describe('defaultSnapshotName', () => {
    it('should stamp the local date and time before the bank', () => {
      expect(defaultSnapshotName(3, new Date(2026, 0, 5, 8, 4, 2))).toBe(
        '2026-01-05_08-04-02_bank_3',
      );
    });
  });

  describe('isValidExportName', () => {
    it('should accept plain directory names', () => {
      expect(isValidExportName('before-gig')).toBe(true);
      expect(isValidExportName('2026-01-05_08-04-02_bank_3')).toBe(true);
    });

    it('should reject empty, hidden and nested names', () => {
      expect(isValidExportName('')).toBe(false);
      expect(isValidExportName('..')).toBe(false);
      expect(isValidExportName('.hidden')).toBe(false);
      expect(isValidExportName('a/b')).toBe(false);
      expect(isValidExportName('a\\b')).toBe(false);
    });
  });

  describe('snapshotBank', () => {
    it('should take the bank from the first track', () => {
      expect(snapshotBank(['017_1.WAV', '018_1.WAV'])).toBe(3);
    });

    it('should return null when the first track does not parse', () => {
      expect(snapshotBank([])).toBeNull();
      expect(snapshotBank(['take.WAV'])).toBeNull();
      expect(snapshotBank(['099_1.WAV'])).toBeNull();
    });
  });

  describe('createSnapshot', () => {
    it('should copy the bank directory under the given name', () => {
      const { config } = layout;
      writeBackupTrack(config, 2, '009_1', 'nine');
      writeBackupTrack(config, 2, '010_1', 'ten');

      const store = createExportStore(config, Verbosity.Quiet);
      const snapshot = store.createSnapshot(2, 'before-gig');

      expect(snapshot).toEqual({
        name: 'before-gig',
        bank: 2,
        path: path.join(config.backupRoot, 'exports', 'before-gig'),
        files: ['009_1.WAV', '010_1.WAV'],
      });
      expect(
        fs.readFileSync(path.join(store.root, 'before-gig', '009_1.WAV'), 'utf8'),
      ).toBe('nine');
    });

    it('should never overwrite an existing snapshot', () => {
      const { config } = layout;
      writeBackupTrack(config, 1, '001_1', 'new');
      writeExportTrack(config, 'nightly', '001_1', 'old');

      const store = createExportStore(config, Verbosity.Quiet);
      const snapshot = store.createSnapshot(1, 'nightly');

      expect(snapshot?.name).toBe('nightly_2');
      expect(
        fs.readFileSync(path.join(store.root, 'nightly', '001_1.WAV'), 'utf8'),
      ).toBe('old');
    });

    it('should return null for an empty or missing bank', () => {
      const { config } = layout;
      fs.mkdirSync(path.join(config.backupRoot, 'bank_4'), { recursive: true });
      const store = createExportStore(config, Verbosity.Quiet);

      expect(store.createSnapshot(4, 'empty')).toBeNull();
      expect(store.createSnapshot(5, 'missing')).toBeNull();
      expect(fs.existsSync(store.root)).toBe(false);
    });

    it('should not export a bank holding only hidden or non-track files', () => {
      const { config } = layout;
      const bankDir = path.join(config.backupRoot, 'bank_1');
      writeFile(path.join(bankDir, '.DS_Store'), 'finder');
      writeFile(path.join(bankDir, 'notes.txt'), 'setlist');
      const store = createExportStore(config, Verbosity.Normal);

      expect(store.createSnapshot(1, 'snap')).toBeNull();
      expect(fs.existsSync(path.join(store.root, 'snap'))).toBe(false);
      expect(output.text()).toContain('No files to export for bank_1');
    });

    it('should reject names that leave the exports directory', () => {
      const { config } = layout;
      writeBackupTrack(config, 1, '001_1', 'a');
      const store = createExportStore(config, Verbosity.Quiet);

      expect(() => store.createSnapshot(1, '../bank_2')).toThrow(
        InvalidExportNameError,
      );
    });
  });

  describe('resolveSnapshot', () => {
    it('should resolve a snapshot with track files', () => {
      const { config } = layout;
      writeExportTrack(config, 'keep-me', '025_2', 'x');
      writeFile(path.join(config.backupRoot, 'exports', 'keep-me', 'log.txt'), 'y');

      const snapshot = createExportStore(config, Verbosity.Quiet).resolveSnapshot(
        'keep-me',
      );

      expect(snapshot.files).toEqual(['025_2.WAV']);
      expect(snapshot.bank).toBe(4);
    });

    it('should fail for a missing snapshot', () => {
      const store = createExportStore(layout.config, Verbosity.Quiet);
      expect(() => store.resolveSnapshot('nope')).toThrow(ExportNotFoundError);
    });

    it('should fail for a snapshot without track files', () => {
      const { config } = layout;
      writeFile(path.join(config.backupRoot, 'exports', 'hollow', 'log.txt'), 'y');

      const store = createExportStore(config, Verbosity.Quiet);
      expect(() => store.resolveSnapshot('hollow')).toThrow(ExportNotFoundError);
    });
  });

  describe('listSnapshots', () => {
    it('should list every export directory by name', () => {
      const { config } = layout;
      writeExportTrack(config, 'b-second', '009_1', 'x');
      writeExportTrack(config, 'a-first', '001_1', 'x');

      const names = createExportStore(config, Verbosity.Quiet)
        .listSnapshots()
        .map((snapshot) => `${snapshot.name}:${snapshot.bank}`);

      expect(names).toEqual(['a-first:1', 'b-second:2']);
    });
  });
});
