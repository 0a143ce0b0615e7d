/**
 * Tests for file-sync.ts
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { syncBanks, SyncDependencies } from './file-sync';
import { ACTION_PROMPT } from './core/actions/action-resolver';
import { DeviceNotConnectedError } from './core/errors';
import {
  backupFiles,
  captureStdout,
  createScriptedDecisionSource,
  createTempLayout,
  deviceTracks,
  readBackupTrack,
  readDeviceTrack,
  TempLayout,
  writeBackupTrack,
  writeDeviceTrack,
} from '../test-config/mocks/test-helpers';

describe('syncBanks', () => {
  let layout: TempLayout;
  let acquireLock: ReturnType<typeof vi.fn>;
  let releaseLock: ReturnType<typeof vi.fn>;

  const dependencies = (answers: string[] = []) => {
    const decisionSource = createScriptedDecisionSource(answers);
    const deps: SyncDependencies = { decisionSource, acquireLock, releaseLock };
    return { decisionSource, deps };
  };

  beforeEach(() => {
    layout = createTempLayout('rc-sync-test-');
    acquireLock = vi.fn();
    releaseLock = vi.fn();
    captureStdout();
  });

  afterEach(() => {
    layout.cleanup();
  });

  it('should back up new tracks into their banks without prompting', async () => {
    const { config } = layout;
    writeDeviceTrack(config, '001_1', 'kick');
    writeDeviceTrack(config, '009_2', 'bass');
    const { decisionSource, deps } = dependencies();

    const outcome = await syncBanks(config, { quiet: true }, deps);

    expect(outcome.hasData).toBe(true);
    expect(decisionSource.questions).toEqual([]);
    expect(backupFiles(config, 1)).toEqual(['001_1.WAV']);
    expect(backupFiles(config, 2)).toEqual(['009_2.WAV']);
    expect(readBackupTrack(config, 2, '009_2')).toBe('bass');
    expect(outcome.report.totals).toEqual({
      total: 2,
      copied: 2,
      skipped: 0,
      deleted: 0,
      errored: 0,
    });
  });

  it('should take the lock on the backup root and release it', async () => {
    const { config } = layout;
    writeDeviceTrack(config, '001_1', 'kick');
    const { decisionSource, deps } = dependencies();

    await syncBanks(config, { quiet: true }, deps);

    expect(acquireLock).toHaveBeenCalledWith(config.backupRoot);
    expect(releaseLock).toHaveBeenCalledTimes(1);
    expect(decisionSource.closed).toBe(true);
  });

  it('should write the run to sync_log.txt in the backup root', async () => {
    const { config } = layout;
    writeDeviceTrack(config, '001_1', 'kick');
    const { deps } = dependencies();

    await syncBanks(config, { quiet: true }, deps);

    const log = fs.readFileSync(path.join(config.backupRoot, 'sync_log.txt'), 'utf8');
    expect(log).toContain('[INFO] Copying: 001_1.WAV to bank_1');
    expect(log).toContain('[SUCCESS] Synchronization complete!');
  });

  it('should leave a bank untouched when skipped', async () => {
    const { config } = layout;
    writeDeviceTrack(config, '001_1', 'new take');
    writeBackupTrack(config, 1, '001_1', 'old take');
    const { decisionSource, deps } = dependencies(['s']);

    const outcome = await syncBanks(config, { quiet: true }, deps);

    expect(decisionSource.questions).toEqual([ACTION_PROMPT]);
    expect(readBackupTrack(config, 1, '001_1')).toBe('old take');
    expect(outcome.report.totals.copied).toBe(0);
  });

  it('should skip changed banks when input is closed', async () => {
    const { config } = layout;
    writeDeviceTrack(config, '001_1', 'new take');
    writeBackupTrack(config, 1, '001_1', 'old take');
    const { deps } = dependencies();

    await syncBanks(config, { quiet: true }, deps);

    expect(readBackupTrack(config, 1, '001_1')).toBe('old take');
  });

  it('should apply modifications and deletions to the backup', async () => {
    const { config } = layout;
    writeDeviceTrack(config, '001_1', 'new take');
    writeDeviceTrack(config, '002_1', 'same');
    writeBackupTrack(config, 1, '001_1', 'old take');
    writeBackupTrack(config, 1, '002_1', 'same');
    writeBackupTrack(config, 1, '003_1', 'gone');
    const { deps } = dependencies(['a']);

    const outcome = await syncBanks(config, { quiet: true }, deps);

    expect(backupFiles(config, 1)).toEqual(['001_1.WAV', '002_1.WAV']);
    expect(readBackupTrack(config, 1, '001_1')).toBe('new take');
    expect(outcome.report.totals).toEqual({
      total: 2,
      copied: 1,
      skipped: 1,
      deleted: 1,
      errored: 0,
    });
  });

  it('should export the old bank before applying', async () => {
    const { config } = layout;
    writeDeviceTrack(config, '001_1', 'new take');
    writeBackupTrack(config, 1, '001_1', 'old take');
    writeBackupTrack(config, 1, '002_1', 'gone');
    const { deps } = dependencies(['e', 'before-gig']);

    const outcome = await syncBanks(config, { quiet: true }, deps);

    const exportDir = path.join(config.backupRoot, 'exports', 'before-gig');
    expect(fs.readdirSync(exportDir).sort()).toEqual(['001_1.WAV', '002_1.WAV']);
    expect(fs.readFileSync(path.join(exportDir, '001_1.WAV'), 'utf8')).toBe(
      'old take',
    );
    expect(backupFiles(config, 1)).toEqual(['001_1.WAV']);
    expect(readBackupTrack(config, 1, '001_1')).toBe('new take');
    expect(outcome.report.exports()).toEqual(['before-gig']);
  });

  it('should revert the device to the backup once confirmed', async () => {
    const { config } = layout;
    writeDeviceTrack(config, '001_1', 'edited');
    writeDeviceTrack(config, '002_1', 'stray');
    writeBackupTrack(config, 1, '001_1', 'original');
    const { deps } = dependencies(['r', 'yes']);

    await syncBanks(config, { quiet: true }, deps);

    expect(deviceTracks(config)).toEqual(['001_1']);
    expect(readDeviceTrack(config, '001_1')).toBe('original');
    expect(backupFiles(config, 1)).toEqual(['001_1.WAV']);
    expect(readBackupTrack(config, 1, '001_1')).toBe('original');
  });

  it('should report no data when the device has no track directories', async () => {
    const { config } = layout;
    const { deps } = dependencies();

    const outcome = await syncBanks(config, { quiet: true }, deps);

    expect(outcome.hasData).toBe(false);
    expect(fs.existsSync(config.backupRoot)).toBe(true);
    expect(releaseLock).toHaveBeenCalledTimes(1);
  });

  it('should fail before locking when the device is not connected', async () => {
    const { config } = layout;
    fs.rmSync(config.deviceRoot, { recursive: true, force: true });
    const { deps } = dependencies();

    await expect(syncBanks(config, { quiet: true }, deps)).rejects.toThrow(
      DeviceNotConnectedError,
    );
    expect(acquireLock).not.toHaveBeenCalled();
    expect(fs.existsSync(config.backupRoot)).toBe(false);
  });

  it('should keep going when one bank fails', async () => {
    const { config } = layout;
    writeDeviceTrack(config, '001_1', 'kick');
    writeDeviceTrack(config, '009_1', 'snare');
    const { deps } = dependencies();
    const failing: SyncDependencies = {
      ...deps,
      createActionResolver: () => ({
        resolve: async (bank: number) => {
          if (bank === 1) {
            throw new Error('prompt exploded');
          }
          return { action: 'apply' };
        },
      }),
    };

    const outcome = await syncBanks(config, { quiet: true }, failing);

    expect(backupFiles(config, 1)).toEqual([]);
    expect(backupFiles(config, 2)).toEqual(['009_1.WAV']);
    expect(outcome.report.totals.errored).toBe(1);
    expect(outcome.report.hasErrors()).toBe(true);
  });
});
