/**
 * Shared test helpers
 *
 * Tests run against real temporary device and backup trees, so helpers here
 * only build and inspect those trees and stand in for interactive input.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import type { DecisionSource } from '../../src/core/actions/decision-source';
import type { SyncConfig } from '../../src/interfaces/banks';

export interface TempLayout {
  root: string;
  config: SyncConfig;
  cleanup: () => void;
}

export function createTempLayout(prefix: string = 'rc-bank-sync-'): TempLayout {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  const config: SyncConfig = {
    deviceRoot: path.join(root, 'device'),
    backupRoot: path.join(root, 'backup'),
  };
  fs.mkdirSync(config.deviceRoot, { recursive: true });

  return {
    root,
    config,
    cleanup: () => fs.rmSync(root, { recursive: true, force: true }),
  };
}

export function writeFile(filePath: string, content: string | Buffer): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
  return filePath;
}

export function writeDeviceTrack(
  config: SyncConfig,
  slot: string,
  content: string | Buffer,
): string {
  return writeFile(path.join(config.deviceRoot, slot, `${slot}.WAV`), content);
}

export function writeBackupTrack(
  config: SyncConfig,
  bank: number,
  slot: string,
  content: string | Buffer,
): string {
  return writeFile(
    path.join(config.backupRoot, `bank_${bank}`, `${slot}.WAV`),
    content,
  );
}

export function writeExportTrack(
  config: SyncConfig,
  exportName: string,
  slot: string,
  content: string | Buffer,
): string {
  return writeFile(
    path.join(config.backupRoot, 'exports', exportName, `${slot}.WAV`),
    content,
  );
}

/**
 * Slot names that currently hold a track file on the device
 */
export function deviceTracks(config: SyncConfig): string[] {
  if (!fs.existsSync(config.deviceRoot)) {
    return [];
  }
  return fs
    .readdirSync(config.deviceRoot)
    .filter((slot) =>
      fs.existsSync(path.join(config.deviceRoot, slot, `${slot}.WAV`)),
    )
    .sort();
}

export function readDeviceTrack(config: SyncConfig, slot: string): string {
  return fs.readFileSync(
    path.join(config.deviceRoot, slot, `${slot}.WAV`),
    'utf8',
  );
}

export function backupFiles(config: SyncConfig, bank: number): string[] {
  const dir = path.join(config.backupRoot, `bank_${bank}`);
  return fs.existsSync(dir) ? fs.readdirSync(dir).sort() : [];
}

export function readBackupTrack(
  config: SyncConfig,
  bank: number,
  slot: string,
): string {
  return fs.readFileSync(
    path.join(config.backupRoot, `bank_${bank}`, `${slot}.WAV`),
    'utf8',
  );
}

export interface ScriptedDecisionSource extends DecisionSource {
  questions: string[];
  closed: boolean;
}

/**
 * Answers questions from a fixed script, then behaves like closed input
 */
export function createScriptedDecisionSource(
  answers: string[],
): ScriptedDecisionSource {
  const queue = [...answers];
  const source: ScriptedDecisionSource = {
    questions: [],
    closed: false,
    ask: async (question: string) => {
      source.questions.push(question);
      const next = queue.shift();
      return next === undefined ? null : next;
    },
    close: () => {
      source.closed = true;
    },
  };
  return source;
}

/**
 * Capture stdout for the duration of a test
 */
export function captureStdout() {
  const lines: string[] = [];
  const spy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      lines.push(String(chunk));
      return true;
    });
  return { lines, spy, text: () => lines.join('') };
}
