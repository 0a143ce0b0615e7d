import fs from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import { syncBanks } from './file-sync';
import { restoreExport } from './file-restore';
import { createExportStore } from './core/export/export-store';
import {
  DeviceNotConnectedError,
  MissingBackupDirError,
  errorMessage,
} from './core/errors';
import { resolveSyncConfig, resolveVerbosity } from './utils/env-utils';
import * as logger from './utils/logger';
import { bold } from './utils/logger';

function readVersion(): string {
  // One level up from src/, two from dist/src/
  for (const candidate of [
    path.join(__dirname, '..', 'package.json'),
    path.join(__dirname, '..', '..', 'package.json'),
  ]) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(candidate, 'utf8'));
      if (
        typeof parsed === 'object' &&
        parsed !== null &&
        'version' in parsed &&
        typeof parsed.version === 'string'
      ) {
        return parsed.version;
      }
    } catch {
      continue;
    }
  }
  return 'unknown';
}

const VERSION = readVersion();

export function parseCliArgs(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      dir: { type: 'string', short: 'd' },
      device: { type: 'string' },
      restore: { type: 'string', short: 'r' },
      'list-exports': { type: 'boolean' },
      quiet: { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
    allowPositionals: false,
    strict: true,
  });

  return values;
}

export function showHelp() {
  console.log(`
${bold(`rc-bank-sync v${VERSION} - Bank-aware backup for loop station WAV tracks`)}

${bold('Usage: rc-bank-sync [options]')}

${bold('Options:')}
  -d, --dir <path>        Backup directory (overrides RC_BACKUP_DIR)
  --device <path>         Device track root (overrides RC_DEVICE_DIR,
                          default: /Volumes/BOSS_RC-202/ROLAND/WAVE)
  -r, --restore <name>    Restore an export from <dir>/exports/<name> onto the device
  --list-exports          List the exports stored in the backup directory
  --quiet                 Show minimal output
  --verbose               Show detailed output
  -h, --help              Show this help message
  -v, --version           Show version information

${bold('Examples:')}
  rc-bank-sync --dir ~/Music/rc-backup
  RC_BACKUP_DIR=~/Music/rc-backup rc-bank-sync
  rc-bank-sync --dir ~/Music/rc-backup --restore 2026-01-31_20-15-00_bank_2
`);
}

function showVersion() {
  console.log(`rc-bank-sync v${VERSION}`);
}

function listExports(dir: string | undefined, device: string | undefined) {
  const config = resolveSyncConfig({ dir, device });
  const snapshots = createExportStore(config).listSnapshots();

  if (snapshots.length === 0) {
    console.log(`No exports found in ${config.backupRoot}`);
    return;
  }
  for (const snapshot of snapshots) {
    const bank = snapshot.bank === null ? '?' : String(snapshot.bank);
    console.log(
      `${snapshot.name}  bank ${bank}  ${snapshot.files.length} files`,
    );
  }
}

export async function main(rawArgs: string[]): Promise<number> {
  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(rawArgs);
  } catch (err) {
    logger.error(errorMessage(err));
    showHelp();
    return 1;
  }

  if (args.help) {
    showHelp();
    return 0;
  }

  if (args.version) {
    showVersion();
    return 0;
  }

  const verbosity = resolveVerbosity(args);

  try {
    if (args['list-exports']) {
      listExports(args.dir, args.device);
      return 0;
    }

    const config = resolveSyncConfig({ dir: args.dir, device: args.device });

    if (args.restore !== undefined) {
      const result = await restoreExport(config, args.restore, args);
      return result.errored > 0 ? 1 : 0;
    }

    logger.info('========================================', verbosity);
    logger.info(`rc-bank-sync v${VERSION} - Starting`, verbosity);
    logger.info('========================================', verbosity);

    const outcome = await syncBanks(config, args);
    if (!outcome.hasData) {
      logger.warning('Synchronization process encountered errors', verbosity);
      return 1;
    }

    logger.info('========================================', verbosity);
    logger.info(`rc-bank-sync v${VERSION} - Completed`, verbosity);
    logger.info('========================================', verbosity);
    return 0;
  } catch (err) {
    logger.error(errorMessage(err));
    if (err instanceof DeviceNotConnectedError) {
      logger.info(
        'Please connect your loop station via USB and try again.',
        verbosity,
      );
    }
    if (err instanceof MissingBackupDirError) {
      showHelp();
    }
    return 1;
  }
}
