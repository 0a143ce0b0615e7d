import * as logger from '../../utils/logger';
import { InvalidPromptInputError } from '../errors';
import { bankDirName, trackFileName } from '../banks/slot-mapper';
import { defaultSnapshotName, isValidExportName } from '../export/export-store';
import { DecisionSource } from './decision-source';
import { BankDecision, ChangeSet } from '../../interfaces/banks';

export type PromptChoice = 'export' | 'apply' | 'revert' | 'skip';

export type DiffKind = 'delete' | 'copy' | 'replace' | 'keep';

export interface DiffLine {
  kind: DiffKind;
  trackName: string;
}

export const ACTION_PROMPT =
  '\n[E]xport then apply (default), [A]pply, [R]evert, [S]kip? ';

const CHOICES: Record<string, PromptChoice> = {
  '': 'export',
  e: 'export',
  export: 'export',
  a: 'apply',
  apply: 'apply',
  r: 'revert',
  revert: 'revert',
  s: 'skip',
  skip: 'skip',
};

export function parseChoice(input: string): PromptChoice {
  const normalized = input.trim().toLowerCase();
  const choice = CHOICES[normalized];
  if (!choice) {
    throw new InvalidPromptInputError(input.trim(), 'E, A, R or S');
  }
  return choice;
}

/**
 * Diff lines for a bank: deletions first, then every device track in slot order
 */
export function renderBankDiff(changeSet: ChangeSet): DiffLine[] {
  const lines: DiffLine[] = changeSet.deleted.map((slot) => ({
    kind: 'delete',
    trackName: trackFileName(slot),
  }));

  const kinds = new Map<string, DiffKind>();
  for (const slot of changeSet.added) {
    kinds.set(slot, 'copy');
  }
  for (const slot of changeSet.modified) {
    kinds.set(slot, 'replace');
  }
  for (const slot of changeSet.unchanged) {
    kinds.set(slot, 'keep');
  }

  for (const slot of [...kinds.keys()].sort()) {
    const kind = kinds.get(slot) ?? 'keep';
    lines.push({ kind, trackName: trackFileName(slot) });
  }

  return lines;
}

export function formatDiffLine(line: DiffLine): string {
  const text = `${line.kind}: ${line.trackName}`;
  switch (line.kind) {
    case 'delete':
      return logger.red(text);
    case 'copy':
      return logger.green(text);
    case 'replace':
      return logger.yellow(text);
    case 'keep':
      return text;
  }
}

export interface ActionResolverOptions {
  now?: () => Date;
}

export function createActionResolver(
  source: DecisionSource,
  verbosity: number = logger.Verbosity.Normal,
  options: ActionResolverOptions = {},
) {
  const now = options.now ?? (() => new Date());

  const askExportName = async (bank: number): Promise<string | null> => {
    const fallback = defaultSnapshotName(bank, now());
    for (;;) {
      const answer = await source.ask(`Export name [${fallback}]: `);
      if (answer === null) {
        return null;
      }
      const name = answer.trim() || fallback;
      if (isValidExportName(name)) {
        return name;
      }
      logger.warning(
        `Invalid export name "${name}": use a single directory name`,
        verbosity,
      );
    }
  };

  const confirmRevert = async (bank: number): Promise<boolean | null> => {
    const answer = await source.ask(
      `Revert overwrites the device with ${bankDirName(bank)} from the backup. Type "yes" to confirm: `,
    );
    if (answer === null) {
      return null;
    }
    return answer.trim().toLowerCase() === 'yes';
  };

  const skip = (bank: number, reason?: string): BankDecision => {
    logger.warning(
      reason
        ? `${reason}; skipping changes for ${bankDirName(bank)}`
        : `Skipping changes for ${bankDirName(bank)}`,
      verbosity,
    );
    return { action: 'skip' };
  };

  const resolve = async (
    bank: number,
    changeSet: ChangeSet,
  ): Promise<BankDecision> => {
    if (!changeSet.hasChanges) {
      return { action: 'none' };
    }

    if (
      changeSet.added.length > 0 &&
      changeSet.modified.length === 0 &&
      changeSet.deleted.length === 0
    ) {
      logger.info(`Processing new files for ${bankDirName(bank)}`, verbosity);
      return { action: 'apply' };
    }

    logger.always(`\nChanges detected in ${bankDirName(bank)}:`);
    for (const line of renderBankDiff(changeSet)) {
      logger.always(formatDiffLine(line));
    }

    for (;;) {
      const answer = await source.ask(ACTION_PROMPT);
      if (answer === null) {
        return skip(bank, 'No input available');
      }

      let choice: PromptChoice;
      try {
        choice = parseChoice(answer);
      } catch (err) {
        if (err instanceof InvalidPromptInputError) {
          logger.warning(err.message, verbosity);
          continue;
        }
        throw err;
      }

      switch (choice) {
        case 'skip':
          return skip(bank);
        case 'apply':
          return { action: 'apply' };
        case 'export': {
          const exportName = await askExportName(bank);
          if (exportName === null) {
            return skip(bank, 'No input available');
          }
          return { action: 'export', exportName };
        }
        case 'revert': {
          const confirmed = await confirmRevert(bank);
          if (confirmed === null) {
            return skip(bank, 'No input available');
          }
          if (confirmed) {
            return { action: 'revert' };
          }
          logger.info(`Revert of ${bankDirName(bank)} not confirmed`, verbosity);
          break;
        }
      }
    }
  };

  return { resolve };
}

export type ActionResolver = ReturnType<typeof createActionResolver>;
