import fs from 'node:fs';
import chalk from 'chalk';
import { LogLevel, Verbosity } from '../interfaces/logger';

export { Verbosity };
export type { LogLevel };

// Color helper functions for use across the codebase
export const red = (text: string): string => chalk.red(text);
export const green = (text: string): string => chalk.green(text);
export const yellow = (text: string): string => chalk.yellow(text);
export const blue = (text: string): string => chalk.blue(text);
export const bold = (text: string): string => chalk.bold(text);

const tagColors: Record<LogLevel, (text: string) => string> = {
  INFO: blue,
  SUCCESS: green,
  WARNING: yellow,
  ERROR: red,
};

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g;

let logFilePath: string | null = null;
let logFileFailed = false;

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(date: Date = new Date()): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/**
 * Mirror every tagged message into an append-only log file until detached
 */
export function attachLogFile(filePath: string): void {
  logFilePath = filePath;
  logFileFailed = false;
}

export function detachLogFile(): void {
  logFilePath = null;
}

export function getLogFile(): string | null {
  return logFilePath;
}

function appendToLogFile(level: LogLevel, message: string): void {
  if (!logFilePath) {
    return;
  }

  try {
    fs.appendFileSync(
      logFilePath,
      `[${formatTimestamp()}] [${level}] ${stripAnsi(message)}\n`,
    );
  } catch (err) {
    if (logFileFailed) {
      return;
    }
    logFileFailed = true;
    const errorMessage = err instanceof Error ? err.message : String(err);
    process.stdout.write(
      `${red('[ERROR]')} Could not write to log file ${logFilePath}: ${errorMessage}\n`,
    );
  }
}

export function log(
  message: string,
  level: Verbosity,
  currentVerbosity: number,
): void {
  if (currentVerbosity >= level) {
    const formattedMessage = message.endsWith('\n') ? message : message + '\n';
    process.stdout.write(formattedMessage);
  }
}

function tagged(level: LogLevel, message: string): string {
  return `${tagColors[level](`[${level}]`)} ${message}`;
}

export function error(message: string): void {
  appendToLogFile('ERROR', message);
  process.stdout.write(tagged('ERROR', message) + '\n');
}

export function warning(message: string, currentVerbosity: number): void {
  appendToLogFile('WARNING', message);
  log(tagged('WARNING', message), Verbosity.Normal, currentVerbosity);
}

export function info(message: string, currentVerbosity: number): void {
  appendToLogFile('INFO', message);
  log(tagged('INFO', message), Verbosity.Normal, currentVerbosity);
}

export function success(message: string, currentVerbosity: number): void {
  appendToLogFile('SUCCESS', message);
  log(tagged('SUCCESS', message), Verbosity.Normal, currentVerbosity);
}

export function verbose(message: string, currentVerbosity: number): void {
  log(message, Verbosity.Verbose, currentVerbosity);
}

export function always(message: string): void {
  const formattedMessage = message.endsWith('\n') ? message : message + '\n';
  process.stdout.write(formattedMessage);
}
