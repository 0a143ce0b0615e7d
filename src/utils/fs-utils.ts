import fs from 'node:fs';

export function isDirectory(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Names of the directories directly under `dir`, sorted; empty when `dir`
 * cannot be read
 */
export function listDirectories(dir: string): string[] {
  if (!isDirectory(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Names of the regular files directly under `dir` ending in `extension`, sorted
 */
export function listFiles(dir: string, extension: string): string[] {
  if (!isDirectory(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter(
      (entry) =>
        entry.isFile() &&
        !entry.name.startsWith('.') &&
        entry.name.endsWith(extension),
    )
    .map((entry) => entry.name)
    .sort();
}

export function ensureDir(dir: string): void {
  fs.mkdirSync(dir, { recursive: true });
}

export function isWritableDirectory(dir: string): boolean {
  try {
    fs.accessSync(dir, fs.constants.W_OK);
    return isDirectory(dir);
  } catch {
    return false;
  }
}
