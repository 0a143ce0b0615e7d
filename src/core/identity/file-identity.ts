import fs from 'node:fs';
import crypto from 'node:crypto';

/**
 * Only the first 64 KiB are signed. Equal-size files whose differences all
 * lie past this prefix compare as identical.
 */
export const SIGNATURE_PREFIX_BYTES = 65536;

export function fileSize(filePath: string): number | null {
  try {
    const stats = fs.statSync(filePath);
    return stats.isFile() ? stats.size : null;
  } catch {
    return null;
  }
}

export async function prefixSignature(
  filePath: string,
  prefixBytes: number = SIGNATURE_PREFIX_BYTES,
): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath, {
      start: 0,
      end: prefixBytes - 1,
    });

    stream.on('error', reject);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Whether two same-named track files differ. A missing file always differs.
 */
export async function differs(fileA: string, fileB: string): Promise<boolean> {
  const sizeA = fileSize(fileA);
  const sizeB = fileSize(fileB);

  if (sizeA === null || sizeB === null) {
    return true;
  }
  if (sizeA !== sizeB) {
    return true;
  }

  const [signatureA, signatureB] = await Promise.all([
    prefixSignature(fileA),
    prefixSignature(fileB),
  ]);
  return signatureA !== signatureB;
}
