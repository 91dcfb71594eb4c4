import { createHash } from 'node:crypto';

const SHA256_HEX = /^[a-f0-9]{64}$/i;

export function computeSha256(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Find the SHA-256 for `fileName` in a checksum file.
 *
 * Accepts a bare hash (kubectl's `.sha256` files) or `sha256sum` output,
 * where the name may carry a `*` binary-mode marker or a leading path.
 * Returns the hash in lower case, or null when nothing matches.
 */
export function parseChecksumFile(text: string, fileName: string): string | null {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  if (lines.length === 1 && SHA256_HEX.test(lines[0])) {
    return lines[0].toLowerCase();
  }

  for (const line of lines) {
    const match = /^([a-f0-9]{64})\s+\*?(.+)$/i.exec(line);
    if (!match) continue;
    const name = match[2].trim();
    if (name === fileName || name.split('/').pop() === fileName) {
      return match[1].toLowerCase();
    }
  }
  return null;
}
