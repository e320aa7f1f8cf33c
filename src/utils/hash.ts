import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { FileSystemError } from './errors.js';

export function sha256Hex(content: string | Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Hash a file by streaming it, so large archives never sit in memory.
 */
export async function sha256File(path: string): Promise<string> {
  const hash = createHash('sha256');
  try {
    for await (const chunk of createReadStream(path)) {
      hash.update(chunk);
    }
  } catch (error) {
    throw new FileSystemError(`Failed to hash file: ${path}`, { path, error });
  }
  return hash.digest('hex');
}

/**
 * JSON with object keys sorted at every level. Two values that differ only
 * in key order produce the same string.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/**
 * Strip an optional `sha256:` prefix and lowercase the digest.
 */
export function normalizeChecksum(checksum: string): string {
  const trimmed = checksum.trim();
  const bare = trimmed.toLowerCase().startsWith('sha256:') ? trimmed.slice('sha256:'.length) : trimmed;
  return bare.toLowerCase();
}
