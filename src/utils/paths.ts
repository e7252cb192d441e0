import * as path from 'path';
import { createHash } from 'crypto';

/** Byte-order comparison of archive paths; never locale dependent. */
export function compareArchivePaths(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function toPosix(p: string): string {
  return p.replace(/\\/g, '/');
}

/** Root-relative posix path, or null when `target` lies outside `root`. */
export function relativePosix(root: string, target: string): string | null {
  const rel = toPosix(path.relative(root, target));
  if (rel === '..' || rel.startsWith('../') || path.isAbsolute(rel)) return null;
  return rel;
}

/** Normalizes an archive path and rejects anything that climbs out of the archive root. */
export function normalizeArchivePath(raw: string): string | null {
  const trimmed = toPosix(raw).replace(/^\/+/, '');
  if (trimmed.split('/').includes('..')) return null;
  const normalized = path.posix.normalize(trimmed);
  if (normalized === '.' || normalized === '') return null;
  return normalized.replace(/\/+$/, '');
}

export function sha256Hex(data: Uint8Array | string): string {
  return createHash('sha256').update(data).digest('hex');
}

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

function canonicalize(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(canonicalize);
  }
  if (value !== null && typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const key of Object.keys(value).sort(compareArchivePaths)) {
      out[key] = canonicalize(value[key]);
    }
    return out;
  }
  return value;
}

/** JSON text with object keys sorted, so equal values always serialize identically. */
export function stableStringify(value: JsonValue, indent: number = 0): string {
  return JSON.stringify(canonicalize(value), null, indent);
}

export type { JsonValue };
