import { createHash } from 'node:crypto';

const UNSAFE_CHARACTERS = /[/\\:*?"<>|\s\x00-\x1f\x7f]/g;

export const MAX_SLUG_LENGTH = 100;

/**
 * Byte budget for a file stem. Leaves room for `.json` and the
 * `.<uuid>.tmp` suffix of an atomic write under a 255-byte name limit.
 */
export const MAX_STEM_BYTES = 200;

/** Longest prefix of `value` within `maxBytes` of UTF-8, cut between code points. */
export function truncateUtf8(value: string, maxBytes: number): string {
  let bytes = 0;
  let out = '';
  for (const char of value) {
    const size = Buffer.byteLength(char, 'utf8');
    if (bytes + size > maxBytes) break;
    bytes += size;
    out += char;
  }
  return out;
}

/**
 * Storage key for a topic name. Distinct names may collide; colliding names
 * share one index.
 */
export function slugify(name: string): string {
  const safe = Array.from(name.trim().replace(UNSAFE_CHARACTERS, '_'))
    .slice(0, MAX_SLUG_LENGTH)
    .join('');
  return truncateUtf8(safe, MAX_STEM_BYTES);
}

/**
 * File name for a document id. Ids can hold URL characters, so they are
 * percent-encoded; an encoding over budget keeps a prefix plus a hash of the
 * full id so long ids stay distinct.
 */
export function fileKey(id: string): string {
  const encoded = encodeURIComponent(id);
  if (encoded.length <= MAX_STEM_BYTES) return `${encoded}.json`;
  const hash = createHash('sha256').update(id).digest('hex').slice(0, 16);
  return `${encoded.slice(0, MAX_STEM_BYTES - hash.length - 1)}~${hash}.json`;
}
