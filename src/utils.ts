import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import { randomBytes } from 'crypto';
import { Key, KeyInput, ValueInput } from './types.js';

/** Letters, digits and punctuation that are valid in file names everywhere. */
const SAFE_CODE_POINT = /^[\p{L}\p{N}._-]$/u;

const SLASH = 0x2f;
const DOT = 0x2e;
const SLASH_ESCAPE = '_%_';
const ESCAPE_MARKER = '#';

export const TEMP_PREFIX = '.tmp-';

export function isSafeCodePoint(codePoint: number): boolean {
  return SAFE_CODE_POINT.test(String.fromCodePoint(codePoint));
}

/**
 * Signed varint: zig-zag then base-128 groups, low group first,
 * continuation bit set on every byte but the last.
 */
export function encodeVarint(value: number): number[] {
  let unsigned = value >= 0 ? value * 2 : -value * 2 - 1;
  const out: number[] = [];
  while (unsigned >= 0x80) {
    out.push((unsigned % 0x80) | 0x80);
    unsigned = Math.floor(unsigned / 0x80);
  }
  out.push(unsigned);
  return out;
}

function toHex(bytes: number[]): string {
  return bytes.map((b) => b.toString(16).padStart(2, '0')).join('');
}

interface DecodedUnit {
  /** Code point, or null when the byte at this position is not valid UTF-8 */
  codePoint: number | null;
  size: number;
}

function isContinuation(byte: number | undefined, lo = 0x80, hi = 0xbf): boolean {
  return byte !== undefined && byte >= lo && byte <= hi;
}

/**
 * Decode one UTF-8 sequence starting at `i`. Overlong forms, surrogates and
 * values past U+10FFFF are rejected one byte at a time.
 */
function decodeUnit(bytes: Key, i: number): DecodedUnit {
  const b0 = bytes[i];
  const invalid: DecodedUnit = { codePoint: null, size: 1 };

  if (b0 < 0x80) return { codePoint: b0, size: 1 };

  if (b0 >= 0xc2 && b0 <= 0xdf) {
    if (!isContinuation(bytes[i + 1])) return invalid;
    return { codePoint: ((b0 & 0x1f) << 6) | (bytes[i + 1] & 0x3f), size: 2 };
  }

  if (b0 >= 0xe0 && b0 <= 0xef) {
    const lo = b0 === 0xe0 ? 0xa0 : 0x80;
    const hi = b0 === 0xed ? 0x9f : 0xbf;
    if (!isContinuation(bytes[i + 1], lo, hi) || !isContinuation(bytes[i + 2])) return invalid;
    return {
      codePoint: ((b0 & 0x0f) << 12) | ((bytes[i + 1] & 0x3f) << 6) | (bytes[i + 2] & 0x3f),
      size: 3,
    };
  }

  if (b0 >= 0xf0 && b0 <= 0xf4) {
    const lo = b0 === 0xf0 ? 0x90 : 0x80;
    const hi = b0 === 0xf4 ? 0x8f : 0xbf;
    if (
      !isContinuation(bytes[i + 1], lo, hi) ||
      !isContinuation(bytes[i + 2]) ||
      !isContinuation(bytes[i + 3])
    ) {
      return invalid;
    }
    return {
      codePoint:
        ((b0 & 0x07) << 18) |
        ((bytes[i + 1] & 0x3f) << 12) |
        ((bytes[i + 2] & 0x3f) << 6) |
        (bytes[i + 3] & 0x3f),
      size: 4,
    };
  }

  return invalid;
}

/**
 * Map a key to a file name, injectively, keeping readable keys readable.
 *
 * Safe code points pass through, `/` becomes `_%_`, and anything else becomes
 * `#` plus the hex of its signed varint. Bytes that are not valid UTF-8 are
 * escaped as the varint of `-(byte + 1)`, which no code point produces. A
 * leading `.` is escaped so that no key can name `.`, `..` or a dot file
 * owned by the cache. The empty key maps to the empty name.
 */
export function escapeKey(key: Key): string {
  const parts: string[] = [];
  let i = 0;
  while (i < key.length) {
    const { codePoint, size } = decodeUnit(key, i);
    if (codePoint === null) {
      parts.push(ESCAPE_MARKER, toHex(encodeVarint(-(key[i] + 1))));
    } else if (codePoint === SLASH) {
      parts.push(SLASH_ESCAPE);
    } else if (isSafeCodePoint(codePoint) && !(i === 0 && codePoint === DOT)) {
      parts.push(String.fromCodePoint(codePoint));
    } else {
      parts.push(ESCAPE_MARKER, toHex(encodeVarint(codePoint)));
    }
    i += size;
  }
  return parts.join('');
}

/** Strings become their UTF-8 bytes; byte arrays are used as they are. */
export function toBytes(input: KeyInput | ValueInput): Uint8Array {
  return typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
}

/**
 * Render a key for log messages without echoing raw bytes.
 */
export function describeKey(key: Key): string {
  return key.length === 0 ? '<anchor>' : escapeKey(key);
}

export interface WriteOptions {
  mode: number;
  atomic: boolean;
}

/**
 * Generate a temporary path beside the target so the rename stays on one device.
 * Names start with a dot, which no escaped key does.
 */
function getTempPath(filePath: string): string {
  const id = randomBytes(8).toString('hex');
  return join(dirname(filePath), `${TEMP_PREFIX}${id}`);
}

/**
 * File write with overwrite semantics: write to temp, then rename, unless atomic writes are off.
 */
export async function writeFileAtomic(
  filePath: string,
  data: Uint8Array,
  options: WriteOptions
): Promise<void> {
  if (!options.atomic) {
    await fs.writeFile(filePath, data, { mode: options.mode });
    return;
  }

  const tempPath = getTempPath(filePath);
  try {
    await fs.writeFile(tempPath, data, { mode: options.mode });
    await fs.rename(tempPath, filePath);
  } catch (err) {
    await fs.rm(tempPath, { force: true });
    throw err;
  }
}
