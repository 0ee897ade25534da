/**
 * Byte-level conversion of host text into ProDOS TEXT content
 */

import { EncodingError } from './errors.js';
import { AsciiMode } from './types.js';

const CR = 0x0d;
const LF = 0x0a;
const QUESTION_MARK = 0x3f;
export const MAX_ASCII = 0x7f;

/**
 * CRLF and lone LF both become CR. An existing CR is kept and never doubled,
 * so the function is idempotent.
 */
export function normalizeLineEndings(data: Uint8Array): Buffer {
  const out = Buffer.allocUnsafe(data.length);
  let length = 0;

  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    if (byte === CR && data[i + 1] === LF) {
      out[length++] = CR;
      i++;
      continue;
    }
    out[length++] = byte === LF ? CR : byte;
  }

  return out.subarray(0, length);
}

/**
 * Index of the first byte above 0x7F, or -1.
 */
export function findNonAscii(data: Uint8Array): number {
  for (let i = 0; i < data.length; i++) {
    if (data[i] > MAX_ASCII) return i;
  }
  return -1;
}

export function convertToAscii(data: Uint8Array, mode: AsciiMode): Buffer {
  const firstNonAscii = findNonAscii(data);

  if (firstNonAscii === -1) {
    return Buffer.from(data);
  }

  if (mode === 'strict') {
    throw new EncodingError(firstNonAscii, data[firstNonAscii]);
  }

  const out = Buffer.from(data);
  for (let i = firstNonAscii; i < out.length; i++) {
    if (out[i] > MAX_ASCII) out[i] = QUESTION_MARK;
  }
  return out;
}

/**
 * Both stages in the order the converter applies them.
 */
export function toProdosText(data: Uint8Array, mode: AsciiMode): Buffer {
  return convertToAscii(normalizeLineEndings(data), mode);
}
