/**
 * Modified UTF-8, as written by java.io.DataOutput#writeUTF: UTF-16 code
 * units are encoded one at a time (surrogate halves take three bytes each)
 * and U+0000 is written as the two-byte form 0xC0 0x80.
 */

import { DecodeError, EncodeError } from './errors.js';

const MAX_UTF_LENGTH = 0xffff;

function encodedLength(s: string): number {
  let length = 0;
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    if (c >= 0x0001 && c <= 0x007f) length += 1;
    else if (c <= 0x07ff) length += 2;
    else length += 3;
  }
  return length;
}

export function encodeModifiedUtf8(s: string): Uint8Array {
  const length = encodedLength(s);
  if (length > MAX_UTF_LENGTH) {
    throw new EncodeError(`Encoded string too long: ${length} bytes`);
  }
  const out = new Uint8Array(length);
  let off = 0;
  for (let i = 0; i < s.length; i++) {
    const c = s.charCodeAt(i);
    if (c >= 0x0001 && c <= 0x007f) {
      out[off++] = c;
    } else if (c <= 0x07ff) {
      out[off++] = 0xc0 | (c >> 6);
      out[off++] = 0x80 | (c & 0x3f);
    } else {
      out[off++] = 0xe0 | (c >> 12);
      out[off++] = 0x80 | ((c >> 6) & 0x3f);
      out[off++] = 0x80 | (c & 0x3f);
    }
  }
  return out;
}

/**
 * @param byteOffset stream offset of `bytes[0]`, for error messages
 */
export function decodeModifiedUtf8(bytes: Uint8Array, byteOffset = 0): string {
  const units: number[] = [];
  let i = 0;
  function fail(): never {
    throw new DecodeError('Malformed modified UTF-8 input', { byteOffset: byteOffset + i });
  }
  function continuation(at: number): number {
    if (at >= bytes.length) fail();
    const b = bytes[at];
    if ((b & 0xc0) !== 0x80) fail();
    return b & 0x3f;
  }
  while (i < bytes.length) {
    const b = bytes[i];
    if (b < 0x80) {
      units.push(b);
      i += 1;
    } else if ((b & 0xe0) === 0xc0) {
      units.push(((b & 0x1f) << 6) | continuation(i + 1));
      i += 2;
    } else if ((b & 0xf0) === 0xe0) {
      units.push(((b & 0x0f) << 12) | (continuation(i + 1) << 6) | continuation(i + 2));
      i += 3;
    } else {
      fail();
    }
  }
  let s = '';
  // chunked to stay under the engine's argument count limit
  for (let start = 0; start < units.length; start += 8192) {
    s += String.fromCharCode(...units.slice(start, start + 8192));
  }
  return s;
}
