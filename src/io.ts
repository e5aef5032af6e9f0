/**
 * Byte sinks and sources, and the big-endian primitive writer/reader the
 * codec runs on.
 */

import { DecodeError } from './errors.js';
import { decodeModifiedUtf8, encodeModifiedUtf8 } from './mutf8.js';

export interface ByteSink {
  write(chunk: Uint8Array): void;
}

export interface ByteSource {
  /** Returns exactly `length` bytes or throws. */
  read(length: number): Uint8Array;
}

const INITIAL = 256;

/**
 * Growable big-endian buffer. Also usable as a sink for another encoder.
 */
export class DataWriter implements ByteSink {
  private buf = new Uint8Array(INITIAL);
  private view = new DataView(this.buf.buffer);
  private off = 0;

  private ensure(n: number): void {
    if (this.off + n > this.buf.length) {
      const next = new Uint8Array(Math.max(this.buf.length * 2, this.off + n));
      next.set(this.buf.subarray(0, this.off));
      this.buf = next;
      this.view = new DataView(next.buffer);
    }
  }

  write(chunk: Uint8Array): void {
    this.ensure(chunk.length);
    this.buf.set(chunk, this.off);
    this.off += chunk.length;
  }

  writeInt8(value: number): void {
    this.ensure(1);
    this.view.setInt8(this.off, value);
    this.off += 1;
  }

  writeInt16(value: number): void {
    this.ensure(2);
    this.view.setInt16(this.off, value, false);
    this.off += 2;
  }

  writeInt32(value: number): void {
    this.ensure(4);
    this.view.setInt32(this.off, value, false);
    this.off += 4;
  }

  writeInt64(value: bigint): void {
    this.ensure(8);
    this.view.setBigInt64(this.off, value, false);
    this.off += 8;
  }

  writeFloat32(value: number): void {
    this.ensure(4);
    this.view.setFloat32(this.off, value, false);
    this.off += 4;
  }

  writeFloat64(value: number): void {
    this.ensure(8);
    this.view.setFloat64(this.off, value, false);
    this.off += 8;
  }

  /** Unsigned 16-bit byte length, then modified UTF-8. */
  writeUTF(value: string): void {
    const bytes = encodeModifiedUtf8(value);
    this.ensure(2 + bytes.length);
    this.view.setUint16(this.off, bytes.length, false);
    this.off += 2;
    this.write(bytes);
  }

  /** Copy of the bytes written so far. */
  toBytes(): Uint8Array {
    return this.buf.slice(0, this.off);
  }
}

/**
 * A source over an in-memory buffer. Chunks are views, not copies.
 */
export class BufferSource implements ByteSource {
  private off = 0;

  constructor(private readonly buffer: Uint8Array) {}

  get offset(): number {
    return this.off;
  }

  get remaining(): number {
    return this.buffer.length - this.off;
  }

  read(length: number): Uint8Array {
    if (length > this.remaining) {
      throw new DecodeError('Truncated input', { byteOffset: this.off });
    }
    const chunk = this.buffer.subarray(this.off, this.off + length);
    this.off += length;
    return chunk;
  }
}

export class DataReader {
  private off = 0;

  constructor(private readonly source: ByteSource) {}

  /** Bytes consumed through this reader. */
  get offset(): number {
    return this.off;
  }

  readBytes(length: number): Uint8Array {
    const chunk = this.source.read(length);
    this.off += length;
    return chunk;
  }

  private view(length: number): DataView {
    const chunk = this.readBytes(length);
    return new DataView(chunk.buffer, chunk.byteOffset, chunk.byteLength);
  }

  readUint8(): number {
    return this.view(1).getUint8(0);
  }

  readInt8(): number {
    return this.view(1).getInt8(0);
  }

  readInt16(): number {
    return this.view(2).getInt16(0, false);
  }

  readInt32(): number {
    return this.view(4).getInt32(0, false);
  }

  readInt64(): bigint {
    return this.view(8).getBigInt64(0, false);
  }

  readFloat32(): number {
    return this.view(4).getFloat32(0, false);
  }

  readFloat64(): number {
    return this.view(8).getFloat64(0, false);
  }

  /** Element or entry count; negative counts are malformed. */
  readCount(): number {
    const at = this.off;
    const count = this.readInt32();
    if (count < 0) throw new DecodeError(`Negative length: ${count}`, { byteOffset: at });
    return count;
  }

  readUTF(): string {
    const length = this.view(2).getUint16(0, false);
    const at = this.off;
    return decodeModifiedUtf8(this.readBytes(length), at);
  }
}
