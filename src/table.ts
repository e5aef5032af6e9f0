/**
 * Per-kind behaviour of leaf payloads: size, copy, equality, rendering and
 * wire layout. Compounds are reached through callbacks so this module only
 * depends on their type.
 */

import type { Compound } from './compound.js';
import type { DataReader, DataWriter } from './io.js';
import { Kind } from './kind.js';

/** In-memory payload of every leaf kind. */
export interface LeafPayload {
  [Kind.Byte]: number;
  [Kind.Short]: number;
  [Kind.Int]: number;
  [Kind.Long]: bigint;
  [Kind.Float]: number;
  [Kind.Double]: number;
  [Kind.String]: string;
  [Kind.ByteArray]: Int8Array;
  [Kind.ShortArray]: Int16Array;
  [Kind.IntArray]: Int32Array;
  [Kind.LongArray]: BigInt64Array;
  [Kind.FloatArray]: Float32Array;
  [Kind.DoubleArray]: Float64Array;
  [Kind.StringArray]: string[];
  [Kind.CompoundArray]: Compound[];
}

export type LeafKind = keyof LeafPayload;

export interface KindOps<P> {
  size(payload: P): number;
  copy(payload: P): P;
  equals(a: P, b: P): boolean;
  render(payload: P, renderCompound: (value: Compound) => string): string;
  /** Writes the payload; the tag byte is the caller's. */
  write(out: DataWriter, payload: P, writeCompound: (out: DataWriter, value: Compound) => void): void;
  read(input: DataReader, readCompound: (input: DataReader) => Compound): P;
}

export type KindTable = { [K in LeafKind]: KindOps<LeafPayload[K]> };

interface Element<T> {
  equals(a: T, b: T): boolean;
  render(value: T): string;
  write(out: DataWriter, value: T): void;
  read(input: DataReader): T;
}

function formatDecimal(value: number): string {
  if (Number.isInteger(value) && Math.abs(value) < 1e21) {
    return Object.is(value, -0) ? '-0.0' : value.toFixed(1);
  }
  return String(value);
}

/** Shortest decimal that rounds back to the same float32. */
function formatFloat32(value: number): string {
  if (!Number.isFinite(value) || Number.isInteger(value)) return formatDecimal(value);
  for (let precision = 1; precision <= 9; precision++) {
    const candidate = Number(value.toPrecision(precision));
    if (Math.fround(candidate) === value) return formatDecimal(candidate);
  }
  return formatDecimal(value);
}

const strictEquals = <T>(a: T, b: T): boolean => a === b;

const int8: Element<number> = {
  equals: strictEquals,
  render: (v) => `${v}b`,
  write: (out, v) => out.writeInt8(v),
  read: (input) => input.readInt8(),
};

const int16: Element<number> = {
  equals: strictEquals,
  render: (v) => `${v}s`,
  write: (out, v) => out.writeInt16(v),
  read: (input) => input.readInt16(),
};

const int32: Element<number> = {
  equals: strictEquals,
  render: (v) => `${v}`,
  write: (out, v) => out.writeInt32(v),
  read: (input) => input.readInt32(),
};

const int64: Element<bigint> = {
  equals: strictEquals,
  render: (v) => `${v}L`,
  write: (out, v) => out.writeInt64(v),
  read: (input) => input.readInt64(),
};

const float32: Element<number> = {
  equals: Object.is,
  render: (v) => `${formatFloat32(v)}f`,
  write: (out, v) => out.writeFloat32(v),
  read: (input) => input.readFloat32(),
};

const float64: Element<number> = {
  equals: Object.is,
  render: (v) => `${formatDecimal(v)}d`,
  write: (out, v) => out.writeFloat64(v),
  read: (input) => input.readFloat64(),
};

const utf: Element<string> = {
  equals: strictEquals,
  render: (v) => JSON.stringify(v),
  write: (out, v) => out.writeUTF(v),
  read: (input) => input.readUTF(),
};

function scalar<T>(element: Element<T>): KindOps<T> {
  return {
    size: () => 1,
    copy: (v) => v,
    equals: (a, b) => element.equals(a, b),
    render: (v) => element.render(v),
    write: (out, v) => element.write(out, v),
    read: (input) => element.read(input),
  };
}

interface TypedArray<T, A> {
  readonly length: number;
  [index: number]: T;
  slice(): A;
}

function sameElements<T>(a: ArrayLike<T>, b: ArrayLike<T>, equals: (x: T, y: T) => boolean): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (!equals(a[i], b[i])) return false;
  }
  return true;
}

/**
 * Fixed-width numeric arrays. The whole body is read as one chunk, so a
 * truncated body fails before the typed array is allocated.
 */
function typedArray<T, A extends TypedArray<T, A>>(
  prefix: string,
  width: number,
  alloc: (length: number) => A,
  get: (view: DataView, offset: number) => T,
  element: Element<T>
): KindOps<A> {
  return {
    size: (a) => a.length,
    copy: (a) => a.slice(),
    equals: (a, b) => sameElements(a, b, element.equals),
    render: (a) => `[${prefix};${Array.from(a, element.render).join(',')}]`,
    write: (out, a) => {
      out.writeInt32(a.length);
      for (let i = 0; i < a.length; i++) element.write(out, a[i]);
    },
    read: (input) => {
      const count = input.readCount();
      const bytes = input.readBytes(count * width);
      const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
      const a = alloc(count);
      for (let i = 0; i < count; i++) a[i] = get(view, i * width);
      return a;
    },
  };
}

export const KIND_TABLE: KindTable = {
  [Kind.Byte]: scalar(int8),
  [Kind.Short]: scalar(int16),
  [Kind.Int]: scalar(int32),
  [Kind.Long]: scalar(int64),
  [Kind.Float]: scalar(float32),
  [Kind.Double]: scalar(float64),
  [Kind.String]: scalar(utf),
  [Kind.ByteArray]: typedArray('B', 1, (n) => new Int8Array(n), (v, o) => v.getInt8(o), int8),
  [Kind.ShortArray]: typedArray('S', 2, (n) => new Int16Array(n), (v, o) => v.getInt16(o, false), int16),
  [Kind.IntArray]: typedArray('I', 4, (n) => new Int32Array(n), (v, o) => v.getInt32(o, false), int32),
  [Kind.LongArray]: typedArray('L', 8, (n) => new BigInt64Array(n), (v, o) => v.getBigInt64(o, false), int64),
  [Kind.FloatArray]: typedArray('F', 4, (n) => new Float32Array(n), (v, o) => v.getFloat32(o, false), float32),
  [Kind.DoubleArray]: typedArray('D', 8, (n) => new Float64Array(n), (v, o) => v.getFloat64(o, false), float64),
  [Kind.StringArray]: {
    size: (a) => a.length,
    copy: (a) => a.slice(),
    equals: (a, b) => sameElements(a, b, utf.equals),
    render: (a) => `[${a.map(utf.render).join(',')}]`,
    write: (out, a) => {
      out.writeInt32(a.length);
      for (const s of a) utf.write(out, s);
    },
    read: (input) => {
      const count = input.readCount();
      const a: string[] = [];
      for (let i = 0; i < count; i++) a.push(utf.read(input));
      return a;
    },
  },
  [Kind.CompoundArray]: {
    size: (a) => a.length,
    copy: (a) => a.map((c) => c.copy()),
    equals: (a, b) => sameElements(a, b, (x, y) => x.equals(y)),
    render: (a, renderCompound) => `[${a.map(renderCompound).join(',')}]`,
    write: (out, a, writeCompound) => {
      out.writeInt32(a.length);
      for (const c of a) writeCompound(out, c);
    },
    read: (input, readCompound) => {
      const count = input.readCount();
      const a: Compound[] = [];
      for (let i = 0; i < count; i++) a.push(readCompound(input));
      return a;
    },
  },
};
