/**
 * Leaf values: one scalar or one homogeneous array, tagged with its kind.
 */

import type { Compound } from './compound.js';
import { TypeMismatchError, ValueRangeError } from './errors.js';
import { Kind } from './kind.js';
import type { Node } from './node.js';
import { stringify } from './stringify.js';
import { KIND_TABLE, type KindOps, type LeafKind, type LeafPayload } from './table.js';

const INT64_MIN = -(1n << 63n);
const INT64_MAX = (1n << 63n) - 1n;

const INT_BOUNDS = {
  [Kind.Byte]: [-0x80, 0x7f],
  [Kind.Short]: [-0x8000, 0x7fff],
  [Kind.Int]: [-0x8000_0000, 0x7fff_ffff],
} as const;

type IntKind = keyof typeof INT_BOUNDS;

function checkInt(kind: IntKind, reported: Kind, value: number): number {
  const [min, max] = INT_BOUNDS[kind];
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValueRangeError(reported, value);
  }
  return value;
}

function checkInts(kind: IntKind, reported: Kind, values: ArrayLike<number>): ArrayLike<number> {
  for (let i = 0; i < values.length; i++) checkInt(kind, reported, values[i]);
  return values;
}

function toInt64(reported: Kind, value: bigint | number): bigint {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) throw new ValueRangeError(reported, value);
    return BigInt(value);
  }
  if (value < INT64_MIN || value > INT64_MAX) throw new ValueRangeError(reported, value);
  return value;
}

export class Leaf<K extends LeafKind = LeafKind> {
  /**
   * Wraps `value` without copying or validating it; the leaf takes
   * ownership. Prefer the kind-specific factories.
   */
  static of<K extends LeafKind>(kind: K, value: LeafPayload[K]): Leaf<K> {
    return new Leaf(kind, value);
  }

  static byte(value: number): Leaf<Kind.Byte> {
    return new Leaf(Kind.Byte, checkInt(Kind.Byte, Kind.Byte, value));
  }

  static short(value: number): Leaf<Kind.Short> {
    return new Leaf(Kind.Short, checkInt(Kind.Short, Kind.Short, value));
  }

  static int(value: number): Leaf<Kind.Int> {
    return new Leaf(Kind.Int, checkInt(Kind.Int, Kind.Int, value));
  }

  static long(value: bigint | number): Leaf<Kind.Long> {
    return new Leaf(Kind.Long, toInt64(Kind.Long, value));
  }

  /** Rounded to single precision. */
  static float(value: number): Leaf<Kind.Float> {
    return new Leaf(Kind.Float, Math.fround(value));
  }

  static double(value: number): Leaf<Kind.Double> {
    return new Leaf(Kind.Double, value);
  }

  static string(value: string): Leaf<Kind.String> {
    return new Leaf(Kind.String, value);
  }

  static byteArray(values: ArrayLike<number>): Leaf<Kind.ByteArray> {
    return new Leaf(Kind.ByteArray, Int8Array.from(checkInts(Kind.Byte, Kind.ByteArray, values)));
  }

  static shortArray(values: ArrayLike<number>): Leaf<Kind.ShortArray> {
    return new Leaf(Kind.ShortArray, Int16Array.from(checkInts(Kind.Short, Kind.ShortArray, values)));
  }

  static intArray(values: ArrayLike<number>): Leaf<Kind.IntArray> {
    return new Leaf(Kind.IntArray, Int32Array.from(checkInts(Kind.Int, Kind.IntArray, values)));
  }

  static longArray(values: ArrayLike<bigint | number>): Leaf<Kind.LongArray> {
    return new Leaf(Kind.LongArray, BigInt64Array.from(values, (v) => toInt64(Kind.LongArray, v)));
  }

  static floatArray(values: ArrayLike<number>): Leaf<Kind.FloatArray> {
    return new Leaf(Kind.FloatArray, Float32Array.from(values));
  }

  static doubleArray(values: ArrayLike<number>): Leaf<Kind.DoubleArray> {
    return new Leaf(Kind.DoubleArray, Float64Array.from(values));
  }

  static stringArray(values: ArrayLike<string>): Leaf<Kind.StringArray> {
    return new Leaf(Kind.StringArray, Array.from(values));
  }

  /** The array is copied; the compounds in it are not. */
  static compoundArray(values: ArrayLike<Compound>): Leaf<Kind.CompoundArray> {
    return new Leaf(Kind.CompoundArray, Array.from(values));
  }

  private constructor(
    readonly kind: K,
    readonly value: LeafPayload[K]
  ) {}

  private get ops(): KindOps<LeafPayload[K]> {
    return KIND_TABLE[this.kind];
  }

  /** 1 for scalars, the element count for arrays. */
  get size(): number {
    return this.ops.size(this.value);
  }

  is<E extends LeafKind>(kind: E): this is Leaf<E> {
    const own: LeafKind = this.kind;
    return own === kind;
  }

  private expect<E extends LeafKind>(kind: E): LeafPayload[E] {
    const self: Leaf = this;
    if (self.is(kind)) return self.value;
    throw new TypeMismatchError(kind, this.kind);
  }

  asByte(): number {
    return this.expect(Kind.Byte);
  }

  asShort(): number {
    return this.expect(Kind.Short);
  }

  asInt(): number {
    return this.expect(Kind.Int);
  }

  asLong(): bigint {
    return this.expect(Kind.Long);
  }

  asFloat(): number {
    return this.expect(Kind.Float);
  }

  asDouble(): number {
    return this.expect(Kind.Double);
  }

  asString(): string {
    return this.expect(Kind.String);
  }

  asByteArray(): Int8Array {
    return this.expect(Kind.ByteArray);
  }

  asShortArray(): Int16Array {
    return this.expect(Kind.ShortArray);
  }

  asIntArray(): Int32Array {
    return this.expect(Kind.IntArray);
  }

  asLongArray(): BigInt64Array {
    return this.expect(Kind.LongArray);
  }

  asFloatArray(): Float32Array {
    return this.expect(Kind.FloatArray);
  }

  asDoubleArray(): Float64Array {
    return this.expect(Kind.DoubleArray);
  }

  asStringArray(): string[] {
    return this.expect(Kind.StringArray);
  }

  asCompoundArray(): Compound[] {
    return this.expect(Kind.CompoundArray);
  }

  asLeaf(): Leaf {
    return this;
  }

  asCompound(): Compound {
    throw new TypeMismatchError(Kind.Compound, this.kind);
  }

  /** Arrays get fresh storage; compound elements are deep-copied. */
  copy(): Leaf<K> {
    return new Leaf(this.kind, this.ops.copy(this.value));
  }

  equals(other: Node): boolean {
    if (other === this) return true;
    if (other.kind === Kind.Compound || !other.is(this.kind)) return false;
    const ops = this.ops;
    return ops.size(this.value) === ops.size(other.value) && ops.equals(this.value, other.value);
  }

  toString(): string {
    return stringify(this);
  }
}

