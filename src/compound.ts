/**
 * Compound: a mutable mapping from names to nodes. Entry order follows
 * insertion and is kept by copy() and by the codec; equality ignores it.
 */

import {
  CompositeNotDataError,
  IncompatibleReplacementError,
  KeyNotFoundError,
  TypeMismatchError,
} from './errors.js';
import { Kind } from './kind.js';
import { Leaf } from './leaf.js';
import type { Node } from './node.js';
import { stringify } from './stringify.js';

export type CompoundInit =
  | ReadonlyMap<string, Node>
  | Iterable<readonly [string, Node]>
  | { readonly [name: string]: Node };

function isIterable(init: CompoundInit): init is Iterable<readonly [string, Node]> {
  return Symbol.iterator in init;
}

export class Compound implements Iterable<[string, Node]> {
  readonly kind: Kind.Compound = Kind.Compound;
  private readonly entriesByName = new Map<string, Node>();

  static empty(): Compound {
    return new Compound();
  }

  /** Nodes are adopted as given, not copied. */
  static from(init: CompoundInit): Compound {
    const compound = new Compound();
    const entries = isIterable(init) ? init : Object.entries(init);
    for (const [name, node] of entries) compound.entriesByName.set(name, node);
    return compound;
  }

  static of(...entries: (readonly [string, Node])[]): Compound {
    return Compound.from(entries);
  }

  private constructor() {}

  get size(): number {
    return this.entriesByName.size;
  }

  has(name: string): boolean {
    return this.entriesByName.has(name);
  }

  get(name: string): Node {
    const node = this.entriesByName.get(name);
    if (node === undefined) throw new KeyNotFoundError(name);
    return node;
  }

  getTyped(name: string, kind: Kind): Node {
    const node = this.get(name);
    if (node.kind !== kind) throw new TypeMismatchError(kind, node.kind, { key: name });
    return node;
  }

  getData(name: string): Leaf {
    const node = this.get(name);
    if (node.kind === Kind.Compound) throw new CompositeNotDataError(name);
    return node;
  }

  getDataTyped(name: string, kind: Kind): Leaf {
    const node = this.getTyped(name, kind);
    if (node.kind === Kind.Compound) throw new CompositeNotDataError(name);
    return node;
  }

  /**
   * Inserts or replaces an entry. With `checkType`, replacing an entry by a
   * node of another kind throws and leaves the compound untouched.
   */
  set(name: string, node: Node, checkType = true): this {
    if (checkType) {
      const previous = this.entriesByName.get(name);
      if (previous !== undefined && previous.kind !== node.kind) {
        throw new IncompatibleReplacementError(name, previous.kind, node.kind);
      }
    }
    this.entriesByName.set(name, node);
    return this;
  }

  /** Returns the removed node, or undefined when there was none. */
  remove(name: string): Node | undefined {
    const node = this.entriesByName.get(name);
    this.entriesByName.delete(name);
    return node;
  }

  keys(): IterableIterator<string> {
    return this.entriesByName.keys();
  }

  entries(): IterableIterator<[string, Node]> {
    return this.entriesByName.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, Node]> {
    return this.entries();
  }

  /** Live, read-only view of the entries. */
  mapView(): ReadonlyMap<string, Node> {
    return this.entriesByName;
  }

  getCompound(name: string): Compound {
    return this.getTyped(name, Kind.Compound).asCompound();
  }

  getByte(name: string): number {
    return this.getDataTyped(name, Kind.Byte).asByte();
  }

  getShort(name: string): number {
    return this.getDataTyped(name, Kind.Short).asShort();
  }

  getInt(name: string): number {
    return this.getDataTyped(name, Kind.Int).asInt();
  }

  getLong(name: string): bigint {
    return this.getDataTyped(name, Kind.Long).asLong();
  }

  getFloat(name: string): number {
    return this.getDataTyped(name, Kind.Float).asFloat();
  }

  getDouble(name: string): number {
    return this.getDataTyped(name, Kind.Double).asDouble();
  }

  getString(name: string): string {
    return this.getDataTyped(name, Kind.String).asString();
  }

  getByteArray(name: string): Int8Array {
    return this.getDataTyped(name, Kind.ByteArray).asByteArray();
  }

  getShortArray(name: string): Int16Array {
    return this.getDataTyped(name, Kind.ShortArray).asShortArray();
  }

  getIntArray(name: string): Int32Array {
    return this.getDataTyped(name, Kind.IntArray).asIntArray();
  }

  getLongArray(name: string): BigInt64Array {
    return this.getDataTyped(name, Kind.LongArray).asLongArray();
  }

  getFloatArray(name: string): Float32Array {
    return this.getDataTyped(name, Kind.FloatArray).asFloatArray();
  }

  getDoubleArray(name: string): Float64Array {
    return this.getDataTyped(name, Kind.DoubleArray).asDoubleArray();
  }

  getStringArray(name: string): string[] {
    return this.getDataTyped(name, Kind.StringArray).asStringArray();
  }

  getCompoundArray(name: string): Compound[] {
    return this.getDataTyped(name, Kind.CompoundArray).asCompoundArray();
  }

  setCompound(name: string, value: Compound): this {
    return this.set(name, value);
  }

  setByte(name: string, value: number): this {
    return this.set(name, Leaf.byte(value));
  }

  setShort(name: string, value: number): this {
    return this.set(name, Leaf.short(value));
  }

  setInt(name: string, value: number): this {
    return this.set(name, Leaf.int(value));
  }

  setLong(name: string, value: bigint | number): this {
    return this.set(name, Leaf.long(value));
  }

  setFloat(name: string, value: number): this {
    return this.set(name, Leaf.float(value));
  }

  setDouble(name: string, value: number): this {
    return this.set(name, Leaf.double(value));
  }

  setString(name: string, value: string): this {
    return this.set(name, Leaf.string(value));
  }

  setByteArray(name: string, values: ArrayLike<number>): this {
    return this.set(name, Leaf.byteArray(values));
  }

  setShortArray(name: string, values: ArrayLike<number>): this {
    return this.set(name, Leaf.shortArray(values));
  }

  setIntArray(name: string, values: ArrayLike<number>): this {
    return this.set(name, Leaf.intArray(values));
  }

  setLongArray(name: string, values: ArrayLike<bigint | number>): this {
    return this.set(name, Leaf.longArray(values));
  }

  setFloatArray(name: string, values: ArrayLike<number>): this {
    return this.set(name, Leaf.floatArray(values));
  }

  setDoubleArray(name: string, values: ArrayLike<number>): this {
    return this.set(name, Leaf.doubleArray(values));
  }

  setStringArray(name: string, values: ArrayLike<string>): this {
    return this.set(name, Leaf.stringArray(values));
  }

  setCompoundArray(name: string, values: ArrayLike<Compound>): this {
    return this.set(name, Leaf.compoundArray(values));
  }

  asCompound(): Compound {
    return this;
  }

  asLeaf(): Leaf {
    throw new CompositeNotDataError();
  }

  copy(): Compound {
    const compound = new Compound();
    for (const [name, node] of this.entriesByName) {
      compound.entriesByName.set(name, node.copy());
    }
    return compound;
  }

  equals(other: Node): boolean {
    if (other === this) return true;
    if (other.kind !== Kind.Compound || other.size !== this.size) return false;
    for (const [name, node] of this.entriesByName) {
      const theirs = other.entriesByName.get(name);
      if (theirs === undefined || !node.equals(theirs)) return false;
    }
    return true;
  }

  toString(): string {
    return stringify(this);
  }
}
