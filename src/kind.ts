/**
 * Value kinds. The ordinal of each member is its one-byte tag on the wire,
 * so members are append-only.
 */

import { UnknownDiscriminantError } from './errors.js';

export enum Kind {
  Byte = 0,
  Short = 1,
  Int = 2,
  Long = 3,
  Float = 4,
  Double = 5,
  String = 6,
  Compound = 7,
  ByteArray = 8,
  ShortArray = 9,
  IntArray = 10,
  LongArray = 11,
  FloatArray = 12,
  DoubleArray = 13,
  StringArray = 14,
  CompoundArray = 15,
}

const KINDS: readonly Kind[] = [
  Kind.Byte,
  Kind.Short,
  Kind.Int,
  Kind.Long,
  Kind.Float,
  Kind.Double,
  Kind.String,
  Kind.Compound,
  Kind.ByteArray,
  Kind.ShortArray,
  Kind.IntArray,
  Kind.LongArray,
  Kind.FloatArray,
  Kind.DoubleArray,
  Kind.StringArray,
  Kind.CompoundArray,
];

const NAMES: Record<Kind, string> = {
  [Kind.Byte]: 'BYTE',
  [Kind.Short]: 'SHORT',
  [Kind.Int]: 'INT',
  [Kind.Long]: 'LONG',
  [Kind.Float]: 'FLOAT',
  [Kind.Double]: 'DOUBLE',
  [Kind.String]: 'STRING',
  [Kind.Compound]: 'COMPOUND',
  [Kind.ByteArray]: 'BYTE_ARRAY',
  [Kind.ShortArray]: 'SHORT_ARRAY',
  [Kind.IntArray]: 'INT_ARRAY',
  [Kind.LongArray]: 'LONG_ARRAY',
  [Kind.FloatArray]: 'FLOAT_ARRAY',
  [Kind.DoubleArray]: 'DOUBLE_ARRAY',
  [Kind.StringArray]: 'STRING_ARRAY',
  [Kind.CompoundArray]: 'COMPOUND_ARRAY',
};

function isKindByte(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < KINDS.length;
}

/**
 * Validate a tag read from a stream.
 */
export function kindFromByte(value: number, byteOffset?: number): Kind {
  if (!isKindByte(value)) throw new UnknownDiscriminantError(value, { byteOffset });
  return KINDS[value];
}

export function kindName(value: number): string {
  return NAMES[kindFromByte(value)];
}

/** Name for messages; never throws. */
export function kindLabel(value: number): string {
  return isKindByte(value) ? NAMES[KINDS[value]] : `UNKNOWN(${value})`;
}

export function isArrayKind(kind: Kind): boolean {
  return kind >= Kind.ByteArray;
}
