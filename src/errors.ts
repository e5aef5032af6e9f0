/**
 * bintag errors. Decode-side errors carry the byte offset they were raised at.
 */

import { Kind, kindLabel } from './kind.js';

type ConstructorOptions = { byteOffset?: number; cause?: unknown };

export class BintagError extends Error {
  override readonly name: string = 'BintagError';
  readonly byteOffset?: number;

  constructor(message: string, options?: ConstructorOptions) {
    super(message);
    this.byteOffset = options?.byteOffset;
    if (options?.cause !== undefined) this.cause = options.cause;
    Object.setPrototypeOf(this, BintagError.prototype);
  }

  /** Human-readable location string */
  get location(): string {
    if (this.byteOffset !== undefined) {
      return `byte offset ${this.byteOffset}`;
    }
    return '';
  }

  override toString(): string {
    const loc = this.location;
    return loc ? `${this.name}: ${this.message} (${loc})` : `${this.name}: ${this.message}`;
  }
}

export class TypeMismatchError extends BintagError {
  override readonly name = 'TypeMismatchError';
  readonly expected: Kind;
  readonly actual: Kind;
  readonly key?: string;

  constructor(expected: Kind, actual: Kind, options?: ConstructorOptions & { key?: string }) {
    const where = options?.key !== undefined ? ` for '${options.key}'` : '';
    super(`Expected ${kindLabel(expected)}${where}, got ${kindLabel(actual)}`, options);
    this.expected = expected;
    this.actual = actual;
    this.key = options?.key;
    Object.setPrototypeOf(this, TypeMismatchError.prototype);
  }
}

export class KeyNotFoundError extends BintagError {
  override readonly name = 'KeyNotFoundError';
  readonly key: string;

  constructor(key: string) {
    super(`No entry named '${key}'`);
    this.key = key;
    Object.setPrototypeOf(this, KeyNotFoundError.prototype);
  }
}

export class CompositeNotDataError extends BintagError {
  override readonly name = 'CompositeNotDataError';
  readonly key?: string;

  constructor(key?: string) {
    super(key !== undefined ? `Entry '${key}' is a COMPOUND, not data` : 'COMPOUND is not data');
    this.key = key;
    Object.setPrototypeOf(this, CompositeNotDataError.prototype);
  }
}

export class IncompatibleReplacementError extends BintagError {
  override readonly name = 'IncompatibleReplacementError';
  readonly key: string;
  readonly previous: Kind;
  readonly next: Kind;

  constructor(key: string, previous: Kind, next: Kind) {
    super(`Entry '${key}' holds ${kindLabel(previous)}, which does not match the new ${kindLabel(next)}`);
    this.key = key;
    this.previous = previous;
    this.next = next;
    Object.setPrototypeOf(this, IncompatibleReplacementError.prototype);
  }
}

export class UnknownDiscriminantError extends BintagError {
  override readonly name = 'UnknownDiscriminantError';
  readonly value: number;

  constructor(value: number, options?: ConstructorOptions) {
    super(`Unknown type tag: ${value}`, options);
    this.value = value;
    Object.setPrototypeOf(this, UnknownDiscriminantError.prototype);
  }
}

export class ValueRangeError extends BintagError {
  override readonly name = 'ValueRangeError';
  readonly kind: Kind;

  constructor(kind: Kind, value: number | bigint) {
    super(`${String(value)} is not a valid ${kindLabel(kind)} value`);
    this.kind = kind;
    Object.setPrototypeOf(this, ValueRangeError.prototype);
  }
}

export class EncodeError extends BintagError {
  override readonly name = 'EncodeError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, EncodeError.prototype);
  }
}

export class DecodeError extends BintagError {
  override readonly name = 'DecodeError';
  constructor(message: string, options?: ConstructorOptions) {
    super(message, options);
    Object.setPrototypeOf(this, DecodeError.prototype);
  }
}
