import { Compound, Kind, Leaf, TypeMismatchError, ValueRangeError } from '../src/index.js';
import { catchError } from './helpers.js';

describe('leaf factories and accessors', () => {
  test('scalars read back through their own accessor', () => {
    expect(Leaf.byte(42).asByte()).toBe(42);
    expect(Leaf.short(-300).asShort()).toBe(-300);
    expect(Leaf.int(44).asInt()).toBe(44);
    expect(Leaf.long(45).asLong()).toBe(45n);
    expect(Leaf.float(0.1).asFloat()).toBe(Math.fround(0.1));
    expect(Leaf.double(0.1).asDouble()).toBe(0.1);
    expect(Leaf.string('48').asString()).toBe('48');
  });

  test('arrays read back through their own accessor', () => {
    expect(Array.from(Leaf.byteArray([1, -1]).asByteArray())).toEqual([1, -1]);
    expect(Array.from(Leaf.shortArray([2]).asShortArray())).toEqual([2]);
    expect(Array.from(Leaf.intArray([3, 4]).asIntArray())).toEqual([3, 4]);
    expect(Array.from(Leaf.longArray([5, 6n]).asLongArray())).toEqual([5n, 6n]);
    expect(Array.from(Leaf.floatArray([0.5]).asFloatArray())).toEqual([0.5]);
    expect(Array.from(Leaf.doubleArray([7.25]).asDoubleArray())).toEqual([7.25]);
    expect(Leaf.stringArray(['a', 'b']).asStringArray()).toEqual(['a', 'b']);
    const inner = Compound.of(['x', Leaf.int(1)]);
    expect(Leaf.compoundArray([inner]).asCompoundArray()[0]).toBe(inner);
  });

  test('kind and size', () => {
    expect(Leaf.int(1).kind).toBe(Kind.Int);
    expect(Leaf.int(1).size).toBe(1);
    expect(Leaf.string('long text').size).toBe(1);
    expect(Leaf.intArray([1, 2, 3]).size).toBe(3);
    expect(Leaf.compoundArray([]).size).toBe(0);
  });

  test('of wraps a typed payload', () => {
    const leaf = Leaf.of(Kind.Int, 5);
    expect(leaf.asInt()).toBe(5);
    expect(leaf.equals(Leaf.int(5))).toBe(true);
  });

  test('is narrows by kind', () => {
    const leaf: Leaf = Leaf.short(9);
    expect(leaf.is(Kind.Short)).toBe(true);
    expect(leaf.is(Kind.Int)).toBe(false);
    if (leaf.is(Kind.Short)) expect(leaf.value + 1).toBe(10);
  });

  test('array factories copy their input', () => {
    const source = [1, 2];
    const leaf = Leaf.intArray(source);
    source[0] = 5;
    expect(leaf.asIntArray()[0]).toBe(1);
    const typed = new Float64Array([1.5]);
    const doubles = Leaf.doubleArray(typed);
    typed[0] = 2.5;
    expect(doubles.asDoubleArray()[0]).toBe(1.5);
  });
});

describe('leaf type safety', () => {
  test('wrong accessor throws a mismatch naming both kinds', () => {
    const err = catchError(() => Leaf.int(42).asIntArray(), TypeMismatchError);
    expect(err.expected).toBe(Kind.IntArray);
    expect(err.actual).toBe(Kind.Int);
    expect(err.message).toBe('Expected INT_ARRAY, got INT');
  });

  test('no widening between integer kinds', () => {
    expect(() => Leaf.byte(1).asInt()).toThrow(TypeMismatchError);
    expect(() => Leaf.int(1).asLong()).toThrow(TypeMismatchError);
    expect(() => Leaf.float(1).asDouble()).toThrow(TypeMismatchError);
  });

  test('a leaf is not a compound', () => {
    const err = catchError(() => Leaf.int(42).asCompound(), TypeMismatchError);
    expect(err.expected).toBe(Kind.Compound);
    expect(err.actual).toBe(Kind.Int);
  });

  test('integer factories reject values outside their width', () => {
    expect(() => Leaf.byte(128)).toThrow(ValueRangeError);
    expect(() => Leaf.byte(-129)).toThrow(ValueRangeError);
    expect(() => Leaf.short(1.5)).toThrow(ValueRangeError);
    expect(() => Leaf.int(2 ** 31)).toThrow(ValueRangeError);
    expect(() => Leaf.long(1n << 63n)).toThrow(ValueRangeError);
    expect(() => Leaf.long(2 ** 53)).toThrow(ValueRangeError);
    const err = catchError(() => Leaf.byteArray([1, 200]), ValueRangeError);
    expect(err.kind).toBe(Kind.ByteArray);
    expect(err.message).toBe('200 is not a valid BYTE_ARRAY value');
  });

  test('edge values are accepted', () => {
    expect(Leaf.byte(-128).asByte()).toBe(-128);
    expect(Leaf.short(32767).asShort()).toBe(32767);
    expect(Leaf.int(-(2 ** 31)).asInt()).toBe(-(2 ** 31));
    expect(Leaf.long(-(1n << 63n)).asLong()).toBe(-(1n << 63n));
  });
});

describe('leaf copy and equality', () => {
  test('array copies do not share storage', () => {
    const original = Leaf.intArray([1, 2, 3]);
    const copy = original.copy();
    expect(copy.equals(original)).toBe(true);
    copy.asIntArray()[0] = 9;
    expect(original.asIntArray()[0]).toBe(1);
    expect(copy.equals(original)).toBe(false);
  });

  test('string array copies do not share storage', () => {
    const original = Leaf.stringArray(['a']);
    const copy = original.copy();
    copy.asStringArray().push('b');
    expect(original.asStringArray()).toEqual(['a']);
  });

  test('compound array copies are deep', () => {
    const original = Leaf.compoundArray([Compound.of(['x', Leaf.int(1)])]);
    const copy = original.copy();
    expect(copy.equals(original)).toBe(true);
    copy.asCompoundArray()[0].set('x', Leaf.int(2));
    expect(original.asCompoundArray()[0].getInt('x')).toBe(1);
    expect(copy.equals(original)).toBe(false);
  });

  test('scalar copies are equal', () => {
    const leaf = Leaf.long(7n);
    expect(leaf.copy().equals(leaf)).toBe(true);
    expect(leaf.copy()).not.toBe(leaf);
  });

  test('equality needs the same kind and contents', () => {
    expect(Leaf.int(1).equals(Leaf.int(1))).toBe(true);
    expect(Leaf.int(1).equals(Leaf.short(1))).toBe(false);
    expect(Leaf.int(1).equals(Leaf.int(2))).toBe(false);
    expect(Leaf.intArray([1]).equals(Leaf.intArray([1, 1]))).toBe(false);
    expect(Leaf.stringArray(['a']).equals(Leaf.stringArray(['a']))).toBe(true);
    expect(Leaf.int(1).equals(Compound.empty())).toBe(false);
  });

  test('floating equality treats NaN as equal and signed zeros as distinct', () => {
    expect(Leaf.double(Number.NaN).equals(Leaf.double(Number.NaN))).toBe(true);
    expect(Leaf.floatArray([Number.NaN]).equals(Leaf.floatArray([Number.NaN]))).toBe(true);
    expect(Leaf.double(0).equals(Leaf.double(-0))).toBe(false);
  });
});
