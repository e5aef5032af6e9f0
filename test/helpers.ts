import { Compound, Leaf } from '../src/index.js';

/** One entry of every leaf kind, plus nesting and empty values. */
export const everyKind = (): Compound =>
  Compound.of(
    ['byte', Leaf.byte(42)],
    ['short', Leaf.short(43)],
    ['int', Leaf.int(44)],
    ['long', Leaf.long(45n)],
    ['float', Leaf.float(46)],
    ['double', Leaf.double(47)],
    ['string', Leaf.string('48')],
    [
      'tag',
      Compound.of(
        ['byteArray', Leaf.byteArray([49, 50])],
        ['shortArray', Leaf.shortArray([51, 52])],
        ['intArray', Leaf.intArray([53, 54])],
        ['longArray', Leaf.longArray([55n, 56n])],
        ['floatArray', Leaf.floatArray([57, 58])],
        ['doubleArray', Leaf.doubleArray([59, 60])],
        ['stringArray', Leaf.stringArray(['61', '62'])],
        [
          'tagArray',
          Leaf.compoundArray([
            Compound.of(['tag1', Leaf.string('63')]),
            Compound.of(['tag2', Leaf.string('64')]),
          ]),
        ],
      ),
    ],
    [
      'empty',
      Compound.of(
        ['byteArray', Leaf.byteArray([])],
        ['shortArray', Leaf.shortArray([])],
        ['intArray', Leaf.intArray([])],
        ['longArray', Leaf.longArray([])],
        ['floatArray', Leaf.floatArray([])],
        ['doubleArray', Leaf.doubleArray([])],
        ['stringArray', Leaf.stringArray([])],
        ['tagArray', Leaf.compoundArray([])],
        ['tag', Compound.empty()],
        ['string', Leaf.string('')],
      ),
    ],
  );

export const binTag = (): Compound =>
  Compound.of(
    ['name', Leaf.string('bin-tag')],
    ['version', Leaf.string('1.0.0')],
    ['number', Leaf.int(42)],
    ['subtag', Compound.of(['position', Leaf.floatArray([1.0, 0.0, 0.0, 1.0])])],
  );

/** Run `fn` and return what it throws, which must be a `type`. */
export function catchError<E extends Error>(fn: () => unknown, type: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error('expected a throw');
}
