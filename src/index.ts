export { Kind, isArrayKind, kindFromByte, kindName } from './kind.js';
export type { KindOps, LeafKind, LeafPayload } from './table.js';
export { Leaf } from './leaf.js';
export { Compound } from './compound.js';
export type { CompoundInit } from './compound.js';
export { isCompound, isLeaf } from './node.js';
export type { Node } from './node.js';
export { encode, encodeTo } from './encoder.js';
export { decode, decodeRoot } from './decoder.js';
export type { DecodeOptions } from './decoder.js';
export { BufferSource, DataReader, DataWriter } from './io.js';
export type { ByteSink, ByteSource } from './io.js';
export { decodeModifiedUtf8, encodeModifiedUtf8 } from './mutf8.js';
export { FileSink, FileSource, readNodeFile, readRootFile, writeNodeFile } from './file.js';
export { stringify } from './stringify.js';
export type { StringifyOptions } from './stringify.js';
export {
  BintagError,
  CompositeNotDataError,
  DecodeError,
  EncodeError,
  IncompatibleReplacementError,
  KeyNotFoundError,
  TypeMismatchError,
  UnknownDiscriminantError,
  ValueRangeError,
} from './errors.js';
