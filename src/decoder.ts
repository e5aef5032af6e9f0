/**
 * Binary decoding, driven by the kind byte in front of every node.
 */

import { Compound } from './compound.js';
import { DecodeError, TypeMismatchError } from './errors.js';
import { BufferSource, DataReader, type ByteSource } from './io.js';
import { Kind, kindFromByte } from './kind.js';
import { Leaf } from './leaf.js';
import type { Node } from './node.js';
import { KIND_TABLE, type KindOps, type LeafKind, type LeafPayload } from './table.js';

export interface DecodeOptions {
  /** Max compound nesting, the root compound counting as 1 (default: unlimited) */
  maxDepth?: number;
}

/**
 * Decode one node. A `Uint8Array` must hold exactly one document; a
 * `ByteSource` is left positioned right after it.
 */
export function decode(input: Uint8Array | ByteSource, options: DecodeOptions = {}): Node {
  const maxDepth = options.maxDepth ?? Number.POSITIVE_INFINITY;
  let buffer: BufferSource | undefined;
  let source: ByteSource;
  if (input instanceof Uint8Array) {
    buffer = new BufferSource(input);
    source = buffer;
  } else {
    source = input;
  }
  const reader = new DataReader(source);
  let depth = 0;

  function readCompound(r: DataReader): Compound {
    if (depth >= maxDepth) {
      throw new DecodeError('Maximum nesting depth exceeded', { byteOffset: r.offset });
    }
    depth++;
    try {
      const count = r.readCount();
      const entries: [string, Node][] = [];
      for (let i = 0; i < count; i++) {
        const name = r.readUTF();
        entries.push([name, readNode(r)]);
      }
      return Compound.from(entries);
    } finally {
      depth--;
    }
  }

  function readLeaf<K extends LeafKind>(r: DataReader, kind: K): Leaf<K> {
    const ops: KindOps<LeafPayload[K]> = KIND_TABLE[kind];
    return Leaf.of(kind, ops.read(r, readCompound));
  }

  function readNode(r: DataReader): Node {
    const at = r.offset;
    const kind = kindFromByte(r.readUint8(), at);
    if (kind === Kind.Compound) return readCompound(r);
    return readLeaf(r, kind);
  }

  const node = readNode(reader);
  if (buffer !== undefined && buffer.remaining > 0) {
    throw new DecodeError('Trailing bytes after root value', { byteOffset: reader.offset });
  }
  return node;
}

/**
 * Decode a document whose root must be a compound.
 */
export function decodeRoot(input: Uint8Array | ByteSource, options: DecodeOptions = {}): Compound {
  const node = decode(input, options);
  if (node.kind !== Kind.Compound) {
    throw new TypeMismatchError(Kind.Compound, node.kind);
  }
  return node;
}
