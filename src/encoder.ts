/**
 * Binary encoding. Every node starts with its kind byte; compounds inside a
 * compound array are written without it (contents only).
 */

import type { Compound } from './compound.js';
import { DataWriter, type ByteSink } from './io.js';
import { Kind } from './kind.js';
import type { Leaf } from './leaf.js';
import type { Node } from './node.js';
import { KIND_TABLE, type KindOps, type LeafKind, type LeafPayload } from './table.js';

function writeCompound(out: DataWriter, compound: Compound): void {
  out.writeInt32(compound.size);
  for (const [name, node] of compound) {
    out.writeUTF(name);
    writeNode(out, node);
  }
}

function writeLeaf<K extends LeafKind>(out: DataWriter, leaf: Leaf<K>): void {
  const ops: KindOps<LeafPayload[K]> = KIND_TABLE[leaf.kind];
  ops.write(out, leaf.value, writeCompound);
}

function writeNode(out: DataWriter, node: Node): void {
  out.writeInt8(node.kind);
  if (node.kind === Kind.Compound) writeCompound(out, node);
  else writeLeaf(out, node);
}

/**
 * Encode a node, tag byte first.
 */
export function encode(node: Node): Uint8Array {
  const out = new DataWriter();
  writeNode(out, node);
  return out.toBytes();
}

/**
 * Encode a node into `sink` with a single write. Errors thrown by the sink
 * reach the caller as they are.
 */
export function encodeTo(node: Node, sink: ByteSink): void {
  sink.write(encode(node));
}
