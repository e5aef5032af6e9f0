/**
 * A node is either a leaf or a compound; `kind` tells them apart.
 */

import type { Compound } from './compound.js';
import { Kind } from './kind.js';
import type { Leaf } from './leaf.js';

export type Node = Leaf | Compound;

export function isCompound(node: Node): node is Compound {
  return node.kind === Kind.Compound;
}

export function isLeaf(node: Node): node is Leaf {
  return node.kind !== Kind.Compound;
}
