/**
 * Diagnostic text for nodes. Suffixes mark the numeric kind (42b, 42s, 42,
 * 42L, 4.2f, 4.2d) and typed arrays carry a kind prefix ([B;1b,2b]).
 * Nothing parses this back.
 */

import type { Compound } from './compound.js';
import { Kind } from './kind.js';
import type { Leaf } from './leaf.js';
import type { Node } from './node.js';
import { KIND_TABLE, type KindOps, type LeafKind, type LeafPayload } from './table.js';

export interface StringifyOptions {
  /** Indent string for pretty-print (default: no indent, single line) */
  indent?: string;
  /** Newline (default "\n") */
  newline?: string;
}

const BARE_KEY = /^[A-Za-z0-9_.+-]+$/;

function quoteKey(key: string): string {
  return BARE_KEY.test(key) ? key : JSON.stringify(key);
}

function renderLeaf<K extends LeafKind>(leaf: Leaf<K>, renderCompound: (value: Compound) => string): string {
  const ops: KindOps<LeafPayload[K]> = KIND_TABLE[leaf.kind];
  return ops.render(leaf.value, renderCompound);
}

function stringifyNode(node: Node, indent: string, newline: string, level: number): string {
  if (node.kind !== Kind.Compound) {
    return renderLeaf(node, (c) => stringifyNode(c, indent, newline, level));
  }
  const entries = [...node.entries()];
  if (entries.length === 0) return '{}';
  if (!indent) {
    const pairs = entries.map(([k, v]) => `${quoteKey(k)}:${stringifyNode(v, indent, newline, level)}`);
    return `{${pairs.join(',')}}`;
  }
  const prefix = indent.repeat(level + 1);
  const lines = entries.map(
    ([k, v]) => `${prefix}${quoteKey(k)}: ${stringifyNode(v, indent, newline, level + 1)}`
  );
  return `{${newline}${lines.join(`,${newline}`)}${newline}${indent.repeat(level)}}`;
}

/**
 * Render a node as text.
 */
export function stringify(node: Node, options: StringifyOptions = {}): string {
  const indent = options.indent ?? '';
  const newline = options.newline ?? '\n';
  return stringifyNode(node, indent, newline, 0);
}
