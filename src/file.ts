/**
 * Sinks and sources over file descriptors, plus whole-file helpers.
 * File system errors are thrown as they come from node:fs.
 */

import { closeSync, openSync, readSync, writeSync } from 'node:fs';
import type { Compound } from './compound.js';
import { decode, decodeRoot, type DecodeOptions } from './decoder.js';
import { encodeTo } from './encoder.js';
import { DecodeError } from './errors.js';
import type { ByteSink, ByteSource } from './io.js';
import type { Node } from './node.js';

export class FileSink implements ByteSink {
  constructor(private readonly fd: number) {}

  write(chunk: Uint8Array): void {
    let written = 0;
    while (written < chunk.length) {
      written += writeSync(this.fd, chunk, written, chunk.length - written);
    }
  }
}

const CHUNK_SIZE = 64 * 1024;

/**
 * Reads from the descriptor's current position onwards. Large reads grow
 * their buffer as data arrives, so a bogus length hits end of file first.
 */
export class FileSource implements ByteSource {
  private consumed = 0;

  constructor(private readonly fd: number) {}

  read(length: number): Uint8Array {
    let out = new Uint8Array(Math.min(length, CHUNK_SIZE));
    let filled = 0;
    while (filled < length) {
      if (filled === out.length) {
        const grown = new Uint8Array(Math.min(length, out.length * 2));
        grown.set(out);
        out = grown;
      }
      const n = readSync(this.fd, out, filled, out.length - filled, null);
      if (n === 0) {
        throw new DecodeError('Unexpected end of file', { byteOffset: this.consumed + filled });
      }
      filled += n;
    }
    this.consumed += length;
    return out;
  }
}

/** Create or truncate `path` and write one document to it. */
export function writeNodeFile(path: string, node: Node): void {
  const fd = openSync(path, 'w');
  try {
    encodeTo(node, new FileSink(fd));
  } finally {
    closeSync(fd);
  }
}

/** Read the first document in `path`. */
export function readNodeFile(path: string, options?: DecodeOptions): Node {
  const fd = openSync(path, 'r');
  try {
    return decode(new FileSource(fd), options);
  } finally {
    closeSync(fd);
  }
}

export function readRootFile(path: string, options?: DecodeOptions): Compound {
  const fd = openSync(path, 'r');
  try {
    return decodeRoot(new FileSource(fd), options);
  } finally {
    closeSync(fd);
  }
}
