/**
 * Hashing Encoder
 *
 * Deterministic bag-of-words encoder: every token is hashed into one of
 * `dimension` buckets. Texts sharing words share buckets, which is enough
 * for demos and tests where embedding quality does not matter.
 */

import type { Encoder } from './types.js';

export const DEFAULT_HASHING_DIMENSION = 64;

/**
 * Split text into lower-cased word tokens
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/\W+/).filter(w => w.length > 0);
}

// FNV-1a, 32 bit
function hashToken(token: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i++) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export class HashingEncoder implements Encoder {
  readonly dimension: number;

  constructor(dimension: number = DEFAULT_HASHING_DIMENSION) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RangeError(`Encoder dimension must be a positive integer, got ${dimension}`);
    }
    this.dimension = dimension;
  }

  embed(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    for (const token of tokenize(text)) {
      vector[hashToken(token) % this.dimension] += 1;
    }
    return vector;
  }
}
