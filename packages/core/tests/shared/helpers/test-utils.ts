import type { BitSink, BitSource } from '../../../src/huff-types.js';

/**
 * Bytes of an ASCII/UTF-8 string
 */
export function textBytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/**
 * Deterministic pseudo-random bytes (xorshift32) for bulk round-trips
 */
export function pseudoRandomBytes(length: number, seed: number): Uint8Array {
  const bytes = new Uint8Array(length);
  let state = seed >>> 0 || 1;
  for (let i = 0; i < length; i++) {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    bytes[i] = state & 0xff;
  }
  return bytes;
}

/**
 * A bit sink that records every call, for asserting exact widths
 */
export class RecordingBitSink implements BitSink {
  readonly writes: Array<{ width: number; value: number }> = [];
  closeCount = 0;

  writeBits(width: number, value: number): void {
    this.writes.push({ width, value });
  }

  close(): void {
    this.closeCount++;
  }

  bits(): string {
    return this.writes
      .map(({ width, value }) => value.toString(2).padStart(width, '0'))
      .join('');
  }
}

/**
 * A bit source over a '0'/'1' string with no byte padding, so tests can
 * end a stream at an exact bit
 */
export class BitStringSource implements BitSource {
  private position = 0;

  constructor(private readonly bits: string) {}

  readBits(width: number): number | null {
    if (this.position + width > this.bits.length) {
      return null;
    }
    const value = parseInt(
      this.bits.slice(this.position, this.position + width),
      2
    );
    this.position += width;
    return value;
  }

  rewindToStart(): void {
    this.position = 0;
  }
}

/**
 * Counts of a Fibonacci-like sequence (1, 2, 3, 5, ...) for symbols
 * 0..n-1. Together with the sentinel these force one long chain of merges.
 */
export function chainInducingBytes(symbolCount: number): Uint8Array {
  const counts = [1, 2];
  while (counts.length < symbolCount) {
    counts.push(counts[counts.length - 1] + counts[counts.length - 2]);
  }
  const total = counts.reduce((sum, count) => sum + count, 0);
  const bytes = new Uint8Array(total);
  let offset = 0;
  counts.forEach((count, symbol) => {
    bytes.fill(symbol, offset, offset + count);
    offset += count;
  });
  return bytes;
}
