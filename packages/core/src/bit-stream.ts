/**
 * In-memory bit streams
 *
 * MSB-first readers and writers over byte buffers. They implement the
 * BitSource/BitSink collaborators the codec is written against.
 */

import type { BitSink, BitSource } from './huff-types.js';

const MAX_FIELD_WIDTH = 32;

function assertWidth(width: number): void {
  if (!Number.isInteger(width) || width < 1 || width > MAX_FIELD_WIDTH) {
    throw new Error(
      `Invalid bit width: ${width} (must be 1-${MAX_FIELD_WIDTH})`
    );
  }
}

export class MemoryBitInputStream implements BitSource {
  private readonly bytes: Uint8Array;
  private position = 0; // absolute bit offset
  private consumed = 0;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  readBits(width: number): number | null {
    assertWidth(width);

    if (this.position + width > this.bytes.length * 8) {
      return null;
    }

    let value = 0;
    for (let i = 0; i < width; i++) {
      const byte = this.bytes[this.position >>> 3];
      const bit = (byte >>> (7 - (this.position & 7))) & 1;
      // multiplication keeps 32-bit fields unsigned
      value = value * 2 + bit;
      this.position++;
    }

    this.consumed += width;
    return value;
  }

  rewindToStart(): void {
    this.position = 0;
  }

  /**
   * Total bits handed out since construction, across rewinds.
   */
  bitsRead(): number {
    return this.consumed;
  }

  bitsRemaining(): number {
    return this.bytes.length * 8 - this.position;
  }
}

export class MemoryBitOutputStream implements BitSink {
  private bytes: number[] = [];
  private currentByte = 0;
  private bitOffset = 0; // bits used in currentByte (0-7)
  private totalBitsWritten = 0;
  private closed = false;

  writeBits(width: number, value: number): void {
    assertWidth(width);
    if (this.closed) {
      throw new Error('Cannot write to a closed bit stream');
    }
    if (!Number.isInteger(value) || value < 0 || value >= 2 ** width) {
      throw new Error(`Value ${value} does not fit in ${width} bits`);
    }

    for (let i = width - 1; i >= 0; i--) {
      this.writeBit(Math.floor(value / 2 ** i) % 2);
    }
  }

  private writeBit(bit: number): void {
    this.currentByte |= bit << (7 - this.bitOffset);
    this.bitOffset++;
    this.totalBitsWritten++;

    if (this.bitOffset === 8) {
      this.bytes.push(this.currentByte);
      this.currentByte = 0;
      this.bitOffset = 0;
    }
  }

  /**
   * Flushes a partial final byte, zero-padded. Safe to call more than once.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    if (this.bitOffset > 0) {
      this.bytes.push(this.currentByte);
      this.currentByte = 0;
      this.bitOffset = 0;
    }
    this.closed = true;
  }

  isClosed(): boolean {
    return this.closed;
  }

  bitsWritten(): number {
    return this.totalBitsWritten;
  }

  /**
   * Bytes completed so far; the partial byte only appears after close().
   */
  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}
