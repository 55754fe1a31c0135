/**
 * Huffman Codec Types
 *
 * Constants, tree and table shapes, stream collaborator interfaces and the
 * result values returned on the decode path.
 */

import type { LogContext } from '@huffkit/shared';

// Format constants
export const BITS_PER_WORD = 8;
export const BITS_PER_INT = 32;
export const ALPH_SIZE = 1 << BITS_PER_WORD;
export const PSEUDO_EOF = ALPH_SIZE;
export const SYMBOL_BITS = BITS_PER_WORD + 1; // wide enough for 0..256
export const HUFF_NUMBER = 0xface8200;
export const HUFF_TREE = 0xface8201; // HUFF_NUMBER | 1, kept unsigned

// A tree over at most ALPH_SIZE + 1 leaves has at most ALPH_SIZE internal levels
export const MAX_TREE_DEPTH = ALPH_SIZE;

// Verbosity thresholds for HuffOptions.debugLevel
export const DEBUG_LOW = 1;
export const DEBUG_HIGH = 4;

export interface HuffLeaf {
  readonly kind: 'leaf';
  readonly symbol: number;
  readonly weight: number;
}

export interface HuffInternal {
  readonly kind: 'internal';
  readonly left: HuffNode;
  readonly right: HuffNode;
  readonly weight: number;
}

export type HuffNode = HuffLeaf | HuffInternal;

// Index = symbol (0..PSEUDO_EOF), value = occurrence count
export type FrequencyTable = number[];

// Symbol -> '0'/'1' path from the root
export type CodeTable = Map<number, string>;

/**
 * Bit-granular input. `readBits` returns null once fewer than `width` bits
 * remain.
 */
export interface BitSource {
  readBits(width: number): number | null;
  rewindToStart(): void;
}

export interface BitSink {
  writeBits(width: number, value: number): void;
  close(): void;
}

export interface HuffLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface HuffOptions {
  debugLevel?: number;
  logger?: HuffLogger;
}

// Error codes for format violations found while decoding
export const HuffErrorCode = {
  BAD_MAGIC: 'BAD_MAGIC',
  TRUNCATED_HEADER: 'TRUNCATED_HEADER',
  INVALID_SYMBOL: 'INVALID_SYMBOL',
  HEADER_TOO_DEEP: 'HEADER_TOO_DEEP',
  DEGENERATE_TREE: 'DEGENERATE_TREE',
  MISSING_PSEUDO_EOF: 'MISSING_PSEUDO_EOF',
} as const;

export type HuffErrorCode = (typeof HuffErrorCode)[keyof typeof HuffErrorCode];

export interface FormatError {
  kind: 'FormatError';
  code: HuffErrorCode;
  reason: string;
  bitsRead?: number;
}

export type HuffResult<T> =
  | { success: true; value: T }
  | { success: false; error: FormatError };

export function formatError(
  code: HuffErrorCode,
  reason: string,
  bitsRead?: number
): FormatError {
  return { kind: 'FormatError', code, reason, bitsRead };
}

export function ok<T>(value: T): HuffResult<T> {
  return { success: true, value };
}

export function fail<T>(error: FormatError): HuffResult<T> {
  return { success: false, error };
}

export interface CompressionStats {
  bytesRead: number;
  distinctSymbols: number; // includes the sentinel
  headerBits: number;
  payloadBits: number;
  bitsWritten: number; // magic + header + payload, before padding
}

export interface DecompressionStats {
  headerBits: number;
  payloadBits: number;
  bitsRead: number; // magic + header + payload
  symbolsDecoded: number;
}
