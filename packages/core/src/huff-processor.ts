/**
 * Huffman Processor
 *
 * Runs the two directions of the codec over bit streams:
 *
 * - compress: count symbols, build the tree, derive codes, write the magic
 *   number and tree header, rewind and encode the payload
 * - decompress: check the magic number, rebuild the tree from the header and
 *   decode until the PSEUDO_EOF leaf
 *
 * Format violations come back as `{ success: false, error }` values. Errors
 * thrown by the stream collaborators propagate. The sink is closed on every
 * path.
 */

import { Logger } from '@huffkit/shared';
import { makeCodeTable } from './code-table.js';
import {
  countDistinctSymbols,
  countFrequencies,
} from './frequency-counter.js';
import { readHeader, writeHeader } from './header-codec.js';
import { buildTree, describeTree } from './huff-tree.js';
import {
  BITS_PER_INT,
  DEBUG_HIGH,
  DEBUG_LOW,
  HUFF_TREE,
  HuffErrorCode,
  PSEUDO_EOF,
  fail,
  formatError,
  ok,
  type BitSink,
  type BitSource,
  type CodeTable,
  type CompressionStats,
  type DecompressionStats,
  type HuffLogger,
  type HuffOptions,
  type HuffResult,
} from './huff-types.js';
import { decodePayload } from './stream-decoder.js';
import { encodePayload } from './stream-encoder.js';

export class HuffProcessor {
  private readonly debugLevel: number;
  private readonly logger: HuffLogger;

  constructor(options: HuffOptions = {}) {
    this.debugLevel = options.debugLevel ?? 0;
    this.logger = options.logger ?? Logger.getInstance();
  }

  getDebugLevel(): number {
    return this.debugLevel;
  }

  compress(source: BitSource, sink: BitSink): CompressionStats {
    try {
      const counts = countFrequencies(source);
      const root = buildTree(counts);
      const codes = makeCodeTable(root);

      sink.writeBits(BITS_PER_INT, HUFF_TREE);
      const headerBits = writeHeader(root, sink);

      source.rewindToStart();
      const payloadBits = encodePayload(codes, source, sink);

      const stats: CompressionStats = {
        // the sentinel's preset count is not input
        bytesRead: counts.reduce((sum, count) => sum + count, 0) - 1,
        distinctSymbols: countDistinctSymbols(counts),
        headerBits,
        payloadBits,
        bitsWritten: BITS_PER_INT + headerBits + payloadBits,
      };

      if (this.debugLevel >= DEBUG_HIGH) {
        this.logCodes(codes);
      }
      if (this.debugLevel >= DEBUG_LOW) {
        this.logger.debug('Compression finished', { ...stats });
      }

      return stats;
    } finally {
      sink.close();
    }
  }

  decompress(
    source: BitSource,
    sink: BitSink
  ): HuffResult<DecompressionStats> {
    try {
      const result = this.decodeStream(source, sink);

      if (!result.success) {
        this.logger.warn('Decompression failed', {
          code: result.error.code,
          reason: result.error.reason,
        });
      } else if (this.debugLevel >= DEBUG_LOW) {
        this.logger.debug('Decompression finished', { ...result.value });
      }

      return result;
    } finally {
      sink.close();
    }
  }

  private decodeStream(
    source: BitSource,
    sink: BitSink
  ): HuffResult<DecompressionStats> {
    const magic = source.readBits(BITS_PER_INT);
    if (magic !== HUFF_TREE) {
      const found = magic === null ? 'end of stream' : `0x${magic.toString(16)}`;
      return fail(
        formatError(
          HuffErrorCode.BAD_MAGIC,
          `Expected magic 0x${HUFF_TREE.toString(16)}, found ${found}`,
          0
        )
      );
    }

    const header = readHeader(source);
    if (!header.success) {
      return header;
    }
    const { root, headerBits } = header.value;

    if (this.debugLevel >= DEBUG_HIGH) {
      this.logger.debug('Header decoded', {
        headerBits,
        tree: describeTree(root),
      });
    }

    const payload = decodePayload(root, source, sink);
    if (!payload.success) {
      return payload;
    }

    return ok({
      headerBits,
      payloadBits: payload.value.payloadBits,
      bitsRead: BITS_PER_INT + headerBits + payload.value.payloadBits,
      symbolsDecoded: payload.value.symbolsDecoded,
    });
  }

  private logCodes(codes: CodeTable): void {
    [...codes.entries()]
      .sort(([a], [b]) => a - b)
      .forEach(([symbol, code]) => {
        this.logger.debug('Code', {
          symbol: symbol === PSEUDO_EOF ? 'PSEUDO_EOF' : symbol,
          code,
          length: code.length,
        });
      });
  }
}
