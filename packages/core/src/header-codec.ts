/**
 * Tree header codec
 *
 * Preorder serialization of the code tree: an internal node is a 0 bit
 * followed by its left and right subtrees, a leaf is a 1 bit followed by its
 * symbol in SYMBOL_BITS bits.
 */

import { createInternal, createLeaf, isLeaf } from './huff-tree.js';
import {
  HuffErrorCode,
  MAX_TREE_DEPTH,
  PSEUDO_EOF,
  SYMBOL_BITS,
  fail,
  formatError,
  ok,
  type BitSink,
  type BitSource,
  type HuffNode,
  type HuffResult,
} from './huff-types.js';

export interface DecodedHeader {
  root: HuffNode;
  headerBits: number;
}

/**
 * Writes the tree and returns the number of header bits emitted.
 */
export function writeHeader(root: HuffNode, sink: BitSink): number {
  if (isLeaf(root)) {
    sink.writeBits(1, 1);
    sink.writeBits(SYMBOL_BITS, root.symbol);
    return 1 + SYMBOL_BITS;
  }
  sink.writeBits(1, 0);
  return 1 + writeHeader(root.left, sink) + writeHeader(root.right, sink);
}

/**
 * Rebuilds a tree written by writeHeader. Decoded nodes carry weight 0.
 */
export function readHeader(source: BitSource): HuffResult<DecodedHeader> {
  const counter = { bits: 0 };
  const result = readNode(source, 0, counter);
  if (!result.success) {
    return result;
  }

  if (isLeaf(result.value)) {
    return fail(
      formatError(
        HuffErrorCode.DEGENERATE_TREE,
        'Header describes a single leaf',
        counter.bits
      )
    );
  }

  return ok({ root: result.value, headerBits: counter.bits });
}

function readNode(
  source: BitSource,
  depth: number,
  counter: { bits: number }
): HuffResult<HuffNode> {
  const bit = source.readBits(1);
  if (bit === null) {
    return fail(
      formatError(
        HuffErrorCode.TRUNCATED_HEADER,
        'Header ended before a node marker',
        counter.bits
      )
    );
  }
  counter.bits += 1;

  if (bit === 1) {
    const symbol = source.readBits(SYMBOL_BITS);
    if (symbol === null) {
      return fail(
        formatError(
          HuffErrorCode.TRUNCATED_HEADER,
          'Header ended inside a leaf value',
          counter.bits
        )
      );
    }
    counter.bits += SYMBOL_BITS;

    if (symbol > PSEUDO_EOF) {
      return fail(
        formatError(
          HuffErrorCode.INVALID_SYMBOL,
          `Leaf value ${symbol} is outside 0-${PSEUDO_EOF}`,
          counter.bits
        )
      );
    }
    return ok(createLeaf(symbol, 0));
  }

  if (depth >= MAX_TREE_DEPTH) {
    return fail(
      formatError(
        HuffErrorCode.HEADER_TOO_DEEP,
        `Header nests deeper than ${MAX_TREE_DEPTH} levels`,
        counter.bits
      )
    );
  }

  const left = readNode(source, depth + 1, counter);
  if (!left.success) {
    return left;
  }
  const right = readNode(source, depth + 1, counter);
  if (!right.success) {
    return right;
  }
  return ok(createInternal(left.value, right.value, 0));
}
