import { isLeaf } from './huff-tree.js';
import {
  BITS_PER_WORD,
  HuffErrorCode,
  PSEUDO_EOF,
  fail,
  formatError,
  ok,
  type BitSink,
  type BitSource,
  type HuffInternal,
  type HuffNode,
  type HuffResult,
} from './huff-types.js';

export interface DecodedPayload {
  symbolsDecoded: number;
  payloadBits: number;
}

/**
 * Walks the tree one bit at a time, writing every non-sentinel leaf reached
 * and restarting at the root. Stops at the sentinel leaf; symbols written
 * before a failure stay written.
 */
export function decodePayload(
  root: HuffNode,
  source: BitSource,
  sink: BitSink
): HuffResult<DecodedPayload> {
  if (isLeaf(root)) {
    return fail(
      formatError(HuffErrorCode.DEGENERATE_TREE, 'Tree has a single leaf', 0)
    );
  }

  const start: HuffInternal = root;
  let cursor = start;
  let symbolsDecoded = 0;
  let payloadBits = 0;

  while (true) {
    const bit = source.readBits(1);
    if (bit === null) {
      return fail(
        formatError(
          HuffErrorCode.MISSING_PSEUDO_EOF,
          `Payload ended after ${symbolsDecoded} symbols without PSEUDO_EOF`,
          payloadBits
        )
      );
    }
    payloadBits++;

    const next = bit === 0 ? cursor.left : cursor.right;
    if (!isLeaf(next)) {
      cursor = next;
      continue;
    }

    if (next.symbol === PSEUDO_EOF) {
      return ok({ symbolsDecoded, payloadBits });
    }
    sink.writeBits(BITS_PER_WORD, next.symbol);
    symbolsDecoded++;
    cursor = start;
  }
}
