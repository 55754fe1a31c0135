/**
 * Huffman tree construction and inspection helpers
 */

import { MinWeightQueue } from './weight-queue.js';
import type {
  FrequencyTable,
  HuffInternal,
  HuffLeaf,
  HuffNode,
} from './huff-types.js';

export function createLeaf(symbol: number, weight: number): HuffLeaf {
  return { kind: 'leaf', symbol, weight };
}

export function createInternal(
  left: HuffNode,
  right: HuffNode,
  weight: number = left.weight + right.weight
): HuffInternal {
  return { kind: 'internal', left, right, weight };
}

export function isLeaf(node: HuffNode): node is HuffLeaf {
  return node.kind === 'leaf';
}

/**
 * Greedy minimum-weight merge. Leaves enter the queue in symbol order and
 * every merged node takes the next insertion slot, so ties resolve FIFO.
 * The first node removed becomes the left child.
 */
export function buildTree(counts: FrequencyTable): HuffNode {
  const queue = new MinWeightQueue<HuffNode>();

  counts.forEach((count, symbol) => {
    if (count > 0) {
      queue.insert(createLeaf(symbol, count), count);
    }
  });

  // Only the sentinel present: pair it with a zero-weight filler so that
  // every code is at least one bit long.
  if (queue.size() < 2) {
    const filler = counts.findIndex(count => count === 0);
    queue.insert(createLeaf(filler, 0), 0);
  }

  while (queue.size() > 1) {
    const left = queue.extractMin();
    const right = queue.extractMin();
    if (!left || !right) {
      throw new Error('Weight queue drained unexpectedly');
    }
    const merged = createInternal(left, right);
    queue.insert(merged, merged.weight);
  }

  const root = queue.extractMin();
  if (!root) {
    throw new Error('Frequency table produced no tree');
  }
  return root;
}

export function countLeaves(node: HuffNode): number {
  return isLeaf(node) ? 1 : countLeaves(node.left) + countLeaves(node.right);
}

/**
 * Length of the longest root-to-leaf path.
 */
export function treeDepth(node: HuffNode): number {
  return isLeaf(node)
    ? 0
    : 1 + Math.max(treeDepth(node.left), treeDepth(node.right));
}

/**
 * Structural equality: same shape and same symbol at every leaf. Weights are
 * ignored since decoded trees carry none.
 */
export function sameShape(a: HuffNode, b: HuffNode): boolean {
  if (isLeaf(a) || isLeaf(b)) {
    return isLeaf(a) && isLeaf(b) && a.symbol === b.symbol;
  }
  return sameShape(a.left, b.left) && sameShape(a.right, b.right);
}

/**
 * Compact rendering for debug output, e.g. `((66,256),65)`.
 */
export function describeTree(node: HuffNode): string {
  if (isLeaf(node)) {
    return String(node.symbol);
  }
  return `(${describeTree(node.left)},${describeTree(node.right)})`;
}
