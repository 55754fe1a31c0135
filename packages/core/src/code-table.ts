import { isLeaf } from './huff-tree.js';
import type { CodeTable, HuffNode } from './huff-types.js';

/**
 * Records the root-to-leaf path of every leaf: '0' for a left step, '1' for
 * a right step.
 */
export function makeCodeTable(root: HuffNode): CodeTable {
  const codes: CodeTable = new Map();
  collectCodes(root, '', codes);
  return codes;
}

function collectCodes(node: HuffNode, path: string, codes: CodeTable): void {
  if (isLeaf(node)) {
    codes.set(node.symbol, path);
    return;
  }
  collectCodes(node.left, path + '0', codes);
  collectCodes(node.right, path + '1', codes);
}

export function isPrefixFree(codes: CodeTable): boolean {
  const values = [...codes.values()];
  return values.every((code, i) =>
    values.every((other, j) => i === j || !other.startsWith(code))
  );
}
