import {
  BITS_PER_WORD,
  PSEUDO_EOF,
  type BitSource,
  type FrequencyTable,
} from './huff-types.js';

/**
 * Tallies 8-bit symbols until the source runs dry. The sentinel is preset
 * to 1 so it always gets a leaf.
 */
export function countFrequencies(source: BitSource): FrequencyTable {
  const counts: FrequencyTable = new Array<number>(PSEUDO_EOF + 1).fill(0);
  counts[PSEUDO_EOF] = 1;

  for (
    let symbol = source.readBits(BITS_PER_WORD);
    symbol !== null;
    symbol = source.readBits(BITS_PER_WORD)
  ) {
    counts[symbol]++;
  }

  return counts;
}

export function countDistinctSymbols(counts: FrequencyTable): number {
  return counts.filter(count => count > 0).length;
}
