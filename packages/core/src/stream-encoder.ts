import {
  BITS_PER_WORD,
  PSEUDO_EOF,
  type BitSink,
  type BitSource,
  type CodeTable,
} from './huff-types.js';

// Longest slice of a code handed to the sink in one call
const MAX_CHUNK_BITS = 24;

/**
 * Second pass: emits each symbol's code, then the sentinel's code as the
 * terminator. Returns the number of payload bits written.
 */
export function encodePayload(
  codes: CodeTable,
  source: BitSource,
  sink: BitSink
): number {
  let bitsWritten = 0;

  for (
    let symbol = source.readBits(BITS_PER_WORD);
    symbol !== null;
    symbol = source.readBits(BITS_PER_WORD)
  ) {
    bitsWritten += writeCode(codeFor(codes, symbol), sink);
  }

  return bitsWritten + writeCode(codeFor(codes, PSEUDO_EOF), sink);
}

function codeFor(codes: CodeTable, symbol: number): string {
  const code = codes.get(symbol);
  if (code === undefined || code.length === 0) {
    throw new Error(`No code for symbol ${symbol}`);
  }
  return code;
}

/**
 * Codes can be up to 256 bits deep on very skewed input, so they are split
 * into sink-sized chunks, MSB first.
 */
export function writeCode(code: string, sink: BitSink): number {
  for (let start = 0; start < code.length; start += MAX_CHUNK_BITS) {
    const chunk = code.slice(start, start + MAX_CHUNK_BITS);
    sink.writeBits(chunk.length, parseInt(chunk, 2));
  }
  return code.length;
}
