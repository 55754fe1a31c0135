import { promises as fs } from 'fs';
import { MemoryBitInputStream, MemoryBitOutputStream } from './bit-stream.js';
import { HuffProcessor } from './huff-processor.js';
import {
  HuffErrorCode,
  type CompressionStats,
  type DecompressionStats,
  type HuffOptions,
  type HuffResult,
} from './huff-types.js';

export interface FileCompressionResult extends CompressionStats {
  outputBytes: number;
}

export type FileDecompressionResult = HuffResult<
  DecompressionStats & { outputBytes: number }
>;

/**
 * Compresses `input` into `output`. The whole input is held in memory so it
 * can be read twice.
 */
export async function compressFile(
  input: string,
  output: string,
  options: HuffOptions = {}
): Promise<FileCompressionResult> {
  const bytes = await fs.readFile(input);
  const { stats, data } = compressBytes(bytes, options);
  await fs.writeFile(output, data);
  return { ...stats, outputBytes: data.length };
}

/**
 * Decompresses `input` into `output`. On a format error the bytes decoded
 * before the failure are still written, except for `BAD_MAGIC`: then the
 * input is not ours and `output` is left untouched.
 */
export async function decompressFile(
  input: string,
  output: string,
  options: HuffOptions = {}
): Promise<FileDecompressionResult> {
  const bytes = await fs.readFile(input);
  const { result, data } = decompressBytes(bytes, options);

  if (!result.success && result.error.code === HuffErrorCode.BAD_MAGIC) {
    return result;
  }
  await fs.writeFile(output, data);

  if (!result.success) {
    return result;
  }
  return { success: true, value: { ...result.value, outputBytes: data.length } };
}

export function compressBytes(
  bytes: Uint8Array,
  options: HuffOptions = {}
): { stats: CompressionStats; data: Uint8Array } {
  const sink = new MemoryBitOutputStream();
  const stats = new HuffProcessor(options).compress(
    new MemoryBitInputStream(bytes),
    sink
  );
  return { stats, data: sink.toUint8Array() };
}

export function decompressBytes(
  bytes: Uint8Array,
  options: HuffOptions = {}
): { result: HuffResult<DecompressionStats>; data: Uint8Array } {
  const sink = new MemoryBitOutputStream();
  const result = new HuffProcessor(options).decompress(
    new MemoryBitInputStream(bytes),
    sink
  );
  return { result, data: sink.toUint8Array() };
}
