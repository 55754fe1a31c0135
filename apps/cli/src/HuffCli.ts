import { parseArgs } from 'util';
import { compressFile, decompressFile } from '@huffkit/core';
import {
  Logger,
  LogLevel,
  formatRatio,
  validateRequired,
} from '@huffkit/shared';

export const COMPRESSED_EXTENSION = '.hf';
export const DECOMPRESSED_EXTENSION = '.uhf';

export const ExitCode = {
  OK: 0,
  FAILED: 1,
  USAGE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export type HuffCommand = 'compress' | 'decompress';

export interface HuffCliArgs {
  command: HuffCommand;
  input: string;
  output: string;
  debugLevel: number;
}

export const USAGE =
  'Usage: huff <compress|decompress> <input> [output] [--debug <level>]';

export function defaultOutputPath(command: HuffCommand, input: string): string {
  if (command === 'compress') {
    return input + COMPRESSED_EXTENSION;
  }
  return input.endsWith(COMPRESSED_EXTENSION)
    ? input.slice(0, -COMPRESSED_EXTENSION.length)
    : input + DECOMPRESSED_EXTENSION;
}

export function parseCliArgs(argv: string[]): HuffCliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      debug: { type: 'string', short: 'd', default: '0' },
    },
    allowPositionals: true,
  });

  const [command, input, output, ...extra] = positionals;
  if (command !== 'compress' && command !== 'decompress') {
    throw new Error(`Unknown command: ${command ?? '(none)'}`);
  }
  if (extra.length > 0) {
    throw new Error(`Unexpected arguments: ${extra.join(' ')}`);
  }

  const debugLevel = Number(values.debug);
  if (!Number.isInteger(debugLevel) || debugLevel < 0) {
    throw new Error(`Invalid debug level: ${values.debug}`);
  }

  const inputPath = validateRequired(input, 'input');
  return {
    command,
    input: inputPath,
    output: output ?? defaultOutputPath(command, inputPath),
    debugLevel,
  };
}

export class HuffCli {
  private logger = Logger.getInstance();

  async run(argv: string[]): Promise<ExitCode> {
    let args: HuffCliArgs;
    try {
      args = parseCliArgs(argv);
    } catch (error) {
      this.logger.error(error instanceof Error ? error.message : String(error));
      this.logger.info(USAGE);
      return ExitCode.USAGE;
    }

    this.logger.setLogLevel(args.debugLevel > 0 ? LogLevel.DEBUG : LogLevel.INFO);

    try {
      return args.command === 'compress'
        ? await this.compress(args)
        : await this.decompress(args);
    } catch (error) {
      this.logger.error(`Failed to ${args.command} ${args.input}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return ExitCode.FAILED;
    }
  }

  private async compress(args: HuffCliArgs): Promise<ExitCode> {
    const stats = await compressFile(args.input, args.output, {
      debugLevel: args.debugLevel,
      logger: this.logger,
    });

    this.logger.info('Compressed', {
      input: args.input,
      output: args.output,
      bytesIn: stats.bytesRead,
      bytesOut: stats.outputBytes,
      ratio: formatRatio(stats.outputBytes, stats.bytesRead),
    });
    return ExitCode.OK;
  }

  private async decompress(args: HuffCliArgs): Promise<ExitCode> {
    const result = await decompressFile(args.input, args.output, {
      debugLevel: args.debugLevel,
      logger: this.logger,
    });

    if (!result.success) {
      this.logger.error(`Cannot decompress ${args.input}`, {
        code: result.error.code,
        reason: result.error.reason,
      });
      return ExitCode.FAILED;
    }

    this.logger.info('Decompressed', {
      input: args.input,
      output: args.output,
      bytesOut: result.value.outputBytes,
    });
    return ExitCode.OK;
  }
}
