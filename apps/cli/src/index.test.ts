import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { Logger } from '@huffkit/shared';
import { ExitCode } from './HuffCli.js';
import { main } from './index.js';

const repoRoot = fileURLToPath(new URL('../../../', import.meta.url));

interface PackageManifest {
  main?: string;
  bin?: Record<string, string>;
  exports?: Record<string, { types: string; default: string }>;
}

async function readManifest(dir: string): Promise<PackageManifest> {
  const text = await fs.readFile(join(repoRoot, dir, 'package.json'), 'utf8');
  const manifest: PackageManifest = JSON.parse(text);
  return manifest;
}

describe('huff entry point', () => {
  let workDir: string;

  beforeEach(async () => {
    Logger.resetInstance();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    workDir = await fs.mkdtemp(join(tmpdir(), 'huffkit-main-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    Logger.resetInstance();
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('should round-trip a file through main', async () => {
    const input = join(workDir, 'letter.txt');
    const packed = join(workDir, 'letter.hf');
    const restored = join(workDir, 'letter.out');
    await fs.writeFile(input, 'dear sir or madam, please find enclosed');

    expect(await main(['compress', input, packed])).toBe(ExitCode.OK);
    expect(Array.from((await fs.readFile(packed)).subarray(0, 4))).toEqual([
      0xfa, 0xce, 0x82, 0x01,
    ]);

    expect(await main(['decompress', packed, restored])).toBe(ExitCode.OK);
    expect(await fs.readFile(restored, 'utf8')).toBe(
      'dear sir or madam, please find enclosed'
    );
  });

  it('should return the usage exit code for bad arguments', async () => {
    expect(await main([])).toBe(ExitCode.USAGE);
  });
});

describe('package layout', () => {
  it('should point the huff bin at the built cli entry', async () => {
    const root = await readManifest('.');
    const cli = await readManifest('apps/cli');

    expect(root.bin).toEqual({ huff: 'apps/cli/dist/index.js' });
    expect(cli.bin).toEqual({ huff: './dist/index.js' });
  });

  it.each(['packages/core', 'packages/shared'])(
    'should resolve %s to sources for types and to dist at runtime',
    async dir => {
      const manifest = await readManifest(dir);

      expect(manifest.main).toBe('./dist/index.js');
      expect(manifest.exports).toEqual({
        '.': { types: './src/index.ts', default: './dist/index.js' },
      });
      await expect(
        fs.access(join(repoRoot, dir, 'src/index.ts'))
      ).resolves.toBeUndefined();
    }
  );
});
