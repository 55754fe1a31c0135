#!/usr/bin/env node
import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { HuffCli } from './HuffCli.js';

export async function main(argv: string[]): Promise<number> {
  const cli = new HuffCli();
  return cli.run(argv);
}

// npm links the bin through a symlink, so compare real paths
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(error);
      process.exitCode = 1;
    });
}
