#!/usr/bin/env node
/**
 * oprun - CLI Entry Point
 */

import packageJson from '../../package.json';
import { CLI } from './cli-interface';

const VERSION: string = packageJson.version;

async function main(): Promise<void> {
  const cli = new CLI({ version: VERSION });
  process.exitCode = await cli.run(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
