#!/usr/bin/env tsx

/**
 * relaytest CLI - Run the relay integration scenarios
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { setupListCommand } from './commands/list.js';
import { setupRunCommand } from './commands/run.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Read package.json for version
const packageJson = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')) as {
  version: string;
};

const program = new Command();

program
  .name('relaytest')
  .description('Integration scenarios for relay-client and relay-server')
  .version(packageJson.version);

setupListCommand(program);
setupRunCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
