import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createInspectCommand } from './commands/inspect.js';
import { createParseCommand } from './commands/parse.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  const version: unknown = typeof manifest === 'object' && manifest !== null ? Reflect.get(manifest, 'version') : undefined;
  return typeof version === 'string' ? version : '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('declarg')
    .description('Inspect and try out parsers deduced from TypeScript classes and functions')
    .version(readVersion());
  [createInspectCommand, createParseCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
