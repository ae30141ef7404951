import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { createExtractCommand } from './commands/extract.js';
import { createValidateCommand } from './commands/validate.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

const VERSION = readVersion();

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('testsmith')
    .description('Signature extraction and static validation for generated Python tests')
    .version(VERSION);
  [createExtractCommand, createValidateCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
