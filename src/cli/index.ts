import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createResolveCommand } from './commands/resolve.js';
import { createCheckCommand } from './commands/check.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'))
).version;

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('refgraph')
    .description('Resolve $ref graphs across JSON and YAML documents')
    .version(VERSION);
  [createResolveCommand, createCheckCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
