import { Command } from 'commander';
import chalk from 'chalk';
import { toPlainValue } from '../../core/documents/value.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { logger as log } from '../../utils/logger.js';
import {
  openWorkspaceForCommand,
  withWorkspaceOptions,
  type WorkspaceCommandOptions,
} from './workspace-helpers.js';

interface ResolveOptions extends WorkspaceCommandOptions {
  json?: boolean;
}

/**
 * Create the resolve command.
 */
export function createResolveCommand(): Command {
  return withWorkspaceOptions(
    new Command('resolve')
      .description('Resolve a reference in a document and print the value it points to')
      .argument('<file>', 'Root document (JSON or YAML)')
      .argument('[pointer]', 'Pointer or reference inside the document, e.g. /components/schemas/Pet')
      .option('--json', 'Output as JSON')
  ).action(async (file: string, pointer: string | undefined, options: ResolveOptions) => {
    try {
      await runResolve(file, pointer, options);
    } catch (error) {
      log.error(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }
  });
}

/**
 * A bare pointer is taken relative to the root document; anything containing `#`
 * is a full reference string.
 */
export function toReferenceString(pointer: string): string {
  return pointer.includes('#') ? pointer : `#${pointer}`;
}

async function runResolve(
  file: string,
  pointer: string | undefined,
  options: ResolveOptions
): Promise<void> {
  const { workspace } = await openWorkspaceForCommand(file, options);
  const reference = pointer
    ? workspace.root.resolve(toReferenceString(pointer))
    : workspace.root;

  const fragment = workspace.registry.get(reference);
  const value = toPlainValue(fragment.value);

  if (options.json) {
    console.log(JSON.stringify({ reference: fragment.reference.toString(), value }, null, 2));
    return;
  }

  console.log(chalk.dim(`# ${fragment.reference}`));
  process.stdout.write(stringifyYaml(value));
}
