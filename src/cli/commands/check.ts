import { Command } from 'commander';
import chalk from 'chalk';
import { walkReferences, type WalkResult } from '../../core/walker/walker.js';
import { logger as log } from '../../utils/logger.js';
import {
  openWorkspaceForCommand,
  withWorkspaceOptions,
  type WorkspaceCommandOptions,
} from './workspace-helpers.js';

interface CheckOptions extends WorkspaceCommandOptions {
  json?: boolean;
}

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return withWorkspaceOptions(
    new Command('check')
      .description('Follow every reference reachable from a document and report broken ones')
      .argument('<file>', 'Root document (JSON or YAML)')
      .option('--json', 'Output as JSON')
  ).action(async (file: string, options: CheckOptions) => {
    let result: WalkResult;
    try {
      result = await runCheck(file, options);
    } catch (error) {
      log.error(error instanceof Error ? error.message : 'Unknown error');
      process.exit(1);
    }

    if (result.issues.length > 0) {
      process.exit(1);
    }
  });
}

async function runCheck(file: string, options: CheckOptions): Promise<WalkResult> {
  const { workspace } = await openWorkspaceForCommand(file, options);
  const result = walkReferences(workspace.registry, workspace.root);

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          documents: result.documents,
          visited: result.visited.length,
          issues: result.issues.map((issue) => ({
            from: issue.from,
            target: issue.target,
            error: issue.error.toJSON(),
          })),
        },
        null,
        2
      )
    );
    return result;
  }

  for (const issue of result.issues) {
    const target = issue.target ? ` ${chalk.cyan(issue.target)}` : '';
    console.log(`${chalk.red('✗')} ${issue.from}${target}`);
    console.log(`    ${chalk.dim(issue.error.message)}`);
  }

  const summary = `${result.documents.length} document(s), ${result.visited.length} fragment(s)`;
  if (result.issues.length === 0) {
    log.success(`No broken references (${summary})`);
  } else {
    log.fail(`${result.issues.length} broken reference(s) (${summary})`);
  }
  return result;
}
