/**
 * Option handling shared by the commands that open a workspace.
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import {
  openWorkspace,
  workspaceOptionsFromConfig,
  type Workspace,
} from '../../core/workspace/workspace.js';
import { logger } from '../../utils/logger.js';

export interface WorkspaceCommandOptions {
  config?: string;
  baseDir?: string;
  component?: string[];
  verbose?: boolean;
}

/**
 * Register the options every workspace command accepts.
 */
export function withWorkspaceOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to config file (default: .refgraph.yaml)')
    .option('-b, --base-dir <dir>', 'Base directory for document paths')
    .option('--component <globs...>', 'Component documents to load up front')
    .option('--verbose', 'Log document loads');
}

/**
 * Load config, apply command-line overrides and open the workspace for `file`.
 */
export async function openWorkspaceForCommand(
  file: string,
  options: WorkspaceCommandOptions
): Promise<{ config: Config; workspace: Workspace }> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);

  logger.setLevel(options.verbose ? 'debug' : config.log_level);

  const effective: Config = {
    ...config,
    base_dir: options.baseDir ?? config.base_dir,
    components: options.component ?? config.components,
  };
  const workspace = await openWorkspace({
    ...workspaceOptionsFromConfig(effective, file),
    cwd: projectRoot,
  });
  return { config: effective, workspace };
}
