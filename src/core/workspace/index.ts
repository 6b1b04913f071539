/**
 * Workspace exports barrel file.
 */
export {
  openWorkspace,
  workspaceOptionsFromConfig,
  type Workspace,
  type WorkspaceOptions,
} from './workspace.js';
