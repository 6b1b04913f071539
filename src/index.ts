/**
 * refgraph - resolve `$ref` graphs across JSON and YAML documents.
 * Main library exports barrel file.
 */

// Documents and loaders
export * from './core/documents/index.js';

// References
export * from './core/reference/index.js';

// Registry and fragments
export * from './core/registry/index.js';

// Workspace
export * from './core/workspace/index.js';

// Walker
export * from './core/walker/index.js';

// Configuration
export * from './core/config/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
