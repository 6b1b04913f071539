/**
 * Opens a root document and its component documents from disk.
 */
import type { Config } from '../config/schema.js';
import { FileContentLoader, toDocumentPath } from '../documents/loaders.js';
import { Reference } from '../reference/reference.js';
import { FragmentRegistry, type FragmentRegistryOptions } from '../registry/registry.js';
import { globFiles, resolvePath } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';

const log = logger.child('workspace');

export interface WorkspaceOptions extends Omit<FragmentRegistryOptions, 'cache'> {
  /** Directory document paths are relative to */
  baseDir: string;
  /** Root document, as a filesystem path */
  schema: string;
  /** Glob patterns, relative to baseDir, of documents to load up front */
  components?: string[];
  /** Directory that relative baseDir and schema paths start from (default: process.cwd()) */
  cwd?: string;
}

export interface Workspace {
  registry: FragmentRegistry;
  /** Root coordinate of the schema document */
  root: Reference;
  /** Document paths of the preloaded components */
  components: string[];
}

/**
 * Build a registry over `baseDir`, eagerly load the component documents and
 * the schema, and return the schema's root reference.
 *
 * Every path is normalized with toDocumentPath, so a component reached later
 * through a `$ref` hits the cache instead of loading again.
 *
 * @throws LoadError if any document cannot be loaded, or the schema is outside baseDir
 */
export async function openWorkspace(options: WorkspaceOptions): Promise<Workspace> {
  const cwd = options.cwd ?? process.cwd();
  const baseDir = resolvePath(cwd, options.baseDir);
  const registry = new FragmentRegistry(new FileContentLoader(baseDir), {
    referenceKey: options.referenceKey,
    maxDepth: options.maxDepth,
  });

  const patterns = options.components ?? [];
  const componentFiles = patterns.length > 0 ? await globFiles(patterns, { cwd: baseDir }) : [];
  const components = componentFiles.map((file) => toDocumentPath(baseDir, file));
  for (const component of components) {
    registry.loadDocument(component);
  }

  const rootPath = toDocumentPath(baseDir, resolvePath(cwd, options.schema));
  registry.loadDocument(rootPath);

  log.debug(`Opened ${rootPath} with ${components.length} component(s)`, { baseDir, components });
  return { registry, root: Reference.root(rootPath), components };
}

/**
 * Workspace options for a schema file, taking the rest from configuration.
 */
export function workspaceOptionsFromConfig(config: Config, schema: string): WorkspaceOptions {
  return {
    baseDir: config.base_dir,
    schema,
    components: config.components,
    referenceKey: config.reference_key,
    maxDepth: config.max_depth,
  };
}
