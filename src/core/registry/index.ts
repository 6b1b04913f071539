/**
 * Registry exports barrel file.
 */
export { DocumentCache } from './cache.js';
export { Fragment } from './fragment.js';
export {
  FragmentRegistry,
  DEFAULT_MAX_DEPTH,
  DEFAULT_REFERENCE_KEY,
  type FragmentRegistryOptions,
  type ResolvedValue,
} from './registry.js';
