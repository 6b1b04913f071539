/**
 * Reference walker exports barrel file.
 */
export {
  walkReferences,
  type ReferenceIssue,
  type WalkOptions,
  type WalkResult,
} from './walker.js';
