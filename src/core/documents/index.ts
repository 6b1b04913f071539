/**
 * Document loading exports barrel file.
 */
export type {
  ContentLoader,
  StructuralValue,
  StructuralMap,
  StructuralList,
  ValueKind,
} from './types.js';
export {
  kindOf,
  isStructuralMap,
  isStructuralList,
  toStructuralValue,
  toPlainValue,
  type PlainValue,
} from './value.js';
export { formatOf, parseDocument } from './parse.js';
export { FileContentLoader, InMemoryContentLoader, toDocumentPath } from './loaders.js';
