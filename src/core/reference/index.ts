/**
 * Reference exports barrel file.
 */
export { Reference, resolveDocumentPath, parsePointer } from './reference.js';
