/**
 * ContentLoader implementations: filesystem-backed and in-memory.
 */
import { LoadError, ErrorCodes } from '../../utils/errors.js';
import {
  isAbsolute,
  joinPath,
  readFileSync,
  relativePath,
  resolvePath,
  splitPath,
} from '../../utils/file-system.js';
import { normalizeDocumentPath } from '../reference/reference.js';
import { parseDocument } from './parse.js';
import type { ContentLoader, StructuralMap } from './types.js';

function decodeDocumentPath(path: string): string {
  try {
    return decodeURIComponent(path);
  } catch {
    throw new LoadError(
      ErrorCodes.LOAD_FAILED,
      `Document path ${path} contains a malformed percent-escape`,
      path
    );
  }
}

function errorCodeOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Loads documents from disk. Document paths are percent-decoded and joined
 * onto the base directory, so `/common.yaml` names `<baseDir>/common.yaml`.
 */
export class FileContentLoader implements ContentLoader {
  private readonly baseDir: string;

  constructor(baseDir: string) {
    this.baseDir = resolvePath(baseDir);
  }

  /**
   * Absolute filesystem location of a document path.
   */
  locate(path: string): string {
    return joinPath(this.baseDir, decodeDocumentPath(path));
  }

  loadMap(path: string): StructuralMap {
    const filePath = this.locate(path);
    let content: string;
    try {
      content = readFileSync(filePath);
    } catch (error) {
      const notFound = errorCodeOf(error) === 'ENOENT';
      throw new LoadError(
        notFound ? ErrorCodes.DOCUMENT_NOT_FOUND : ErrorCodes.LOAD_FAILED,
        notFound
          ? `Document ${path} not found at ${filePath}`
          : `Failed to read document ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        path,
        { filePath }
      );
    }
    return parseDocument(path, content);
  }
}

type DocumentTable = Record<string, string> | ReadonlyMap<string, string>;

function isMapTable(files: DocumentTable): files is ReadonlyMap<string, string> {
  return files instanceof Map;
}

/**
 * Serves documents from a preloaded `path → text` table. Paths are matched verbatim.
 */
export class InMemoryContentLoader implements ContentLoader {
  private readonly files: ReadonlyMap<string, string>;

  constructor(files: DocumentTable) {
    this.files = isMapTable(files) ? new Map(files) : new Map(Object.entries(files));
  }

  loadMap(path: string): StructuralMap {
    const content = this.files.get(path);
    if (content === undefined) {
      throw new LoadError(
        ErrorCodes.DOCUMENT_NOT_FOUND,
        `Document ${path} not found`,
        path,
        { available: [...this.files.keys()] }
      );
    }
    return parseDocument(path, content);
  }
}

/**
 * Document path for a file on disk: `/`-separated, relative to `baseDir` and
 * percent-encoded, so it matches the key a reference to the same file resolves to.
 */
export function toDocumentPath(baseDir: string, filePath: string): string {
  const relative = relativePath(resolvePath(baseDir), resolvePath(baseDir, filePath));
  if (relative === '' || relative.startsWith('..') || isAbsolute(relative)) {
    throw new LoadError(
      ErrorCodes.LOAD_FAILED,
      `Document ${filePath} is not inside base directory ${baseDir}`,
      filePath,
      { baseDir }
    );
  }
  return normalizeDocumentPath(
    splitPath(relative)
      .map((segment) => encodeURIComponent(segment))
      .join('/')
  );
}
