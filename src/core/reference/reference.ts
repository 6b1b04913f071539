/**
 * Coordinates inside a document graph.
 */
import { posix } from 'node:path';
import { ResolutionError, ErrorCodes } from '../../utils/errors.js';

/** Matches a leading URI scheme such as `https:` or `file:`. */
const SCHEME_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*:/;

/** Matches a hierarchical URL such as `https://host/path`. */
const URL_PATTERN = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//;

/**
 * Escape one path segment the way it appears inside a reference string.
 * `#`, `?` and `/` are escaped so the segment keeps its meaning.
 */
function encodeSegment(segment: string): string {
  return encodeURI(segment).replace(/[#?/]/g, (char) => encodeURIComponent(char));
}

/**
 * Canonical percent-encoding of a `/`-separated document path, so `über.yaml`
 * and `%C3%BCber.yaml` name the same document. Segments with a malformed
 * escape are left as they are.
 */
export function normalizeDocumentPath(path: string): string {
  return path
    .split('/')
    .map((segment) => {
      try {
        return encodeSegment(decodeURIComponent(segment));
      } catch {
        return segment;
      }
    })
    .join('/');
}

function resolveUrl(current: string, target: string): string {
  try {
    return new URL(target, current).href;
  } catch {
    throw new ResolutionError(
      ErrorCodes.INVALID_REFERENCE,
      `Cannot resolve '${target}' against ${current}`,
      { current, target }
    );
  }
}

/**
 * Resolve a reference's path part against the document it appears in.
 *
 * Relative paths are resolved against the directory of `current`; absolute
 * paths stay absolute (loaders decide what they are rooted at). Only a
 * `scheme://` document resolves as a URL, so a file named `v1:pet.yaml` is
 * still a plain path.
 */
export function resolveDocumentPath(current: string, target: string): string {
  if (SCHEME_PATTERN.test(target)) {
    return target;
  }
  if (URL_PATTERN.test(current)) {
    return resolveUrl(current, target);
  }
  const joined = target.startsWith('/') ? target : posix.join(posix.dirname(current), target);
  return normalizeDocumentPath(posix.normalize(joined));
}

/**
 * Split a pointer on `/`, drop empty segments and percent-decode the rest.
 */
export function parsePointer(pointer: string): string[] {
  return pointer
    .split('/')
    .filter((segment) => segment.length > 0)
    .map((segment) => {
      try {
        return decodeURIComponent(segment);
      } catch {
        throw new ResolutionError(
          ErrorCodes.INVALID_REFERENCE,
          `Malformed percent-escape in pointer segment '${segment}'`,
          { pointer, segment }
        );
      }
    });
}

/**
 * An immutable coordinate: a document path plus a pointer-like segment path.
 *
 * Two references are the same entity when both parts are equal, whatever value
 * currently lives there. Use `key` for Map and Set membership.
 */
export class Reference {
  readonly documentPath: string;
  readonly segmentPath: readonly string[];

  constructor(documentPath: string, segmentPath: readonly string[] = []) {
    this.documentPath = documentPath;
    this.segmentPath = Object.freeze([...segmentPath]);
  }

  static root(documentPath: string): Reference {
    return new Reference(documentPath);
  }

  /**
   * Stable identity string. Equal references produce equal keys.
   */
  get key(): string {
    return JSON.stringify([this.documentPath, ...this.segmentPath]);
  }

  get isRoot(): boolean {
    return this.segmentPath.length === 0;
  }

  root(): Reference {
    return Reference.root(this.documentPath);
  }

  child(...elements: Array<string | number>): Reference {
    return new Reference(this.documentPath, [...this.segmentPath, ...elements.map(String)]);
  }

  /**
   * The enclosing coordinate, or undefined at the document root.
   */
  parent(): Reference | undefined {
    if (this.isRoot) return undefined;
    return new Reference(this.documentPath, this.segmentPath.slice(0, -1));
  }

  /**
   * Resolve a `<path>#<pointer>` string against this coordinate.
   *
   * An empty path targets this document; a missing `#pointer` targets the root.
   */
  resolve(referenceString: string): Reference {
    const hashIndex = referenceString.indexOf('#');
    const pathPart = hashIndex < 0 ? referenceString : referenceString.slice(0, hashIndex);
    const pointer = hashIndex < 0 ? '/' : referenceString.slice(hashIndex + 1);

    const documentPath =
      pathPart === '' ? this.documentPath : resolveDocumentPath(this.documentPath, pathPart);
    return new Reference(documentPath, parsePointer(pointer));
  }

  /**
   * True when `other` is strictly nested under this coordinate in the same document.
   */
  isAncestorOf(other: Reference): boolean {
    return (
      this.documentPath === other.documentPath &&
      this.segmentPath.length < other.segmentPath.length &&
      this.segmentPath.every((segment, index) => other.segmentPath[index] === segment)
    );
  }

  equals(other: Reference): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return `${this.documentPath}#${this.segmentPath.map((segment) => `/${segment}`).join('')}`;
  }
}
