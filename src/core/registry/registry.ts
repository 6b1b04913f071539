/**
 * Loads documents through a ContentLoader, caches them and resolves
 * references through chains of indirection nodes.
 */
import type { ContentLoader, StructuralMap, StructuralValue } from '../documents/types.js';
import { isStructuralList, isStructuralMap } from '../documents/value.js';
import { Reference } from '../reference/reference.js';
import {
  CircularReferenceError,
  ErrorCodes,
  NavigationError,
  NotFoundError,
  ResolutionError,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DocumentCache } from './cache.js';
import { Fragment } from './fragment.js';

const log = logger.child('registry');

export const DEFAULT_REFERENCE_KEY = '$ref';
export const DEFAULT_MAX_DEPTH = 64;

const INDEX_PATTERN = /^(0|[1-9]\d*)$/;

export interface FragmentRegistryOptions {
  /** Reserved key that marks an indirection node (default `$ref`) */
  referenceKey?: string;
  /** Maximum indirection hops followed by a single resolution (default 64) */
  maxDepth?: number;
  /** Document cache; defaults to a fresh cache owned by this registry */
  cache?: DocumentCache;
}

/**
 * A terminal coordinate and the value found there.
 */
export interface ResolvedValue {
  reference: Reference;
  value: StructuralValue;
}

export class FragmentRegistry {
  readonly referenceKey: string;
  readonly maxDepth: number;
  private readonly cache: DocumentCache;

  constructor(
    private readonly loader: ContentLoader,
    options: FragmentRegistryOptions = {}
  ) {
    this.referenceKey = options.referenceKey ?? DEFAULT_REFERENCE_KEY;
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.cache = options.cache ?? new DocumentCache();
  }

  /**
   * Return a document's root value, loading it on first use.
   * @throws LoadError from the content loader
   */
  loadDocument(path: string): StructuralMap {
    const cached = this.cache.get(path);
    if (cached) return cached;

    const document = this.loader.loadMap(path);
    log.debug(`Loaded document ${path}`);
    return this.cache.add(path, document);
  }

  /** Document paths loaded so far, in load order. */
  loadedDocuments(): string[] {
    return this.cache.paths();
  }

  /**
   * Walk a reference's segments through its document without following indirection.
   *
   * Returns undefined when a key or index along the way is absent. Empty
   * segments are skipped.
   */
  rawValueAt(reference: Reference): StructuralValue | undefined {
    let current: StructuralValue = this.loadDocument(reference.documentPath);

    for (const segment of reference.segmentPath) {
      if (segment === '') continue;

      if (isStructuralMap(current)) {
        const next = current.get(segment);
        if (next === undefined) return undefined;
        current = next;
      } else if (isStructuralList(current)) {
        if (!INDEX_PATTERN.test(segment)) {
          throw new NavigationError(
            ErrorCodes.INVALID_INDEX,
            `Segment '${segment}' is not a list index in ${reference}`,
            { reference: reference.toString(), segment }
          );
        }
        const index = Number(segment);
        if (index >= current.length) return undefined;
        current = current[index];
      } else {
        throw new NavigationError(
          ErrorCodes.SCALAR_DESCENT,
          `Cannot descend into scalar at segment '${segment}' of ${reference}`,
          { reference: reference.toString(), segment }
        );
      }
    }

    return current;
  }

  /**
   * The reference string held by an indirection node, or undefined for any other value.
   * Sibling keys next to the reference key are ignored.
   */
  referenceTarget(value: StructuralValue): string | undefined {
    if (!isStructuralMap(value)) return undefined;
    const target = value.get(this.referenceKey);
    return typeof target === 'string' ? target : undefined;
  }

  isReferenceNode(value: StructuralValue): boolean {
    return this.referenceTarget(value) !== undefined;
  }

  /**
   * Follow indirection from `reference` to a terminal value.
   *
   * @returns undefined when any coordinate on the chain has no value
   * @throws CircularReferenceError when the chain revisits a coordinate
   * @throws ResolutionError when the chain is longer than maxDepth hops
   */
  resolve(reference: Reference): ResolvedValue | undefined {
    const chain: Reference[] = [];
    const visited = new Set<string>();
    let current = reference;

    for (;;) {
      if (visited.has(current.key)) {
        const cycle = [...chain, current].map((ref) => ref.toString());
        throw new CircularReferenceError(
          `Circular reference detected: ${cycle.join(' → ')}`,
          cycle
        );
      }
      visited.add(current.key);
      chain.push(current);

      const value = this.rawValueAt(current);
      if (value === undefined) return undefined;

      const target = this.referenceTarget(value);
      if (target === undefined) return { reference: current, value };

      if (chain.length > this.maxDepth) {
        throw new ResolutionError(
          ErrorCodes.MAX_DEPTH_EXCEEDED,
          `Reference chain starting at ${reference} exceeds ${this.maxDepth} hops`,
          { reference: reference.toString(), maxDepth: this.maxDepth }
        );
      }
      current = current.resolve(target);
    }
  }

  getOptional(reference: Reference): Fragment | undefined {
    const resolved = this.resolve(reference);
    if (!resolved) return undefined;
    return new Fragment(this, resolved.reference, resolved.value);
  }

  /**
   * @throws NotFoundError carrying the requested reference when nothing is there
   */
  get(reference: Reference): Fragment {
    const fragment = this.getOptional(reference);
    if (!fragment) {
      throw new NotFoundError(`Reference not found: ${reference}`, reference.toString());
    }
    return fragment;
  }
}
