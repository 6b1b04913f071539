import type { StructuralMap } from '../documents/types.js';

/**
 * Loaded root documents keyed by document path. Append-only: entries are never
 * replaced or evicted, documents are treated as immutable for a run.
 *
 * A cache can be seeded with documents that were parsed elsewhere, and shared
 * between registries that should see the same documents.
 */
export class DocumentCache {
  private readonly documents = new Map<string, StructuralMap>();

  constructor(seed: Iterable<readonly [string, StructuralMap]> = []) {
    for (const [path, document] of seed) {
      this.add(path, document);
    }
  }

  get(path: string): StructuralMap | undefined {
    return this.documents.get(path);
  }

  has(path: string): boolean {
    return this.documents.has(path);
  }

  /**
   * Store a document. A path that is already cached keeps its first document.
   */
  add(path: string, document: StructuralMap): StructuralMap {
    const existing = this.documents.get(path);
    if (existing) return existing;
    this.documents.set(path, document);
    return document;
  }

  /** Cached paths in load order. */
  paths(): string[] {
    return [...this.documents.keys()];
  }

  get size(): number {
    return this.documents.size;
  }
}
