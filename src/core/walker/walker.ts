/**
 * Traversal of every fragment reachable from a root reference.
 */
import type { StructuralValue } from '../documents/types.js';
import { isStructuralList, isStructuralMap } from '../documents/value.js';
import type { Reference } from '../reference/reference.js';
import type { Fragment } from '../registry/fragment.js';
import type { FragmentRegistry } from '../registry/registry.js';
import { NotFoundError, RefGraphError } from '../../utils/errors.js';

/**
 * A child coordinate that could not be resolved.
 */
export interface ReferenceIssue {
  /** Coordinate of the indirection node (or value) that failed */
  from: string;
  /** Reference string held by the node, when it is an indirection node */
  target?: string;
  error: RefGraphError;
}

export interface WalkResult {
  /** Distinct fragments in visit order (pre-order, document order) */
  visited: Fragment[];
  /** Documents loaded by the end of the walk */
  documents: string[];
  issues: ReferenceIssue[];
}

export interface WalkOptions {
  onVisit?: (fragment: Fragment) => void;
}

function childEntries(value: StructuralValue): Array<[string | number, StructuralValue]> {
  if (isStructuralMap(value)) return [...value.entries()];
  if (isStructuralList(value)) return value.map((item, index): [number, StructuralValue] => [index, item]);
  return [];
}

/**
 * Visit every fragment reachable from `root`, following indirection.
 *
 * Each resolved reference is visited once, so shared schemas are seen once and
 * cyclic graphs terminate. Failures below the root are collected as issues;
 * a root that cannot be resolved throws.
 */
export function walkReferences(
  registry: FragmentRegistry,
  root: Reference,
  options: WalkOptions = {}
): WalkResult {
  const visited: Fragment[] = [];
  const issues: ReferenceIssue[] = [];
  const seen = new Set<string>();
  const stack: Fragment[] = [registry.get(root)];

  while (stack.length > 0) {
    const fragment = stack.pop();
    if (!fragment || seen.has(fragment.key)) continue;
    seen.add(fragment.key);
    visited.push(fragment);
    options.onVisit?.(fragment);

    const children: Fragment[] = [];
    for (const [segment, raw] of childEntries(fragment.value)) {
      const childReference = fragment.reference.child(segment);
      const target = registry.referenceTarget(raw);
      try {
        const child = registry.getOptional(childReference);
        if (child) {
          children.push(child);
        } else {
          issues.push({
            from: childReference.toString(),
            target,
            error: new NotFoundError(
              `Reference ${target ?? ''} from ${childReference} not found`,
              childReference.toString()
            ),
          });
        }
      } catch (error) {
        if (!(error instanceof RefGraphError)) throw error;
        issues.push({ from: childReference.toString(), target, error });
      }
    }
    stack.push(...children.reverse());
  }

  return { visited, documents: registry.loadedDocuments(), issues };
}
