import type {
  StructuralList,
  StructuralMap,
  StructuralValue,
  ValueKind,
} from '../documents/types.js';
import { isStructuralList, isStructuralMap, kindOf } from '../documents/value.js';
import type { Reference } from '../reference/reference.js';
import { NotFoundError, TypeMismatchError } from '../../utils/errors.js';
import type { FragmentRegistry } from './registry.js';

/**
 * Kind name used in mismatch messages. Splits `scalar` into number and null.
 */
function describeValue(value: StructuralValue): string {
  if (value === null) return 'null';
  if (typeof value === 'number') return 'number';
  return kindOf(value);
}

/**
 * A dereferenced value together with the coordinate it lives at.
 *
 * Fragments are created on every resolution and never cached; two fragments
 * are equal when their references are, regardless of value. Navigation goes
 * back through the registry, so children that are indirection nodes come back
 * already resolved.
 */
export class Fragment {
  constructor(
    private readonly registry: FragmentRegistry,
    readonly reference: Reference,
    readonly value: StructuralValue
  ) {}

  get kind(): ValueKind {
    return kindOf(this.value);
  }

  /** Identity key, same as the reference's. */
  get key(): string {
    return this.reference.key;
  }

  private mismatch(expected: string): TypeMismatchError {
    const actual = describeValue(this.value);
    return new TypeMismatchError(
      `Reference ${this.reference} doesn't point to ${expected} (found ${actual})`,
      this.reference.toString(),
      expected,
      actual
    );
  }

  asMap(): StructuralMap {
    if (isStructuralMap(this.value)) return this.value;
    throw this.mismatch('map');
  }

  asList(): StructuralList {
    if (isStructuralList(this.value)) return this.value;
    throw this.mismatch('list');
  }

  asString(): string {
    if (typeof this.value === 'string') return this.value;
    throw this.mismatch('string');
  }

  /**
   * Booleans pass through; strings parse as `true` (any case) or false otherwise.
   */
  asBoolean(): boolean {
    if (typeof this.value === 'boolean') return this.value;
    if (typeof this.value === 'string') return this.value.toLowerCase() === 'true';
    throw this.mismatch('boolean');
  }

  asNumber(): number {
    if (typeof this.value === 'number') return this.value;
    throw this.mismatch('number');
  }

  getOptional(...elements: Array<string | number>): Fragment | undefined {
    return this.registry.getOptional(this.reference.child(...elements));
  }

  /**
   * @throws NotFoundError naming the full child coordinate
   */
  get(...elements: Array<string | number>): Fragment {
    const fragment = this.getOptional(...elements);
    if (!fragment) {
      const child = this.reference.child(...elements);
      throw new NotFoundError(`Can't find element by reference ${child}`, child.toString());
    }
    return fragment;
  }

  /**
   * The fragment enclosing this one in the same document, or undefined at the root.
   * This is the parent of the resolved location, not of any reference that led here.
   */
  parent(): Fragment | undefined {
    const parent = this.reference.parent();
    return parent ? this.registry.getOptional(parent) : undefined;
  }

  keys(): string[] {
    return [...this.asMap().keys()];
  }

  forEach(action: (key: string, fragment: Fragment) => void): void {
    for (const key of this.asMap().keys()) {
      action(key, this.get(key));
    }
  }

  map<R>(transform: (key: string, fragment: Fragment) => R): R[] {
    return [...this.asMap().keys()].map((key) => transform(key, this.get(key)));
  }

  forEachIndexed(action: (index: number, fragment: Fragment) => void): void {
    this.asList().forEach((_, index) => action(index, this.get(index)));
  }

  mapIndexed<R>(transform: (index: number, fragment: Fragment) => R): R[] {
    return this.asList().map((_, index) => transform(index, this.get(index)));
  }

  mapItems<R>(transform: (fragment: Fragment) => R): R[] {
    return this.asList().map((_, index) => transform(this.get(index)));
  }

  equals(other: Fragment): boolean {
    return this.reference.equals(other.reference);
  }

  toString(): string {
    return `Fragment(${this.reference}, ${this.kind})`;
  }
}
