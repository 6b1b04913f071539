/**
 * Document value model and loader contract.
 */

/**
 * A loaded document value. Mappings are `Map`s so key order is the source order.
 */
export type StructuralValue =
  | StructuralMap
  | StructuralList
  | string
  | boolean
  | number
  | null;

export type StructuralMap = ReadonlyMap<string, StructuralValue>;

export type StructuralList = readonly StructuralValue[];

/**
 * Kind of a structural value. Numbers and null are both `scalar`.
 */
export type ValueKind = 'map' | 'list' | 'string' | 'boolean' | 'scalar';

/**
 * Loads a document by its path into a structural value.
 * Implementations do not cache; the registry does.
 */
export interface ContentLoader {
  /**
   * @throws LoadError if the document is unreadable, unparsable,
   *   has an unsupported extension, or its root is not a mapping
   */
  loadMap(path: string): StructuralMap;
}
