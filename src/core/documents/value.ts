import type { StructuralList, StructuralMap, StructuralValue, ValueKind } from './types.js';

export function isStructuralMap(value: StructuralValue): value is StructuralMap {
  return value instanceof Map;
}

export function isStructuralList(value: StructuralValue): value is StructuralList {
  return Array.isArray(value);
}

export function kindOf(value: StructuralValue): ValueKind {
  if (isStructuralMap(value)) return 'map';
  if (isStructuralList(value)) return 'list';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  return 'scalar';
}

/**
 * Thrown by toStructuralValue for values outside the document model.
 * Loaders turn it into a LoadError with the document path attached.
 */
export class UnsupportedValueError extends Error {
  constructor(
    public readonly path: string[],
    public readonly valueType: string,
    message = `Unsupported value of type ${valueType} at /${path.join('/')}`
  ) {
    super(message);
    this.name = 'UnsupportedValueError';
  }
}

/**
 * Convert parser output into a StructuralValue.
 *
 * Accepts both `Map`s (YAML parsed with `mapAsMap`) and plain objects.
 * Map keys are stringified, so a YAML `200:` key becomes `"200"`.
 * A container that contains itself (a recursive YAML alias) is rejected.
 */
export function toStructuralValue(raw: unknown, path: string[] = []): StructuralValue {
  return convert(raw, path, new Set());
}

function convert(raw: unknown, path: string[], active: Set<object>): StructuralValue {
  if (raw === null || typeof raw === 'string' || typeof raw === 'boolean') {
    return raw;
  }
  if (typeof raw === 'number') {
    return raw;
  }
  if (typeof raw !== 'object') {
    throw new UnsupportedValueError(path, typeof raw);
  }
  if (active.has(raw)) {
    const kind = Array.isArray(raw) ? 'list' : 'map';
    throw new UnsupportedValueError(path, kind, `Recursive ${kind} at /${path.join('/')}`);
  }

  active.add(raw);
  try {
    return convertContainer(raw, path, active);
  } finally {
    active.delete(raw);
  }
}

function convertContainer(raw: object, path: string[], active: Set<object>): StructuralValue {
  if (Array.isArray(raw)) {
    return raw.map((item: unknown, index) => convert(item, [...path, String(index)], active));
  }
  const entries: Iterable<[unknown, unknown]> = raw instanceof Map ? raw : Object.entries(raw);
  const result = new Map<string, StructuralValue>();
  for (const [key, value] of entries) {
    const name = String(key);
    result.set(name, convert(value, [...path, name], active));
  }
  return result;
}

export type PlainValue = { [key: string]: PlainValue } | PlainValue[] | string | boolean | number | null;

/**
 * Convert a structural value to plain objects and arrays, for JSON output.
 */
export function toPlainValue(value: StructuralValue): PlainValue {
  if (isStructuralMap(value)) {
    return Object.fromEntries([...value].map(([key, item]): [string, PlainValue] => [key, toPlainValue(item)]));
  }
  if (isStructuralList(value)) {
    return value.map((item) => toPlainValue(item));
  }
  return value;
}
