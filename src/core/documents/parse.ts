/**
 * Extension-dispatched document parsing shared by all content loaders.
 */
import { LoadError, ErrorCodes } from '../../utils/errors.js';
import { extensionOf } from '../../utils/file-system.js';
import { parseJsonOrdered, parseYamlOrdered } from '../../utils/yaml.js';
import type { StructuralMap, StructuralValue } from './types.js';
import { isStructuralMap, kindOf, toStructuralValue, UnsupportedValueError } from './value.js';

type DocumentFormat = 'json' | 'yaml';

const FORMATS_BY_EXTENSION = new Map<string, DocumentFormat>([
  ['json', 'json'],
  ['yaml', 'yaml'],
  ['yml', 'yaml'],
]);

/**
 * Pick the parser for a document path. No content sniffing.
 */
export function formatOf(path: string): DocumentFormat {
  const extension = extensionOf(path);
  const format = FORMATS_BY_EXTENSION.get(extension);
  if (!format) {
    throw new LoadError(
      ErrorCodes.UNSUPPORTED_EXTENSION,
      `Unsupported extension '${extension}' for document ${path}`,
      path,
      { extension }
    );
  }
  return format;
}

function parseRaw(path: string, format: DocumentFormat, content: string): unknown {
  try {
    return format === 'json' ? parseJsonOrdered(content) : parseYamlOrdered(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    throw new LoadError(ErrorCodes.PARSE_ERROR, `Failed to parse ${path}: ${reason}`, path, {
      format,
    });
  }
}

/**
 * Parse document text into its root mapping.
 */
export function parseDocument(path: string, content: string): StructuralMap {
  const format = formatOf(path);
  const raw = parseRaw(path, format, content);

  let value: StructuralValue;
  try {
    value = toStructuralValue(raw);
  } catch (error) {
    if (error instanceof UnsupportedValueError) {
      throw new LoadError(ErrorCodes.INVALID_DOCUMENT, `${error.message} in ${path}`, path);
    }
    throw error;
  }

  if (!isStructuralMap(value)) {
    throw new LoadError(
      ErrorCodes.INVALID_DOCUMENT,
      `Document ${path} must have a mapping at its root, found ${kindOf(value)}`,
      path
    );
  }
  return value;
}
