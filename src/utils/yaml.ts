/**
 * YAML parsing and serialization utilities.
 */
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { RefGraphError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

function parseFailure(error: unknown): RefGraphError {
  return new RefGraphError(
    ErrorCodes.PARSE_ERROR,
    `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`,
    { error }
  );
}

/**
 * Parse YAML content into plain objects.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw parseFailure(error);
  }
}

/**
 * Parse YAML content keeping mappings as `Map`s, so key order is exactly the
 * source order (plain objects would hoist integer-like keys such as `200`).
 * Keys come back as whatever YAML resolved them to, not necessarily strings.
 */
export function parseYamlOrdered(content: string): unknown {
  try {
    return parse(content, { mapAsMap: true });
  } catch (error) {
    throw parseFailure(error);
  }
}

/**
 * Parse JSON content with the same ordered-`Map` output as parseYamlOrdered.
 * The `json` schema rejects plain YAML scalars, so only JSON text is accepted.
 */
export function parseJsonOrdered(content: string): unknown {
  try {
    return parse(content, { mapAsMap: true, schema: 'json' });
  } catch (error) {
    throw parseFailure(error);
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodType>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed);

  if (!result.success) {
    throw new RefGraphError(
      ErrorCodes.PARSE_ERROR,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 */
export async function loadYamlWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  try {
    const content = await readFile(filePath);
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (error instanceof RefGraphError) {
      // Re-throw with file path context
      throw new RefGraphError(
        error.code,
        `${error.message} (file: ${filePath})`,
        { ...error.details, filePath }
      );
    }
    throw new RefGraphError(
      ErrorCodes.LOAD_FAILED,
      `Failed to load YAML file: ${filePath}`,
      { filePath, error }
    );
  }
}

/**
 * Stringify a value to YAML.
 */
export function stringifyYaml(data: unknown): string {
  return stringify(data, {
    indent: 2,
    lineWidth: 100,
  });
}

/**
 * Format Zod errors into a readable string.
 */
function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((e) => {
      const path = e.path.join('.');
      return path ? `${path}: ${e.message}` : e.message;
    })
    .join('; ');
}
