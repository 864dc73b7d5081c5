/**
 * JSON Schema validation utilities using Ajv.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction } from 'ajv';
import { readFile } from 'node:fs/promises';

/**
 * Result of schema validation.
 */
export interface ValidationResult<T> {
  valid: boolean;
  /** Typed data if valid, null otherwise */
  data: T | null;
  /** `<instance path>: <message>` lines */
  errors: string[];
}

const schemaCache = new Map<string, ValidateFunction>();

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(schemaPath: string | URL): Promise<object> {
  try {
    const content = await readFile(schemaPath, 'utf-8');
    return JSON.parse(content) as object;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${String(schemaPath)}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function compile(schema: object): ValidateFunction {
  const schemaId = (schema as { $id?: string }).$id || JSON.stringify(schema);
  const cached = schemaCache.get(schemaId);
  if (cached) {
    return cached;
  }

  // Type assertion needed due to NodeNext module resolution
  const Ajv = AjvDefault as unknown as new (options?: { strict?: boolean; allErrors?: boolean }) => {
    compile: (schema: object) => ValidateFunction;
  };
  const ajv = new Ajv({ strict: true, allErrors: true });
  const validate = ajv.compile(schema);
  schemaCache.set(schemaId, validate);
  return validate;
}

/**
 * Validates data against a JSON schema. Compiled schemas are cached by `$id`.
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  const validate = compile(schema);

  if (validate(data)) {
    return { valid: true, data: data as T, errors: [] };
  }

  const errors = (validate.errors ?? []).map((error) => {
    const path = error.instancePath || '/';
    return `${path}: ${error.message ?? 'validation error'}`;
  });

  return { valid: false, data: null, errors };
}
