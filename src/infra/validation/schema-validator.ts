import Ajv2020 from 'ajv/dist/2020.js';
import addFormats from 'ajv-formats';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

export type { SchemaObject, ValidateFunction } from 'ajv';

export interface SchemaViolation {
  path: string;
  message: string;
}

let sharedAjv: Ajv2020 | null = null;

function getAjv(): Ajv2020 {
  if (!sharedAjv) {
    sharedAjv = new Ajv2020({ allErrors: true, strict: false });
    addFormats(sharedAjv);
  }
  return sharedAjv;
}

/**
 * Compile a JSON Schema into a type guard for T.
 * The caller is responsible for keeping T and the schema in step.
 */
export function compileSchema<T>(schema: SchemaObject): ValidateFunction<T> {
  return getAjv().compile<T>(schema);
}

export function describeViolations(errors: ErrorObject[] | null | undefined): SchemaViolation[] {
  return (errors || []).map((err) => ({
    path: err.instancePath || '/',
    message: err.message || 'Unknown validation error',
  }));
}

export function formatViolations(violations: SchemaViolation[]): string {
  return violations.map((v) => `${v.path}: ${v.message}`).join('; ');
}
