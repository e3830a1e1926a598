/**
 * Settings Validator
 *
 * Validates settings data against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import type { LabkeeperSettingsFile } from './types.js';
import settingsSchema from './settings.schema.json' with { type: 'json' };

/**
 * Validation error details
 */
export interface ValidationError {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

export type ValidationResult =
  | { valid: true; settings: LabkeeperSettingsFile }
  | { valid: false; errors: ValidationError[] };

const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
  strict: false,
});
addFormats.default(ajv);

const validate = ajv.compile<LabkeeperSettingsFile>(settingsSchema);

function describeAjvError(error: ErrorObject): string {
  const key: unknown = error.params['additionalProperty'];
  if (error.keyword === 'additionalProperties' && typeof key === 'string') {
    return `unknown key '${key}'`;
  }
  return error.message ?? 'Unknown validation error';
}

/**
 * Map Ajv errors; an unknown key is named in the message.
 */
export function toValidationErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  return (errors ?? []).map((error) => ({
    path: error.instancePath || '/',
    message: describeAjvError(error),
    params: { ...error.params },
  }));
}

/**
 * Validate parsed settings. An empty file (YAML `null`) is an empty object.
 */
export function validateSettings(data: unknown): ValidationResult {
  const candidate = data ?? {};

  if (!validate(candidate)) {
    return { valid: false, errors: toValidationErrors(validate.errors) };
  }

  return { valid: true, settings: candidate };
}

/**
 * Format validation errors, one per line.
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors
    .map((error) => {
      const path = error.path || '/';
      return `  - ${path}: ${error.message}`;
    })
    .join('\n');
}
