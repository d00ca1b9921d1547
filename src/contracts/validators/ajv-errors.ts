/**
 * Shared Ajv setup and error mapping for boundary validators
 */

import Ajv from 'ajv';
import type { ErrorObject } from 'ajv';
import type { RejectionReason } from '../../shared/types.js';
import { ErrorCodes } from '../../shared/error-codes.js';

const AjvClass = Ajv.default ?? Ajv;

/** Strict Ajv instance; union types are allowed for nullable fields */
export function createAjv() {
  return new AjvClass({
    allErrors: true,
    strict: true,
    strictSchema: true,
    allowUnionTypes: true,
  });
}

function stringParam(error: ErrorObject, name: string): string | undefined {
  const value: unknown = error.params[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Convert Ajv instancePath to field_path (dot notation).
 * For `required`, the missing property is appended.
 */
function getFieldPath(error: ErrorObject): string {
  const base = error.instancePath.replace(/^\//, '').replace(/\//g, '.');
  const missing = error.keyword === 'required' ? stringParam(error, 'missingProperty') : undefined;
  if (missing) return base ? `${base}.${missing}` : missing;
  return base;
}

function mapAjvErrorToCode(error: ErrorObject): string {
  switch (error.keyword) {
    case 'required':
      return ErrorCodes.MISSING_REQUIRED_FIELD;
    case 'type':
      return ErrorCodes.INVALID_TYPE;
    default:
      return ErrorCodes.INVALID_FORMAT;
  }
}

function getErrorMessage(error: ErrorObject, field: string): string {
  switch (error.keyword) {
    case 'required':
      return `Missing required field: ${field}`;
    case 'type':
      return `Field '${field}' has invalid type, expected ${String(error.params['type'])}`;
    case 'enum':
      return `Field '${field}' must be one of: ${Array.isArray(error.params['allowedValues']) ? error.params['allowedValues'].join(', ') : 'the allowed values'}`;
    case 'additionalProperties':
      return `Unknown field '${stringParam(error, 'additionalProperty') ?? 'unknown'}'`;
    case 'minLength':
      return `Field '${field}' must not be empty`;
    case 'pattern':
      return `Field '${field}' format is invalid`;
    default:
      return error.message ? `Field '${field}' ${error.message}` : `Validation error on field '${field}'`;
  }
}

/**
 * Map Ajv errors to rejection reasons with canonical codes
 */
export function toRejectionReasons(errors: readonly ErrorObject[] | null | undefined): RejectionReason[] {
  return (errors ?? []).map((error) => {
    const field = getFieldPath(error);
    return {
      code: mapAjvErrorToCode(error),
      message: getErrorMessage(error, field || 'body'),
      field_path: field || undefined,
    };
  });
}
