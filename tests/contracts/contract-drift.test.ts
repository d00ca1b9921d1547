/**
 * Contract Drift Detection Tests (DRIFT-001 through DRIFT-007)
 *
 * Validates that JSON Schemas (source of truth) remain aligned with
 * their corresponding component schemas in the OpenAPI spec.
 *
 * Compares: required arrays, properties keys and enum values.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type Node = Record<string, unknown>;

function isNode(value: unknown): value is Node {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function resolve(dotPath: string, root: unknown): Node {
  let current: unknown = root;
  for (const part of dotPath.split('.')) {
    if (!isNode(current)) {
      throw new Error(`Path "${dotPath}" not found, failed at "${part}"`);
    }
    current = current[part];
  }
  if (!isNode(current)) {
    throw new Error(`Path "${dotPath}" is not an object`);
  }
  return current;
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string').sort() : [];
}

function required(schema: Node): string[] {
  return strings(schema['required']);
}

function propertyKeys(schema: Node): string[] {
  const properties = schema['properties'];
  return isNode(properties) ? Object.keys(properties).sort() : [];
}

function enumAt(schema: Node, dotPath: string): string[] {
  return strings(resolve(dotPath, schema)['enum']);
}

function readSchema(path: string): Node {
  const parsed: unknown = JSON.parse(readFileSync(join(process.cwd(), path), 'utf-8'));
  if (!isNode(parsed)) {
    throw new Error(`${path} is not a JSON object`);
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// Schema loading (shared across all tests)
// ---------------------------------------------------------------------------

let factJson: Node;
let checkJson: Node;
let resultJson: Node;
let openapiFact: Node;
let openapiCheck: Node;
let openapiVerdict: Node;
let openapiResult: Node;

beforeAll(() => {
  factJson = readSchema('src/contracts/schemas/fact.json');
  checkJson = readSchema('src/contracts/schemas/eligibility-check-request.json');
  resultJson = readSchema('src/contracts/schemas/eligibility-result.json');

  const openapi: unknown = YAML.parse(readFileSync(join(process.cwd(), 'docs/api/openapi.yaml'), 'utf-8'));
  openapiFact = resolve('components.schemas.FactInput', openapi);
  openapiCheck = resolve('components.schemas.EligibilityCheckRequest', openapi);
  openapiVerdict = resolve('components.schemas.AIVerdict', openapi);
  openapiResult = resolve('components.schemas.EligibilityResult', openapi);
});

// ---------------------------------------------------------------------------
// Fact schema drift tests
// ---------------------------------------------------------------------------

describe('Fact contract drift', () => {
  it('DRIFT-001: Fact JSON Schema required fields and properties match OpenAPI FactInput', () => {
    expect(required(factJson)).toEqual(required(openapiFact));
    expect(propertyKeys(factJson)).toEqual(propertyKeys(openapiFact));
  });

  it('DRIFT-002: Fact source enum matches OpenAPI', () => {
    expect(enumAt(factJson, 'properties.source')).toEqual(enumAt(openapiFact, 'properties.source'));
  });
});

// ---------------------------------------------------------------------------
// Eligibility check request drift tests
// ---------------------------------------------------------------------------

describe('Eligibility check request contract drift', () => {
  it('DRIFT-003: request required fields and properties match OpenAPI EligibilityCheckRequest', () => {
    expect(required(checkJson)).toEqual(required(openapiCheck));
    expect(propertyKeys(checkJson)).toEqual(propertyKeys(openapiCheck));
  });

  it('DRIFT-004: AIVerdict definition matches OpenAPI AIVerdict (required + properties + outcome enum)', () => {
    const verdictJson = resolve('definitions.AIVerdict', checkJson);

    expect(required(verdictJson)).toEqual(required(openapiVerdict));
    expect(propertyKeys(verdictJson)).toEqual(propertyKeys(openapiVerdict));
    expect(enumAt(verdictJson, 'properties.outcome')).toEqual(enumAt(openapiVerdict, 'properties.outcome'));
  });
});

// ---------------------------------------------------------------------------
// Eligibility result drift tests
// ---------------------------------------------------------------------------

describe('Eligibility result contract drift', () => {
  it('DRIFT-005: result required fields match OpenAPI EligibilityResult.required', () => {
    expect(required(resultJson)).toEqual(required(openapiResult));
  });

  it('DRIFT-006: result properties keys match OpenAPI EligibilityResult.properties keys', () => {
    expect(propertyKeys(resultJson)).toEqual(propertyKeys(openapiResult));
  });

  it('DRIFT-007: outcome and escalation reason enums match OpenAPI', () => {
    expect(enumAt(resultJson, 'properties.outcome')).toEqual(enumAt(openapiResult, 'properties.outcome'));
    expect(enumAt(resultJson, 'properties.escalation_reasons.items')).toEqual(
      enumAt(openapiResult, 'properties.escalation_reasons.items')
    );
    expect(enumAt(resultJson, 'properties.escalation_reasons.items')).toHaveLength(4);
  });
});
