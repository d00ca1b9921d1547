/**
 * Validate all JSON Schemas in src/contracts/schemas/
 * Compiles each with Ajv to ensure they are well-formed and usable.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { createAjv } from '../src/contracts/validators/ajv-errors.js';

const schemasDir = join(process.cwd(), 'src', 'contracts', 'schemas');
const files = readdirSync(schemasDir).filter((f) => f.endsWith('.json'));

if (files.length === 0) {
  console.log('No JSON schema files found in src/contracts/schemas/');
  process.exit(0);
}

let failed = false;

for (const file of files) {
  const filePath = join(schemasDir, file);
  try {
    const schema: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    if (schema === null || typeof schema !== 'object' || Array.isArray(schema)) {
      throw new Error('schema root must be an object');
    }
    createAjv().compile(schema);
    console.log(`✓ ${file}`);
  } catch (err) {
    console.error(`✗ ${file}: ${err instanceof Error ? err.message : String(err)}`);
    failed = true;
  }
}

if (failed) {
  console.error('\nSchema validation failed.');
  process.exit(1);
} else {
  console.log(`\nAll ${files.length} schema(s) valid.`);
  process.exit(0);
}
