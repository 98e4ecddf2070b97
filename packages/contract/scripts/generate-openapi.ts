/**
 * CLI script: generate artifacts/openapi.json from the contract registry.
 *
 * Usage: npm run openapi
 */

import { writeFileSync, mkdirSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { generateOpenApiDocument } from '../src/openapi/generate.js';

const here = dirname(fileURLToPath(import.meta.url));
const outputPath = resolve(here, '..', '..', '..', 'artifacts', 'openapi.json');

mkdirSync(dirname(outputPath), { recursive: true });

const doc = generateOpenApiDocument();
writeFileSync(outputPath, JSON.stringify(doc, null, 2) + '\n', 'utf-8');

const pathCount = Object.keys(doc.paths ?? {}).length;
console.log(`Generated ${outputPath} (${pathCount} paths)`);
