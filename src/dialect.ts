/**
 * Wiki dialect configuration
 *
 * Section names, table headers and markers the extractor expects to find.
 * Kept out of the parsing code so markup drift on the wiki only needs a
 * config change.
 */

import { z } from 'zod';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from './errors';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_DIALECT_PATH = join(__dirname, '..', 'config', 'dialect.json');

const NonEmptyString = z.string().min(1);

export const WikiDialectSchema = z.object({
  states: z.array(NonEmptyString).min(1).describe('Top-level sections holding packets, one per protocol state'),
  ignoredSections: z.array(NonEmptyString).describe('Top-level sections known to hold no packets'),
  directions: z.array(NonEmptyString).min(1).describe('Section names allowed directly below a state'),
  packetIdHeader: NonEmptyString.describe('Content of the first header cell of a packet table'),
  fieldNameHeader: NonEmptyString,
  fieldTypeHeader: NonEmptyString,
  noFieldsMarker: NonEmptyString.describe('Name cell content marking a packet without fields'),
  maxDepth: z.number().int().positive().describe('Deepest composite nesting accepted')
});

export type WikiDialect = z.infer<typeof WikiDialectSchema>;

/**
 * Load and validate a dialect file. Defaults to the bundled dialect.
 */
export function loadDialect(path: string = DEFAULT_DIALECT_PATH): WikiDialect {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read dialect file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseDialect(raw, path);
}

export function parseDialect(raw: unknown, source = 'dialect'): WikiDialect {
  const result = WikiDialectSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid dialect in ${source}: ${issues}`);
  }
  return result.data;
}
