/**
 * Rule library loading
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ReconError } from '../errors/index.js';
import type { PredicateDefinition } from './ast.js';
import { parsePredicateLibrary } from './parser.js';

export const DEFAULT_LIBRARY_PATH = fileURLToPath(new URL('../../rules/defect-library.json', import.meta.url));

/**
 * Read and parse a rule library file; the bundled defect library by default
 */
export function loadPredicateLibrary(path: string = DEFAULT_LIBRARY_PATH): PredicateDefinition[] {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new ReconError({
      code: 'INVALID_PREDICATE',
      message: `Cannot read rule library ${path}: ${error instanceof Error ? error.message : String(error)}`,
      suggestion: 'Check rules.libraryPath in the config file.',
      cause: error instanceof Error ? error : undefined,
      context: { path },
    });
  }
  return parsePredicateLibrary(document);
}
