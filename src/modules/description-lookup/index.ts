/**
 * Description Lookup Module - Public API
 *
 * Description-to-code lookups and curated rephrasing of code descriptions.
 */

// =============================================================================
// Lookups
// =============================================================================
export {
  createDescriptionLookup,
  type DescriptionLookup,
  type DescriptionLookupDeps,
} from './core/description-lookup.js';
export { createRephraseLookup, type RephraseLookup } from './core/rephrase-lookup.js';

// =============================================================================
// Sources
// =============================================================================
export {
  readDescriptionRows,
  readRephraseRows,
  DescriptionFileSchema,
  RephraseFileSchema,
  type ReadLookupSourceOptions,
} from './shell/repo/csv-sources.js';

// =============================================================================
// Types
// =============================================================================
export type {
  DescriptionRow,
  RephraseRow,
  DivisionInfo,
  DivisionSummary,
  PotentialMatches,
  DescriptionLookupResult,
  DescriptionLookupOptions,
  CodeCandidate,
  RephraseResult,
  RephraseCandidate,
  RephraseTarget,
} from './core/types.js';
export { CODE_LENGTH, DIVISION_LENGTH, CODE_NOT_FOUND } from './core/types.js';
