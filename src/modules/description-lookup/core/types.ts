/**
 * Description Lookup Module Types
 */

import type { MetadataRecord } from '../../classification/index.js';

// ============================================================================
// Source Row Types
// ============================================================================

export interface DescriptionRow {
  /** Numeric code; 4-digit labels are classes missing their leading zero */
  label: string;
  description: string;
}

export interface RephraseRow {
  code: string;
  reviewedDescription: string;
}

// ============================================================================
// Description Lookup Results
// ============================================================================

export interface DivisionInfo {
  codeDivision: string | null;
  codeDivisionMeta: MetadataRecord | null;
}

export interface DivisionSummary {
  code: string;
  meta: MetadataRecord | null;
}

export interface PotentialMatches {
  /** Number of matching rows, duplicates included */
  descriptionsCount: number;
  descriptions: string[];
  codesCount: number;
  codes: string[];
  divisionsCount: number;
  divisions: DivisionSummary[];
}

export interface DescriptionLookupResult extends DivisionInfo {
  /** The query, lower-cased */
  description: string;
  code: string | null;
  codeMeta: MetadataRecord | null;
  /** Present when the lookup ran with `similarity` */
  potentialMatches?: PotentialMatches;
}

export interface DescriptionLookupOptions {
  similarity?: boolean;
}

export interface CodeCandidate {
  code: string;
}

// ============================================================================
// Rephrase Results
// ============================================================================

export type RephraseResult =
  | { found: true; code: string; reviewedDescription: string }
  | { found: false; code: string; error: string };

export interface RephraseCandidate {
  code: string;
  descriptive?: string;
}

/**
 * A classification result whose descriptions are replaced by reviewed ones.
 */
export interface RephraseTarget {
  code: string | null;
  description?: string | null;
  candidates: RephraseCandidate[];
}

// ============================================================================
// Constants
// ============================================================================

export const CODE_LENGTH = 5;
export const DIVISION_LENGTH = 2;
export const CODE_NOT_FOUND = 'Code not found';
