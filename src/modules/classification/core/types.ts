/**
 * Classification Module Types
 *
 * Domain types for the hierarchical industry classification catalog.
 */

// ============================================================================
// Code Types
// ============================================================================

export type LevelName = 'section' | 'division' | 'group' | 'class' | 'subclass';

/**
 * Depth of a code. Sections count as 1; every other level counts its digits.
 */
export type DigitCount = 1 | 2 | 3 | 4 | 5;

/**
 * A validated classification code.
 *
 * The canonical form is the section letter, the numeric digits and `x` filler
 * up to six characters, e.g. `A0111x` for class 01.11.
 */
export interface ClassificationCode {
  /** Fixed-width form, e.g. `A0111x` */
  readonly canonical: string;
  /** Canonical form without filler, e.g. `A0111` */
  readonly unpadded: string;
  /** Section letter, e.g. `A` */
  readonly section: string;
  /** Numeric digits, empty for sections */
  readonly digits: string;
  readonly digitCount: DigitCount;
  readonly level: LevelName;
  /** Human-readable form, e.g. `01.11` or `01.11/1` */
  readonly formatted: string;
}

// ============================================================================
// Metadata Types
// ============================================================================

export interface MetadataRecord {
  /** Canonical code (`A0111x`) */
  readonly code: string;
  readonly title: string;
  readonly detail: string;
  readonly includes: readonly string[];
  readonly excludes: readonly string[];
}

// ============================================================================
// Node Types
// ============================================================================

/**
 * Read-only view of a catalog node.
 */
export interface CatalogNode {
  readonly code: ClassificationCode;
  readonly description: string;
  readonly activities: readonly string[];
  readonly metadata: MetadataRecord | null;
  /** Back-reference; null for sections */
  readonly parent: CatalogNode | null;
  readonly children: readonly CatalogNode[];
}

/**
 * Node shape used while the hierarchy is being built.
 */
export interface MutableCatalogNode {
  readonly code: ClassificationCode;
  readonly description: string;
  activities: string[];
  metadata: MetadataRecord | null;
  parent: MutableCatalogNode | null;
  children: MutableCatalogNode[];
}

// ============================================================================
// Source Row Types
// ============================================================================

/**
 * One row of the structural source.
 */
export interface StructureRow {
  description: string;
  /** Section letter */
  section: string;
  /** Most disaggregated numeric code; the section letter for section rows */
  code: string;
  /** Level heading, e.g. `Class` or `Sub Class` */
  level: string;
}

/**
 * One row of the activity index source.
 */
export interface ActivityRow {
  /** Numeric code, 5 digits for classes and subclasses */
  code: string;
  activity: string;
}

// ============================================================================
// Query Types
// ============================================================================

export interface LeafText {
  code: ClassificationCode;
  text: string;
}

/**
 * Flattened leaf text with the code in its formatted form.
 */
export interface LeafTextRow {
  code: string;
  text: string;
}

// ============================================================================
// Constants
// ============================================================================

export const CODE_WIDTH = 6;
export const FILLER = 'x';

export const LEVEL_BY_DIGIT_COUNT: Readonly<Record<DigitCount, LevelName>> = {
  1: 'section',
  2: 'division',
  3: 'group',
  4: 'class',
  5: 'subclass',
};
