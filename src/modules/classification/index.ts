/**
 * Classification Module - Public API
 *
 * Builds the classification hierarchy from flat sources and resolves codes
 * in any of their spellings.
 */

// =============================================================================
// Codes & Nodes
// =============================================================================
export {
  parseCode,
  codeFromParts,
  compareCodes,
  codesEqual,
  normalizeLevelName,
  parentCanonical,
  fiveDigitKey,
} from './core/code.js';
export { isLeaf, paddedNumericCode, nodeLabel, describeNode } from './core/node.js';

// =============================================================================
// Metadata
// =============================================================================
export type { MetadataStore } from './core/ports.js';
export { matchesCodePrefix, summarizeMetadata } from './core/metadata.js';
export {
  CROSS_REFERENCE_PATTERN,
  unescapeHtml,
  stripCrossReferences,
  cleanText,
  cleanMetadata,
} from './core/text-cleaning.js';

// =============================================================================
// Use Cases
// =============================================================================
export {
  buildHierarchy,
  type BuildHierarchyDeps,
  type BuildHierarchyInput,
} from './core/usecases/build-hierarchy.js';
export { createHierarchy, type Hierarchy } from './core/hierarchy.js';

// =============================================================================
// Sources
// =============================================================================
export {
  createInMemoryMetadataStore,
  loadMetadataStore,
  toMetadataRecords,
  MetadataFileSchema,
  type LoadMetadataStoreOptions,
  type MetadataFileDTO,
} from './shell/repo/metadata-store.js';
export {
  readStructureRows,
  readActivityRows,
  StructureFileSchema,
  ActivityFileSchema,
  type ReadSourceOptions,
} from './shell/repo/csv-sources.js';

// =============================================================================
// Types
// =============================================================================
export type {
  ClassificationCode,
  LevelName,
  DigitCount,
  MetadataRecord,
  CatalogNode,
  StructureRow,
  ActivityRow,
  LeafText,
  LeafTextRow,
} from './core/types.js';
export { CODE_WIDTH, FILLER, LEVEL_BY_DIGIT_COUNT } from './core/types.js';

// =============================================================================
// Errors
// =============================================================================
export type {
  ClassificationError,
  HierarchyBuildError,
  FormatError,
  LookupError,
  LookupStage,
  ConsistencyError,
  CodeNotFoundError,
} from './core/errors.js';
export {
  createFormatError,
  createLookupError,
  createConsistencyError,
  createCodeNotFoundError,
} from './core/errors.js';
