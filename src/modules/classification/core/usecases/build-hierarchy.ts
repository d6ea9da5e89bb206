/**
 * Build Hierarchy Use Case
 *
 * Reconstructs the five-level tree from flat structural rows, then attaches
 * metadata and activity text and registers every spelling of each code.
 * Stages run in order and stop at the first error; nodes never escape a
 * failed build.
 */

import { err, ok, type Result } from 'neverthrow';

import { codeFromParts, fiveDigitKey, parentCanonical, parseCode } from '../code.js';
import {
  createConsistencyError,
  createLookupError,
  type HierarchyBuildError,
} from '../errors.js';
import { createHierarchy, type Hierarchy } from '../hierarchy.js';
import { createNode, isLeaf } from '../node.js';
import { cleanMetadata } from '../text-cleaning.js';
import { FILLER } from '../types.js';

import type { MetadataStore } from '../ports.js';
import type { ActivityRow, CatalogNode, MutableCatalogNode, StructureRow } from '../types.js';

export interface BuildHierarchyDeps {
  metadataStore: MetadataStore;
}

export interface BuildHierarchyInput {
  structure: readonly StructureRow[];
  activities: readonly ActivityRow[];
}

/**
 * Nodes in source order, indexed by unpadded code.
 */
export interface NodeIndex {
  nodes: MutableCatalogNode[];
  byCode: Map<string, MutableCatalogNode>;
}

// ============================================================================
// Stages
// ============================================================================

export const defineNodes = (
  rows: readonly StructureRow[]
): Result<NodeIndex, HierarchyBuildError> => {
  const nodes: MutableCatalogNode[] = [];
  const byCode = new Map<string, MutableCatalogNode>();

  for (const row of rows) {
    const code = codeFromParts(row.section, row.code, row.level);
    if (code.isErr()) {
      return err(code.error);
    }

    if (byCode.has(code.value.unpadded)) {
      return err(
        createConsistencyError(
          `Code '${code.value.formatted}' is defined more than once`,
          1,
          2
        )
      );
    }

    const node = createNode(code.value, row.description);
    nodes.push(node);
    byCode.set(code.value.unpadded, node);
  }

  return ok({ nodes, byCode });
};

export const linkParents = (index: NodeIndex): Result<void, HierarchyBuildError> => {
  for (const node of index.nodes) {
    const canonical = parentCanonical(node.code);
    if (canonical === null) {
      continue;
    }

    const parentKey = canonical.split(FILLER).join('');
    const parent = index.byCode.get(parentKey);
    if (parent === undefined) {
      return err(createLookupError('parent', canonical));
    }

    parent.children.push(node);
    node.parent = parent;
  }

  return ok(undefined);
};

export const attachMetadata = (
  index: NodeIndex,
  metadataStore: MetadataStore
): Result<void, HierarchyBuildError> => {
  if (metadataStore.size !== index.nodes.length) {
    return err(
      createConsistencyError(
        `Mismatch in data sources: ${String(metadataStore.size)} metadata records for ${String(index.nodes.length)} codes`,
        index.nodes.length,
        metadataStore.size
      )
    );
  }

  for (const record of metadataStore.entries()) {
    const code = parseCode(record.code);
    if (code.isErr()) {
      return err(code.error);
    }

    const node = index.byCode.get(code.value.unpadded);
    if (node === undefined) {
      return err(createLookupError('metadata', record.code));
    }

    node.metadata = cleanMetadata(record);
  }

  return ok(undefined);
};

export const attachActivities = (
  index: NodeIndex,
  rows: readonly ActivityRow[]
): Result<void, HierarchyBuildError> => {
  const byFiveDigits = new Map<string, MutableCatalogNode>();

  for (const node of index.nodes) {
    const key = fiveDigitKey(node.code);
    if (key !== null) {
      byFiveDigits.set(key, node);
    }
  }

  for (const row of rows) {
    const key = row.code.trim();
    const node = byFiveDigits.get(key);
    if (node === undefined) {
      return err(createLookupError('activity', key));
    }

    node.activities.push(row.activity);
  }

  return ok(undefined);
};

/**
 * Maps every spelling of every code to its node.
 */
export const buildLookup = (nodes: readonly CatalogNode[]): Map<string, CatalogNode> => {
  const lookup = new Map<string, CatalogNode>();

  for (const node of nodes) {
    const { code } = node;

    lookup.set(code.formatted, node);
    lookup.set(code.canonical, node);
    lookup.set(code.unpadded, node);

    if (code.digitCount > 1) {
      lookup.set(code.digits, node);
    }

    if (code.digitCount === 4 && isLeaf(node)) {
      lookup.set(`${code.digits}0`, node);
    }
  }

  return lookup;
};

// ============================================================================
// Pipeline
// ============================================================================

export const buildHierarchy = (
  deps: BuildHierarchyDeps,
  input: BuildHierarchyInput
): Result<Hierarchy, HierarchyBuildError> => {
  const defined = defineNodes(input.structure);
  if (defined.isErr()) {
    return err(defined.error);
  }

  const index = defined.value;

  const stages = [
    () => linkParents(index),
    () => attachMetadata(index, deps.metadataStore),
    () => attachActivities(index, input.activities),
  ];

  for (const stage of stages) {
    const result = stage();
    if (result.isErr()) {
      return err(result.error);
    }
  }

  return ok(createHierarchy(index.nodes, buildLookup(index.nodes)));
};
