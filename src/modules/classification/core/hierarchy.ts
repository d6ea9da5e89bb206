/**
 * Read-only classification catalog.
 */

import { err, ok, type Result } from 'neverthrow';

import { compareCodes } from './code.js';
import { createCodeNotFoundError, type CodeNotFoundError } from './errors.js';
import { isLeaf } from './node.js';

import type { CatalogNode, LeafText, LeafTextRow } from './types.js';

export interface Hierarchy extends Iterable<CatalogNode> {
  /** Nodes in code order */
  readonly nodes: readonly CatalogNode[];
  readonly size: number;

  /**
   * Resolves any registered spelling of a code: `01.11`, `A0111x`, `A0111`,
   * `0111`, and `01110` for a class without subclasses.
   */
  get(key: string): Result<CatalogNode, CodeNotFoundError>;

  has(key: string): boolean;

  /**
   * Activities of leaf nodes. Can be iterated more than once.
   */
  allLeafActivities(): Iterable<LeafText>;

  /**
   * Descriptions of leaf nodes. Can be iterated more than once.
   */
  allLeafDescriptions(): Iterable<LeafText>;

  /**
   * Leaf descriptions and activities, without duplicates, sorted by code.
   */
  allLeafText(): LeafTextRow[];
}

const leafIterable = (
  nodes: readonly CatalogNode[],
  select: (node: CatalogNode) => Iterable<string>
): Iterable<LeafText> => ({
  *[Symbol.iterator]() {
    for (const node of nodes) {
      if (!isLeaf(node)) {
        continue;
      }
      for (const text of select(node)) {
        yield { code: node.code, text };
      }
    }
  },
});

export const createHierarchy = (
  nodes: readonly CatalogNode[],
  lookup: ReadonlyMap<string, CatalogNode>
): Hierarchy => {
  const sorted = [...nodes].sort((a, b) => compareCodes(a.code, b.code));

  const allLeafActivities = (): Iterable<LeafText> =>
    leafIterable(sorted, (node) => node.activities);

  const allLeafDescriptions = (): Iterable<LeafText> =>
    leafIterable(sorted, (node) => [node.description]);

  return {
    nodes: sorted,
    size: sorted.length,

    [Symbol.iterator]() {
      return sorted[Symbol.iterator]();
    },

    get(key: string): Result<CatalogNode, CodeNotFoundError> {
      const node = lookup.get(key);
      if (node === undefined) {
        return err(createCodeNotFoundError(key));
      }
      return ok(node);
    },

    has(key: string): boolean {
      return lookup.has(key);
    },

    allLeafActivities,
    allLeafDescriptions,

    allLeafText(): LeafTextRow[] {
      const seen = new Set<string>();
      const unique: LeafText[] = [];

      for (const entry of [...allLeafDescriptions(), ...allLeafActivities()]) {
        const key = `${entry.code.unpadded}\u0000${entry.text}`;
        if (!seen.has(key)) {
          seen.add(key);
          unique.push(entry);
        }
      }

      // Array.prototype.sort is stable: descriptions stay ahead of activities
      return unique
        .sort((a, b) => compareCodes(a.code, b.code))
        .map((entry) => ({ code: entry.code.formatted, text: entry.text }));
    },
  };
};
