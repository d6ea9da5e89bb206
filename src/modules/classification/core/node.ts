/**
 * Catalog node helpers.
 */

import type { CatalogNode, ClassificationCode, MutableCatalogNode } from './types.js';

export const createNode = (code: ClassificationCode, description: string): MutableCatalogNode => ({
  code,
  description,
  activities: [],
  metadata: null,
  parent: null,
  children: [],
});

export const isLeaf = (node: CatalogNode): boolean => node.children.length === 0;

/**
 * Numeric digits of the node's code. A 4-digit class without subclasses gets
 * a trailing zero, matching the 5-digit form it is known by.
 */
export const paddedNumericCode = (node: CatalogNode): string =>
  node.code.digitCount === 4 && isLeaf(node) ? `${node.code.digits}0` : node.code.digits;

/**
 * `01.11: "Growing of cereals"`
 */
export const nodeLabel = (node: CatalogNode): string =>
  `${node.code.formatted}: "${node.description}"`;

/**
 * Multi-line dump of everything attached to a node.
 */
export const describeNode = (node: CatalogNode): string => {
  const lines = [
    nodeLabel(node),
    `Section: ${node.code.section}`,
    `Parent: ${node.parent === null ? 'none' : nodeLabel(node.parent)}`,
    `Children: [${node.children.map(nodeLabel).join(', ')}]`,
    '',
    `detail=${node.metadata?.detail ?? ''}`,
    `includes=[${node.metadata?.includes.join(', ') ?? ''}]`,
    `excludes=[${node.metadata?.excludes.join(', ') ?? ''}]`,
    '',
    'Activities:',
    ...node.activities.map((activity) => `\t- ${activity}`),
  ];

  return lines.join('\n');
};
