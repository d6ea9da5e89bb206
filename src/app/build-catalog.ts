/**
 * Catalog factory
 * Reads every source, then builds the hierarchy and the lookups on top of a
 * shared metadata store
 */

import { err, ok, type Result } from 'neverthrow';

import {
  buildHierarchy,
  loadMetadataStore,
  readActivityRows,
  readStructureRows,
  type Hierarchy,
  type HierarchyBuildError,
  type MetadataStore,
} from '../modules/classification/index.js';
import {
  createDescriptionLookup,
  createRephraseLookup,
  readDescriptionRows,
  readRephraseRows,
  type DescriptionLookup,
  type RephraseLookup,
} from '../modules/description-lookup/index.js';

import type { SourceError } from '../common/types/errors.js';
import type { SourcesConfig } from '../infra/config/index.js';
import type { Logger } from '../infra/logger/index.js';

export interface Catalog {
  hierarchy: Hierarchy;
  metadataStore: MetadataStore;
  descriptionLookup: DescriptionLookup;
  rephraseLookup: RephraseLookup;
}

export type CatalogLoadError = SourceError | HierarchyBuildError;

export interface BuildCatalogDeps {
  sources: SourcesConfig;
  logger: Logger;
}

export const buildCatalog = async (
  deps: BuildCatalogDeps
): Promise<Result<Catalog, CatalogLoadError>> => {
  const { sources } = deps;
  const log = deps.logger.child({ component: 'catalog' });

  log.info({ dataDir: sources.dataDir }, 'Loading catalog sources');

  const [metadataStore, structure, activities, descriptions, rephrased] = await Promise.all([
    loadMetadataStore({ filePath: sources.metadataPath, logger: log }),
    readStructureRows({ filePath: sources.structurePath, logger: log }),
    readActivityRows({ filePath: sources.activitiesPath, logger: log }),
    readDescriptionRows({ filePath: sources.descriptionsPath, logger: log }),
    readRephraseRows({ filePath: sources.rephrasedPath, logger: log }),
  ]);

  if (metadataStore.isErr()) return err(metadataStore.error);
  if (structure.isErr()) return err(structure.error);
  if (activities.isErr()) return err(activities.error);
  if (descriptions.isErr()) return err(descriptions.error);
  if (rephrased.isErr()) return err(rephrased.error);

  const hierarchy = buildHierarchy(
    { metadataStore: metadataStore.value },
    { structure: structure.value, activities: activities.value }
  );

  if (hierarchy.isErr()) {
    log.error({ err: hierarchy.error }, 'Failed to build classification hierarchy');
    return err(hierarchy.error);
  }

  const catalog: Catalog = {
    hierarchy: hierarchy.value,
    metadataStore: metadataStore.value,
    descriptionLookup: createDescriptionLookup(
      { metadataStore: metadataStore.value },
      descriptions.value
    ),
    rephraseLookup: createRephraseLookup(rephrased.value),
  };

  log.info(
    {
      nodes: catalog.hierarchy.size,
      activities: activities.value.length,
      descriptions: catalog.descriptionLookup.size,
      rephrased: catalog.rephraseLookup.size,
    },
    'Catalog loaded'
  );

  return ok(catalog);
};
