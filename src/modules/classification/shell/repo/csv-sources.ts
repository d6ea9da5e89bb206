/**
 * Classification CSV Sources
 *
 * Readers for the structural source and the activity index.
 */

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { readCsvRows } from '../../../../infra/sources/index.js';

import type { SourceError } from '../../../../common/types/errors.js';
import type { ActivityRow, StructureRow } from '../../core/types.js';
import type { Logger } from 'pino';

export const StructureFileSchema = Type.Array(
  Type.Object({
    description: Type.String(),
    section: Type.String(),
    most_disaggregated_level: Type.String(),
    level_headings: Type.String(),
  })
);

export const ActivityFileSchema = Type.Array(
  Type.Object({
    uk_sic_2007: Type.String(),
    activity: Type.String(),
  })
);

const structureValidator = TypeCompiler.Compile(StructureFileSchema);
const activityValidator = TypeCompiler.Compile(ActivityFileSchema);

export interface ReadSourceOptions {
  filePath: string;
  logger: Logger;
}

export const readStructureRows = async (
  options: ReadSourceOptions
): Promise<Result<StructureRow[], SourceError>> => {
  const log = options.logger.child({ source: 'structure' });
  log.debug({ filePath: options.filePath }, 'Reading structure rows');

  const result = await readCsvRows(options.filePath, structureValidator);
  if (result.isErr()) {
    log.error({ err: result.error }, 'Failed to read structure rows');
    return err(result.error);
  }

  return ok(
    result.value.map((row) => ({
      description: row.description,
      section: row.section,
      code: row.most_disaggregated_level,
      level: row.level_headings,
    }))
  );
};

export const readActivityRows = async (
  options: ReadSourceOptions
): Promise<Result<ActivityRow[], SourceError>> => {
  const log = options.logger.child({ source: 'activities' });
  log.debug({ filePath: options.filePath }, 'Reading activity rows');

  const result = await readCsvRows(options.filePath, activityValidator);
  if (result.isErr()) {
    log.error({ err: result.error }, 'Failed to read activity rows');
    return err(result.error);
  }

  return ok(result.value.map((row) => ({ code: row.uk_sic_2007, activity: row.activity })));
};
