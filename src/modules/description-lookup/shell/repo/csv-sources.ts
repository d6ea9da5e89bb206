/**
 * Description Lookup CSV Sources
 */

import { Type } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { readCsvRows } from '../../../../infra/sources/index.js';

import type { SourceError } from '../../../../common/types/errors.js';
import type { DescriptionRow, RephraseRow } from '../../core/types.js';
import type { Logger } from 'pino';

export const DescriptionFileSchema = Type.Array(
  Type.Object({
    label: Type.String({ minLength: 1 }),
    description: Type.String(),
  })
);

export const RephraseFileSchema = Type.Array(
  Type.Object({
    sic_code: Type.String({ minLength: 1 }),
    reviewed_description: Type.String(),
  })
);

const descriptionValidator = TypeCompiler.Compile(DescriptionFileSchema);
const rephraseValidator = TypeCompiler.Compile(RephraseFileSchema);

export interface ReadLookupSourceOptions {
  filePath: string;
  logger: Logger;
}

export const readDescriptionRows = async (
  options: ReadLookupSourceOptions
): Promise<Result<DescriptionRow[], SourceError>> => {
  const log = options.logger.child({ source: 'descriptions' });
  log.debug({ filePath: options.filePath }, 'Reading description rows');

  const result = await readCsvRows(options.filePath, descriptionValidator);
  if (result.isErr()) {
    log.error({ err: result.error }, 'Failed to read description rows');
    return err(result.error);
  }

  return ok(result.value.map((row) => ({ label: row.label, description: row.description })));
};

export const readRephraseRows = async (
  options: ReadLookupSourceOptions
): Promise<Result<RephraseRow[], SourceError>> => {
  const log = options.logger.child({ source: 'rephrased-descriptions' });
  log.debug({ filePath: options.filePath }, 'Reading rephrased descriptions');

  const result = await readCsvRows(options.filePath, rephraseValidator);
  if (result.isErr()) {
    log.error({ err: result.error }, 'Failed to read rephrased descriptions');
    return err(result.error);
  }

  return ok(
    result.value.map((row) => ({
      code: row.sic_code,
      reviewedDescription: row.reviewed_description,
    }))
  );
};
