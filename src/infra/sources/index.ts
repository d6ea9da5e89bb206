/**
 * Source file readers
 *
 * Reads CSV and JSON source files and validates their content against a
 * TypeBox schema. Callers map the validated rows onto their domain rows.
 */

import fs from 'node:fs/promises';

import { parse as parseCsv } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

import {
  createNotFoundError,
  createParseError,
  createReadError,
  createSchemaValidationError,
  type SourceError,
} from '../../common/types/errors.js';

import type { Static, TSchema } from '@sinclair/typebox';
import type { TypeCheck } from '@sinclair/typebox/compiler';
import type { ValueError } from '@sinclair/typebox/errors';

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);

const readSourceFile = async (filePath: string): Promise<Result<string, SourceError>> => {
  try {
    return ok(await fs.readFile(filePath, 'utf8'));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return err(createNotFoundError(filePath));
    }

    return err(createReadError(filePath, error));
  }
};

const validate = <T extends TSchema>(
  validator: TypeCheck<T>,
  filePath: string,
  value: unknown
): Result<Static<T>, SourceError> => {
  if (!validator.Check(value)) {
    return err(createSchemaValidationError(filePath, formatSchemaErrors(validator.Errors(value))));
  }

  return ok(value);
};

/**
 * Reads a headed CSV file into records validated against `validator`.
 *
 * Every value is kept as a string; cells are trimmed and empty lines skipped.
 */
export const readCsvRows = async <T extends TSchema>(
  filePath: string,
  validator: TypeCheck<T>
): Promise<Result<Static<T>, SourceError>> => {
  const contents = await readSourceFile(filePath);
  if (contents.isErr()) {
    return err(contents.error);
  }

  let parsed: unknown;
  try {
    parsed = parseCsv(contents.value, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (error) {
    return err(createParseError(filePath, error));
  }

  return validate(validator, filePath, parsed);
};

/**
 * Reads a JSON file validated against `validator`.
 */
export const readJsonFile = async <T extends TSchema>(
  filePath: string,
  validator: TypeCheck<T>
): Promise<Result<Static<T>, SourceError>> => {
  const contents = await readSourceFile(filePath);
  if (contents.isErr()) {
    return err(contents.error);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents.value);
  } catch (error) {
    return err(createParseError(filePath, error));
  }

  return validate(validator, filePath, parsed);
};
