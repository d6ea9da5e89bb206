/**
 * Metadata Store Implementation
 *
 * In-memory store over an ordered list of records, loadable from a JSON file.
 */

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { readJsonFile } from '../../../../infra/sources/index.js';
import { FILLER } from '../../core/types.js';

import type { SourceError } from '../../../../common/types/errors.js';
import type { MetadataStore } from '../../core/ports.js';
import type { MetadataRecord } from '../../core/types.js';
import type { Logger } from 'pino';

export const MetadataFileSchema = Type.Array(
  Type.Object({
    code: Type.String({ minLength: 1 }),
    title: Type.String(),
    detail: Type.Optional(Type.String()),
    includes: Type.Optional(Type.Array(Type.String())),
    excludes: Type.Optional(Type.Array(Type.String())),
  })
);

export type MetadataFileDTO = Static<typeof MetadataFileSchema>;

const validator = TypeCompiler.Compile(MetadataFileSchema);

/**
 * Keys a record can be found by: canonical, unpadded, numeric, and for
 * 4-digit codes the 5-digit form with a trailing zero.
 */
const keysFor = (code: string): { exact: string[]; fallback: string | null } => {
  const unpadded = code.split(FILLER).join('');
  const digits = unpadded.slice(1);
  const exact = [code, unpadded];

  if (digits.length > 0) {
    exact.push(digits);
  }

  return { exact, fallback: digits.length === 4 ? `${digits}0` : null };
};

/**
 * Creates a metadata store over records in source order.
 */
export const createInMemoryMetadataStore = (
  records: readonly MetadataRecord[]
): MetadataStore => {
  const entries = [...records];
  const index = new Map<string, MetadataRecord>();
  const fallbacks: [string, MetadataRecord][] = [];

  for (const record of entries) {
    const { exact, fallback } = keysFor(record.code);
    for (const key of exact) {
      index.set(key, record);
    }
    if (fallback !== null) {
      fallbacks.push([fallback, record]);
    }
  }

  // A real subclass record owns its 5-digit key
  for (const [key, record] of fallbacks) {
    if (!index.has(key)) {
      index.set(key, record);
    }
  }

  return {
    size: entries.length,

    entries(): readonly MetadataRecord[] {
      return entries;
    },

    getByCode(code: string): MetadataRecord | null {
      return index.get(code) ?? null;
    },
  };
};

export const toMetadataRecords = (dto: MetadataFileDTO): MetadataRecord[] =>
  dto.map((entry) => ({
    code: entry.code,
    title: entry.title,
    detail: entry.detail ?? '',
    includes: entry.includes ?? [],
    excludes: entry.excludes ?? [],
  }));

export interface LoadMetadataStoreOptions {
  filePath: string;
  logger: Logger;
}

/**
 * Reads metadata records from a JSON file into an in-memory store.
 */
export const loadMetadataStore = async (
  options: LoadMetadataStoreOptions
): Promise<Result<MetadataStore, SourceError>> => {
  const log = options.logger.child({ source: 'metadata' });
  log.debug({ filePath: options.filePath }, 'Reading metadata records');

  const result = await readJsonFile(options.filePath, validator);
  if (result.isErr()) {
    log.error({ err: result.error }, 'Failed to read metadata records');
    return err(result.error);
  }

  const store = createInMemoryMetadataStore(toMetadataRecords(result.value));
  log.debug({ count: store.size }, 'Metadata records loaded');

  return ok(store);
};
