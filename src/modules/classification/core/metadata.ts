/**
 * Metadata record helpers.
 */

import { FILLER, type MetadataRecord } from './types.js';

const MIN_MATCH_LENGTH = 2;

const numericPart = (record: MetadataRecord): string => record.code.slice(1).split(FILLER).join('');

/**
 * Partial match of a 2-5 digit numeric code against the record's code.
 *
 * The comparison covers as many digits as both codes have, so `011` matches
 * class `A0111x` and `01110` matches it as well.
 */
export const matchesCodePrefix = (record: MetadataRecord, subcode: string): boolean => {
  const unpaddedLength = record.code.split(FILLER).join('').length;
  const n = Math.min(unpaddedLength, subcode.length + 1);

  return n > MIN_MATCH_LENGTH && record.code.slice(1, n) === subcode.slice(0, n - 1);
};

/**
 * One-line prose summary of a record, or an empty string when the record's
 * digit count is not in `digitCounts`.
 *
 * @example
 * summarizeMetadata(record) // "Code 0111: Growing of cereals. Includes rice. "
 */
export const summarizeMetadata = (
  record: MetadataRecord,
  digitCounts: readonly number[] = [4, 2]
): string => {
  const code = numericPart(record);
  if (!digitCounts.includes(code.length)) {
    return '';
  }

  let out = `Code ${code}: ${record.title}. `;
  if (record.detail !== '') {
    out += `${record.detail}. `;
  }
  if (record.includes.length > 0) {
    out += `Includes ${record.includes.join(', ')}. `;
  }
  if (record.excludes.length > 0) {
    out += `Excludes ${record.excludes.join(', ')}. `;
  }
  return out;
};
