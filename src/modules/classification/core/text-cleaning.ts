/**
 * Text cleaning for metadata free text.
 */

import { decodeHTML } from 'entities';

import type { MetadataRecord } from './types.js';

/**
 * Editorial cross-references such as `, see ##47.1` or `see divisions ##10`.
 */
export const CROSS_REFERENCE_PATTERN = /(,?\s?see\s(divisions?\s)?)?##\d+(\.\d+(\/\d)?)?/i;

const CROSS_REFERENCES = new RegExp(CROSS_REFERENCE_PATTERN.source, 'gi');

/**
 * Decodes HTML character references following the HTML5 rules, including
 * legacy references without a trailing `;`.
 */
export const unescapeHtml = (text: string): string => decodeHTML(text);

export const stripCrossReferences = (text: string): string =>
  text.replace(CROSS_REFERENCES, '');

/**
 * Unescapes HTML, then removes cross-references.
 */
export const cleanText = (text: string): string => stripCrossReferences(unescapeHtml(text));

/**
 * Returns a copy of the record with its detail, includes and excludes cleaned.
 * Code and title are kept as they are.
 */
export const cleanMetadata = (record: MetadataRecord): MetadataRecord => ({
  code: record.code,
  title: record.title,
  detail: cleanText(record.detail),
  includes: record.includes.map(cleanText),
  excludes: record.excludes.map(cleanText),
});
