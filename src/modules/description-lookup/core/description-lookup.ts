/**
 * Description Lookup
 *
 * Maps free-text descriptions to 5-digit codes, exactly or by substring.
 */

import {
  CODE_LENGTH,
  DIVISION_LENGTH,
  type CodeCandidate,
  type DescriptionLookupOptions,
  type DescriptionLookupResult,
  type DescriptionRow,
  type DivisionInfo,
  type PotentialMatches,
} from './types.js';

import type { MetadataStore } from '../../classification/index.js';

export interface DescriptionLookupDeps {
  metadataStore: MetadataStore;
}

export interface DescriptionLookup {
  /** Number of source rows */
  readonly size: number;

  lookup(description: string, options?: DescriptionLookupOptions): DescriptionLookupResult;

  /**
   * Division of a code that has metadata; both fields are null otherwise.
   */
  lookupCodeDivision(code: string): DivisionInfo;

  /**
   * One entry per distinct division, in first-seen order.
   */
  uniqueCodeDivisions(candidates: readonly CodeCandidate[]): DivisionInfo[];
}

const normalizeLabel = (label: string): string => label.padStart(CODE_LENGTH, '0');

const unique = (values: Iterable<string>): string[] => [...new Set(values)];

export const createDescriptionLookup = (
  deps: DescriptionLookupDeps,
  rows: readonly DescriptionRow[]
): DescriptionLookup => {
  const { metadataStore } = deps;

  const corpus = rows.map((row) => ({
    label: normalizeLabel(row.label),
    description: row.description.toLowerCase(),
  }));

  // Last row wins for repeated descriptions
  const byDescription = new Map(corpus.map((row) => [row.description, row.label] as const));

  const findPotentialMatches = (query: string, exactCode: string | null): PotentialMatches => {
    const matches = corpus.filter((row) => row.description.includes(query));
    const codes = unique(matches.map((row) => row.label));

    if (codes.length === 1 && codes[0] === exactCode) {
      return {
        descriptionsCount: 0,
        descriptions: [],
        codesCount: 0,
        codes: [],
        divisionsCount: 0,
        divisions: [],
      };
    }

    const divisions = unique(codes.map((code) => code.slice(0, DIVISION_LENGTH))).map(
      (code) => ({ code, meta: metadataStore.getByCode(code) })
    );

    return {
      descriptionsCount: matches.length,
      descriptions: unique(matches.map((row) => row.description)),
      codesCount: codes.length,
      codes,
      divisionsCount: divisions.length,
      divisions,
    };
  };

  const lookupCodeDivision = (code: string): DivisionInfo => {
    if (metadataStore.getByCode(code) === null) {
      return { codeDivision: null, codeDivisionMeta: null };
    }

    const codeDivision = code.slice(0, DIVISION_LENGTH);
    return { codeDivision, codeDivisionMeta: metadataStore.getByCode(codeDivision) };
  };

  return {
    size: corpus.length,

    lookup(description: string, options: DescriptionLookupOptions = {}): DescriptionLookupResult {
      const query = description.toLowerCase();
      const matched = byDescription.get(query);
      const code = matched === undefined || matched === '' ? null : matched;
      const codeDivision = code === null ? null : code.slice(0, DIVISION_LENGTH);

      const result: DescriptionLookupResult = {
        description: query,
        code,
        codeMeta: code === null ? null : metadataStore.getByCode(code),
        codeDivision,
        codeDivisionMeta: codeDivision === null ? null : metadataStore.getByCode(codeDivision),
      };

      if (options.similarity === true) {
        result.potentialMatches = findPotentialMatches(query, code);
      }

      return result;
    },

    lookupCodeDivision,

    uniqueCodeDivisions(candidates: readonly CodeCandidate[]): DivisionInfo[] {
      const divisions = new Map<string, DivisionInfo>();

      for (const candidate of candidates) {
        const info = lookupCodeDivision(candidate.code);
        if (info.codeDivision !== null && !divisions.has(info.codeDivision)) {
          divisions.set(info.codeDivision, info);
        }
      }

      return [...divisions.values()];
    },
  };
};
