/**
 * Rephrase Lookup
 *
 * Curated, reviewed descriptions keyed by code.
 */

import { CODE_NOT_FOUND, type RephraseResult, type RephraseRow, type RephraseTarget } from './types.js';

export interface RephraseLookup {
  readonly size: number;

  /**
   * Reviewed description for a code. A missing code is reported in the
   * result, never thrown.
   */
  lookup(code: string | number): RephraseResult;

  /**
   * Replaces the target's descriptions in place and returns the target.
   *
   * The primary description becomes null when the primary code is null or has
   * no reviewed description. Candidates without one keep their `descriptive`.
   */
  applyRephrase<T extends RephraseTarget>(target: T): T;
}

export const createRephraseLookup = (rows: readonly RephraseRow[]): RephraseLookup => {
  const byCode = new Map(rows.map((row) => [row.code, row.reviewedDescription] as const));

  const lookup = (code: string | number): RephraseResult => {
    const key = String(code);
    const reviewedDescription = byCode.get(key);

    if (reviewedDescription === undefined) {
      return { found: false, code: key, error: CODE_NOT_FOUND };
    }

    return { found: true, code: key, reviewedDescription };
  };

  return {
    size: byCode.size,

    lookup,

    applyRephrase<T extends RephraseTarget>(target: T): T {
      const primary = target.code === null ? null : lookup(target.code);
      target.description = primary !== null && primary.found ? primary.reviewedDescription : null;

      for (const candidate of target.candidates) {
        const rephrased = lookup(candidate.code);
        if (rephrased.found) {
          candidate.descriptive = rephrased.reviewedDescription;
        }
      }

      return target;
    },
  };
};
