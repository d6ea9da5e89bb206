/**
 * Classification Module Errors
 */

import type { AppError } from '../../../common/types/errors.js';

/**
 * A malformed code, or a code inconsistent with its level or section.
 */
export interface FormatError extends AppError {
  readonly type: 'FormatError';
  readonly value: string;
}

export type LookupStage = 'parent' | 'metadata' | 'activity';

/**
 * A derived key is absent from the node index.
 */
export interface LookupError extends AppError {
  readonly type: 'LookupError';
  readonly key: string;
  readonly stage: LookupStage;
}

/**
 * The sources disagree with each other.
 */
export interface ConsistencyError extends AppError {
  readonly type: 'ConsistencyError';
  readonly expected: number;
  readonly actual: number;
}

export interface CodeNotFoundError extends AppError {
  readonly type: 'CodeNotFoundError';
  readonly key: string;
}

export type HierarchyBuildError = FormatError | LookupError | ConsistencyError;

export type ClassificationError = HierarchyBuildError | CodeNotFoundError;

export const createFormatError = (message: string, value: string): FormatError => ({
  type: 'FormatError',
  message,
  value,
});

export const createLookupError = (stage: LookupStage, key: string): LookupError => ({
  type: 'LookupError',
  message: `No ${stage === 'parent' ? 'parent node' : 'node'} found for ${stage} key '${key}'`,
  key,
  stage,
});

export const createConsistencyError = (
  message: string,
  expected: number,
  actual: number
): ConsistencyError => ({
  type: 'ConsistencyError',
  message,
  expected,
  actual,
});

export const createCodeNotFoundError = (key: string): CodeNotFoundError => ({
  type: 'CodeNotFoundError',
  message: `Code '${key}' not found`,
  key,
});
