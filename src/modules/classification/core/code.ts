/**
 * Classification code parsing, formatting and ordering.
 */

import { err, ok, type Result } from 'neverthrow';

import { createFormatError, type FormatError } from './errors.js';
import {
  CODE_WIDTH,
  FILLER,
  LEVEL_BY_DIGIT_COUNT,
  type ClassificationCode,
  type DigitCount,
  type LevelName,
} from './types.js';

const CANONICAL_PATTERN = /^[A-Z]\d*x*$/;
const FILLER_PATTERN = /x/g;
const NUMERIC_PATTERN = /^\d*$/;

const DIGIT_COUNTS: readonly DigitCount[] = [1, 2, 3, 4, 5];

const toDigitCount = (value: number): DigitCount | null =>
  DIGIT_COUNTS.find((count) => count === value) ?? null;

const isLevelName = (value: string): value is LevelName =>
  Object.values(LEVEL_BY_DIGIT_COUNT).some((level) => level === value);

/**
 * Normalizes a level heading: `" Sub Class "` becomes `subclass`.
 */
export const normalizeLevelName = (level: string): string =>
  level.toLowerCase().trim().replace(/\s+/g, '');

const formatUnpadded = (unpadded: string): string => {
  switch (unpadded.length) {
    case 1:
      return unpadded;
    case 3:
      return unpadded.slice(1, 3);
    case 4:
    case 5:
      return `${unpadded.slice(1, 3)}.${unpadded.slice(3)}`;
    default:
      return `${unpadded.slice(1, 3)}.${unpadded.slice(3, 5)}/${unpadded.slice(5)}`;
  }
};

/**
 * Parses a canonical code such as `A0111x`.
 */
export const parseCode = (canonical: string): Result<ClassificationCode, FormatError> => {
  const section = canonical.charAt(0);
  if (!/^[A-Z]$/.test(section)) {
    return err(
      createFormatError(`Code must start with an upper case letter A-Z: '${canonical}'`, canonical)
    );
  }

  if (canonical.length !== CODE_WIDTH) {
    return err(
      createFormatError(
        `Code must be padded to ${String(CODE_WIDTH)} characters: '${canonical}'`,
        canonical
      )
    );
  }

  if (!CANONICAL_PATTERN.test(canonical)) {
    return err(
      createFormatError(
        `Code must be a letter followed by digits and '${FILLER}' filler: '${canonical}'`,
        canonical
      )
    );
  }

  const unpadded = canonical.replace(FILLER_PATTERN, '');
  const digits = unpadded.slice(1);
  const digitCount = toDigitCount(digits.length === 0 ? 1 : digits.length);

  if (digits.length === 1 || digitCount === null) {
    return err(createFormatError(`Invalid code: '${unpadded}'`, canonical));
  }

  return ok({
    canonical,
    unpadded,
    section,
    digits,
    digitCount,
    level: LEVEL_BY_DIGIT_COUNT[digitCount],
    formatted: formatUnpadded(unpadded),
  });
};

/**
 * Builds a code from a section letter, its most disaggregated numeric code and
 * a level heading.
 *
 * A class given in its 5-digit form (`01110`) must end in zero and collapses
 * to the 4-digit class (`A0111x`).
 *
 * @example
 * codeFromParts('A', '0111', 'Class') // A0111x
 */
export const codeFromParts = (
  section: string,
  numericCode: string,
  levelName: string
): Result<ClassificationCode, FormatError> => {
  const level = normalizeLevelName(levelName);
  const mismatch = (): Result<ClassificationCode, FormatError> =>
    err(createFormatError(`Code/level mismatch: '${numericCode}' -> '${levelName}'`, numericCode));

  if (!isLevelName(level)) {
    return mismatch();
  }

  if (numericCode.length < 5) {
    const expected = toDigitCount(numericCode.length);
    if (expected === null || LEVEL_BY_DIGIT_COUNT[expected] !== level) {
      return mismatch();
    }
  } else if (numericCode.length === 5) {
    if (level !== 'class' && level !== 'subclass') {
      return mismatch();
    }
  } else {
    return mismatch();
  }

  if (level === 'section') {
    if (section !== numericCode) {
      return err(
        createFormatError(`Section/code mismatch: '${section}' - '${numericCode}'`, numericCode)
      );
    }

    return parseCode(section.padEnd(CODE_WIDTH, FILLER));
  }

  if (!NUMERIC_PATTERN.test(numericCode)) {
    return err(createFormatError(`Code must be numeric: '${numericCode}'`, numericCode));
  }

  let digits = numericCode;
  if (level === 'class' && digits.length === 5) {
    if (!digits.endsWith('0')) {
      return err(
        createFormatError(`4-digit code as 5 digit must end in zero: '${numericCode}'`, numericCode)
      );
    }
    digits = digits.slice(0, 4);
  }

  return parseCode(`${section}${digits}`.padEnd(CODE_WIDTH, FILLER));
};

/**
 * Orders codes by their unpadded form, so a code sorts directly before the
 * codes that extend it.
 */
export const compareCodes = (a: ClassificationCode, b: ClassificationCode): number => {
  if (a.unpadded < b.unpadded) {
    return -1;
  }
  return a.unpadded > b.unpadded ? 1 : 0;
};

export const codesEqual = (a: ClassificationCode, b: ClassificationCode): boolean =>
  a.unpadded === b.unpadded;

/**
 * Canonical code of the parent level, or null for sections.
 */
export const parentCanonical = (code: ClassificationCode): string | null => {
  if (code.digitCount === 1) {
    return null;
  }

  const keep = code.digitCount === 2 ? 1 : code.digitCount;
  return code.canonical.slice(0, keep).padEnd(CODE_WIDTH, FILLER);
};

/**
 * Numeric digits padded to the 5-digit subclass convention: classes get a
 * trailing zero, subclasses are returned as-is. Null for the other levels.
 */
export const fiveDigitKey = (code: ClassificationCode): string | null => {
  switch (code.digitCount) {
    case 4:
      return `${code.digits}0`;
    case 5:
      return code.digits;
    default:
      return null;
  }
};
