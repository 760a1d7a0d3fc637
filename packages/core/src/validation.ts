/**
 * Parameter validation. Runs before any query is built, so a bad value
 * never reaches storage.
 */

import { ValidationError } from './errors.js';
import { isIsoDate } from './parsers/things-date.js';
import { parseOffset } from './parsers/offset-parser.js';
import type { DateFilter } from './types/filters.js';

/**
 * Assert that `value` is one of `validValues`. Optional parameters must list
 * `undefined` (or `null`) among the valid values themselves.
 */
export function validate<T>(
  parameter: string,
  value: unknown,
  validValues: readonly T[],
): asserts value is T {
  if (validValues.some(v => v === value)) return;
  throw new ValidationError(parameter, value, validValues);
}

/** `undefined`/`null` mean "no constraint"; anything else must parse as an offset */
export function validateOffset(parameter: string, value: unknown): asserts value is string | null | undefined {
  if (value == null) return;
  parseOffset(value, parameter);
}

const DATE_KEYWORDS = ['future', 'past', true, false] as const;

/** Unset, a boolean, 'future'/'past', or a yyyy-MM-dd calendar date */
export function validateDateFilter(
  parameter: string,
  value: unknown,
): asserts value is DateFilter | null | undefined {
  if (value == null || isIsoDate(value)) return;
  if (DATE_KEYWORDS.some(k => k === value)) return;
  throw new ValidationError(parameter, value, [null, ...DATE_KEYWORDS, 'yyyy-MM-dd']);
}
