/**
 * Parses "last N days/weeks/years" offsets: `3d`, `2w`, `1y`.
 */

import { ValidationError } from '../errors.js';

const OFFSET_RE = /^(\d+)([dwy])$/;

export type OffsetUnit = 'd' | 'w' | 'y';

export interface Offset {
  amount: number;
  unit: OffsetUnit;
}

function isOffsetUnit(value: string | undefined): value is OffsetUnit {
  return value === 'd' || value === 'w' || value === 'y';
}

function offsetError(parameter: string, value: unknown): ValidationError {
  const shown = typeof value === 'string' ? `'${value}'` : String(value);
  return new ValidationError(
    parameter,
    value,
    ['<N>d', '<N>w', '<N>y'],
    `Invalid ${parameter} argument: ${shown}\n`
      + "Please specify a string of the format 'X[d/w/y]' where X is a non-negative integer "
      + "followed by 'd', 'w', or 'y' that indicates days, weeks, or years.",
  );
}

/** Parse an offset string, throwing ValidationError when malformed */
export function parseOffset(value: unknown, parameter = 'offset'): Offset {
  if (typeof value !== 'string') throw offsetError(parameter, value);

  const m = OFFSET_RE.exec(value);
  const unit = m?.[2];
  if (!m || !isOffsetUnit(unit)) throw offsetError(parameter, value);

  return { amount: parseInt(m[1] ?? '', 10), unit };
}

/**
 * SQLite datetime modifier reaching back by the offset.
 * Weeks become days; years stay calendar years (leap days count).
 */
export function offsetToModifier(offset: Offset): string {
  switch (offset.unit) {
    case 'd': return `-${offset.amount} days`;
    case 'w': return `-${offset.amount * 7} days`;
    case 'y': return `-${offset.amount} years`;
  }
}
