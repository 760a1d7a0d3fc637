import { describe, it, expect } from 'vitest';
import { ValidationError } from '../src/errors.js';
import { validate, validateDateFilter, validateOffset } from '../src/validation.js';
import { TASK_STATUSES } from '../src/types/task-status.js';

describe('validate', () => {
  it('passes a listed value', () => {
    expect(() => validate('status', 'completed', TASK_STATUSES)).not.toThrow();
  });

  it('rejects an unlisted value with the valid values in the message', () => {
    expect(() => validate('status', 'done', TASK_STATUSES)).toThrow(
      "Unrecognized status type: 'done'\nValid status types are ['incomplete', 'canceled', 'completed']",
    );
  });

  it('rejects undefined unless it is listed', () => {
    expect(() => validate('status', undefined, TASK_STATUSES)).toThrow(ValidationError);
    expect(() => validate('status', undefined, [undefined, ...TASK_STATUSES])).not.toThrow();
  });

  it('exposes the parameter and value on the error', () => {
    try {
      validate('type', 7, ['to-do']);
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.parameter).toBe('type');
        expect(err.value).toBe(7);
        expect(err.validValues).toEqual(['to-do']);
      }
    }
  });
});

describe('validateDateFilter', () => {
  it.each([undefined, null, true, false, 'future', 'past', '2024-02-29'])('accepts %j', (value) => {
    expect(() => validateDateFilter('deadline', value)).not.toThrow();
  });

  it('rejects anything else', () => {
    expect(() => validateDateFilter('deadline', 'soon')).toThrow(
      "Unrecognized deadline type: 'soon'\n"
        + "Valid deadline types are [null, 'future', 'past', true, false, 'yyyy-MM-dd']",
    );
  });

  it('rejects impossible dates', () => {
    expect(() => validateDateFilter('startDate', '2023-02-29')).toThrow(ValidationError);
  });
});

describe('validateOffset', () => {
  it('accepts unset and well-formed offsets', () => {
    expect(() => validateOffset('last', undefined)).not.toThrow();
    expect(() => validateOffset('last', null)).not.toThrow();
    expect(() => validateOffset('last', '4w')).not.toThrow();
  });

  it('rejects malformed offsets', () => {
    expect(() => validateOffset('last', 'week')).toThrow(ValidationError);
  });
});
