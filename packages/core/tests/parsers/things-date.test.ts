import { describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { sql, type SQL } from 'drizzle-orm';
import { renderQuery } from '../../src/db.js';
import { FormatError } from '../../src/errors.js';
import {
  encodeThingsDate,
  decodeThingsDate,
  isIsoDate,
  isoDateToThingsDateSql,
  thingsDateToIsoDateSql,
} from '../../src/parsers/things-date.js';

const sqlite = new Database(':memory:');

function evaluate(expression: SQL): unknown {
  const { sql: text, params } = renderQuery(sql`SELECT ${expression}`);
  return sqlite.prepare(text).pluck().get(...params);
}

describe('encodeThingsDate', () => {
  it('packs year, month and day into one integer', () => {
    expect(encodeThingsDate('2021-03-28')).toBe(132464128);
  });

  it('accepts a leap day in a leap year', () => {
    expect(encodeThingsDate('2024-02-29')).toBe((2024 << 16) | (2 << 12) | (29 << 7));
  });

  it('rejects a day the month does not have', () => {
    expect(() => encodeThingsDate('2021-02-29')).toThrow(FormatError);
  });

  it('rejects other formats', () => {
    expect(() => encodeThingsDate('2021-3-28')).toThrow(FormatError);
    expect(() => encodeThingsDate('28.03.2021')).toThrow(FormatError);
  });

  it('rejects years the 11-bit field cannot hold', () => {
    expect(encodeThingsDate('2047-12-31')).toBe((2047 << 16) | (12 << 12) | (31 << 7));
    expect(() => encodeThingsDate('2048-01-01')).toThrow(FormatError);
  });
});

describe('decodeThingsDate', () => {
  it('unpacks to yyyy-MM-dd', () => {
    expect(decodeThingsDate(132464128)).toBe('2021-03-28');
  });

  it('zero-pads every field', () => {
    expect(decodeThingsDate((999 << 16) | (1 << 12) | (5 << 7))).toBe('0999-01-05');
  });

  it('inverts encodeThingsDate', () => {
    for (const date of ['2000-01-01', '2023-12-31', '2024-02-29', '1970-07-04']) {
      expect(decodeThingsDate(encodeThingsDate(date))).toBe(date);
    }
  });
});

describe('isIsoDate', () => {
  it('accepts real calendar dates only', () => {
    expect(isIsoDate('2021-03-28')).toBe(true);
    expect(isIsoDate('2021-04-31')).toBe(false);
    expect(isIsoDate('2021-13-01')).toBe(false);
    expect(isIsoDate('future')).toBe(false);
    expect(isIsoDate(20210328)).toBe(false);
  });
});

describe('SQL codec expressions', () => {
  it('isoDateToThingsDateSql agrees with encodeThingsDate', () => {
    expect(evaluate(isoDateToThingsDateSql(sql`${'2021-03-28'}`))).toBe(132464128);
  });

  it('isoDateToThingsDateSql passes NULL through', () => {
    expect(evaluate(isoDateToThingsDateSql(sql`${null}`))).toBeNull();
  });

  it('thingsDateToIsoDateSql agrees with decodeThingsDate', () => {
    expect(evaluate(thingsDateToIsoDateSql(sql`${132464128}`))).toBe('2021-03-28');
  });

  it('thingsDateToIsoDateSql zero-pads', () => {
    expect(evaluate(thingsDateToIsoDateSql(sql`${(999 << 16) | (1 << 12) | (5 << 7)}`))).toBe('0999-01-05');
  });

  it('thingsDateToIsoDateSql passes NULL through', () => {
    expect(evaluate(thingsDateToIsoDateSql(sql`${null}`))).toBeNull();
  });
});
