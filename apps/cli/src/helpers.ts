/**
 * CLI helpers: opening the database, option parsing, error handling.
 */

import { InvalidArgumentError, type Command } from 'commander';
import { ThingsDatabase, StorageIOError, resolveDatabasePath } from '@thingsql/core';
import * as out from './output.js';

export type GlobalOptions = {
  database?: string;
  printSql?: boolean;
  json?: boolean;
};

export type OpenDatabase = (cmd: Command) => ThingsDatabase;

/** Open the database named by the global options ($THINGSDB or the app's default otherwise) */
export const openDatabase: OpenDatabase = (cmd) => {
  const g = cmd.optsWithGlobals<GlobalOptions>();
  const filepath = resolveDatabasePath({ filepath: g.database });
  return new ThingsDatabase(filepath, { printSql: g.printSql ?? false });
};

export function wantsJson(cmd: Command): boolean {
  const g = cmd.optsWithGlobals<GlobalOptions>();
  return g.json ?? false;
}

/**
 * Relation and date options take a value or a yes/no flag:
 * `--area <uuid>`, `--area true`, `--deadline future`.
 */
export function parseFlagOrValue(value: string): string | boolean {
  switch (value.toLowerCase()) {
    case 'true': case 'yes': return true;
    case 'false': case 'no': return false;
    default: return value;
  }
}

/** `true`/`false`, or `any` to turn the filter off */
export function parseTriState(value: string): boolean | null {
  switch (value.toLowerCase()) {
    case 'true': case 'yes': return true;
    case 'false': case 'no': return false;
    case 'any': case 'all': return null;
    default: throw new InvalidArgumentError('Expected true, false or any.');
  }
}

/** Option parser for a fixed set of names, matched case-insensitively */
export function parseChoice<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value) => {
    const match = choices.find(c => c.toLowerCase() === value.toLowerCase());
    if (match === undefined) {
      throw new InvalidArgumentError(`Allowed choices are ${choices.join(', ')}.`);
    }
    return match;
  };
}

/**
 * Run a command action, printing errors instead of stack traces.
 * Every failure sets a non-zero exit code; storage failures also stop the
 * process, since nothing else can be read either.
 */
export function $try(fn: () => void): void {
  try {
    fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
    if (err instanceof StorageIOError) process.exit(1);
  }
}
