/**
 * Shared option parsers for docgov commands
 */

import { InvalidArgumentError } from 'commander';

/**
 * Collect multiple values for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

/**
 * Parse a whole number of days (or any count) greater than zero
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive whole number, got '${value}'.`);
  }
  return parsed;
}
