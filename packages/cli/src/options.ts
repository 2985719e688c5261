import { InvalidArgumentError } from 'commander';

/**
 * Commander option parser for counts. Unlike a bare `parseInt` it ignores
 * the previous value Commander passes as the second argument.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}
