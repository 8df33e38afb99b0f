import { InvalidArgumentError } from "commander";

/**
 * Build a commander option parser for whole numbers no smaller than `min`.
 * Rejected values surface as commander's usage error, exit code 1.
 */
export function integerOption(min: number): (value: string) => number {
  return (value) => {
    const trimmed = value.trim();
    const n = Number.parseInt(trimmed, 10);
    if (!/^\d+$/.test(trimmed) || n < min) {
      throw new InvalidArgumentError(`Expected a whole number >= ${min}, got "${value}".`);
    }
    return n;
  };
}
