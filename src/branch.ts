import { randomInt } from 'node:crypto';

/** Number of random digits in a temporary branch suffix */
export const SUFFIX_DIGITS = 16;

const SUFFIX_MIN = 10n ** BigInt(SUFFIX_DIGITS - 1);
const SUFFIX_SPAN = 9n * SUFFIX_MIN;

/** Largest range node:crypto randomInt accepts is 2^48 */
const CHUNK = 1_000_000_000_000; // 10^12

/** Source of random integers in [0, max) */
export type RandomSource = (max: number) => number;

const cryptoRandom: RandomSource = (max) => randomInt(max);

/**
 * Validate a value that ends up as a git or gh argument.
 * Rejects values with dangerous patterns: leading dash (flag injection),
 * path traversal (..), null bytes, whitespace.
 */
export function validateGitArg(value: string, label: string): void {
  if (!value) {
    throw new Error(`${label} is empty.`);
  }
  if (value.startsWith('-')) {
    throw new Error(`${label} '${value}' starts with a dash.`);
  }
  if (value.includes('..')) {
    throw new Error(`${label} '${value}' contains a path traversal sequence.`);
  }
  if (value.includes('\0')) {
    throw new Error(`${label} contains a null byte.`);
  }
  if (/\s/.test(value)) {
    throw new Error(`${label} '${value}' contains whitespace.`);
  }
}

/**
 * A 16-digit decimal suffix with a non-zero leading digit.
 * Built from two draws since the span (9 * 10^15) exceeds what randomInt takes in one call.
 */
export function randomSuffix(random: RandomSource = cryptoRandom): string {
  const high = BigInt(random(9000)); // 0..8999
  const low = BigInt(random(CHUNK)); // 0..10^12-1
  const offset = (high * BigInt(CHUNK) + low) % SUFFIX_SPAN;
  return (SUFFIX_MIN + offset).toString();
}

/**
 * Generate a temporary branch name: `{prefix}/{username}/{16 digits}`.
 */
export function generateBranchName(prefix: string, username: string, random?: RandomSource): string {
  validateGitArg(prefix, 'Branch prefix');
  validateGitArg(username, 'Username');
  return `${prefix}/${username}/${randomSuffix(random)}`;
}
