import { describe, it, expect } from 'vitest';
import { generateBranchName, randomSuffix, validateGitArg } from '../src/branch.js';

describe('generateBranchName', () => {
  it('matches {prefix}/{username}/{16 digits} across 10,000 samples with no collisions', () => {
    const seen = new Set<string>();
    for (let i = 0; i < 10_000; i++) {
      const name = generateBranchName('acp', 'alice');
      expect(name).toMatch(/^acp\/alice\/[1-9]\d{15}$/);
      seen.add(name);
    }
    expect(seen.size).toBe(10_000);
  });

  it('uses the given prefix and username', () => {
    expect(generateBranchName('pr', 'octo-cat', () => 0)).toBe('pr/octo-cat/1000000000000000');
  });

  it('rejects a username that could be read as a flag', () => {
    expect(() => generateBranchName('acp', '--force')).toThrow("Username '--force' starts with a dash.");
  });
});

describe('randomSuffix', () => {
  it('is the smallest 16-digit number when both draws are zero', () => {
    expect(randomSuffix(() => 0)).toBe('1000000000000000');
  });

  it('is the largest 16-digit number when both draws are at their maximum', () => {
    expect(randomSuffix((max) => max - 1)).toBe('9999999999999999');
  });

  it('combines the high and low draws', () => {
    const draws = [1, 42];
    expect(randomSuffix(() => draws.shift() ?? 0)).toBe('1001000000000042');
  });
});

describe('validateGitArg', () => {
  it('accepts branch names with nested slashes', () => {
    expect(() => validateGitArg('acp/alice/1234567890123456', 'Branch name')).not.toThrow();
  });

  it.each([
    ['', 'Branch name is empty.'],
    ['-D', "Branch name '-D' starts with a dash."],
    ['a/../b', "Branch name 'a/../b' contains a path traversal sequence."],
    ['a\0b', 'Branch name contains a null byte.'],
    ['a b', "Branch name 'a b' contains whitespace."],
  ])('rejects %j', (value, message) => {
    expect(() => validateGitArg(value, 'Branch name')).toThrow(message);
  });
});
