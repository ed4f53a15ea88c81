import { describe, it, expect, vi, beforeEach } from 'vitest';
import { execFileSync } from 'node:child_process';
import { checkPrerequisites } from '../src/prerequisites.js';

vi.mock('node:child_process', () => ({
  execFileSync: vi.fn(),
}));

const mockedExecFileSync = vi.mocked(execFileSync);

/** Fail the calls whose command line starts with `fails`, succeed otherwise */
function failOn(...fails: string[]) {
  mockedExecFileSync.mockImplementation((cmd, args) => {
    const line = [cmd, ...(args ?? [])].join(' ');
    if (fails.some((f) => line.endsWith(f))) throw new Error('not found');
    return Buffer.from('');
  });
}

beforeEach(() => {
  mockedExecFileSync.mockReset();
});

describe('checkPrerequisites', () => {
  it('returns empty array when all prerequisites pass', () => {
    mockedExecFileSync.mockReturnValue(Buffer.from(''));

    expect(checkPrerequisites()).toEqual([]);
  });

  it('reports git missing', () => {
    failOn(' git');

    expect(checkPrerequisites()).toEqual([
      { name: 'git', message: 'git not found', help: 'Install it: https://git-scm.com/downloads' },
    ]);
  });

  it('reports gh missing and skips the auth check', () => {
    failOn(' gh');

    expect(checkPrerequisites()).toEqual([
      { name: 'gh', message: 'gh CLI not found', help: 'Install it: https://cli.github.com' },
    ]);
    expect(mockedExecFileSync).not.toHaveBeenCalledWith('gh', ['auth', 'status'], expect.anything());
  });

  it('reports gh-auth failure when gh exists but auth fails', () => {
    failOn('gh auth status');

    expect(checkPrerequisites()).toEqual([
      { name: 'gh-auth', message: 'gh CLI is not authenticated', help: 'Run: gh auth login' },
    ]);
  });

  it('collects every failure at once', () => {
    failOn(' git', ' gh');

    expect(checkPrerequisites().map((f) => f.name)).toEqual(['git', 'gh']);
  });
});
