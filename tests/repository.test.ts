import { describe, it, expect } from 'vitest';
import {
  authenticatedUsername,
  currentBranch,
  hasStagedChanges,
  hasUnstagedChanges,
  localBranchExists,
  remoteUrl,
  stageAll,
} from '../src/repository.js';
import {
  DetachedHeadError,
  ExternalCommandError,
  NoRemoteError,
  NotAuthenticatedError,
} from '../src/errors.js';
import type { CommandResult, ProcessRunner } from '../src/types.js';
import { FakeRepo } from './helpers/fake-repo.js';

function fixedRunner(result: Partial<CommandResult>): ProcessRunner {
  return { run: () => ({ stdout: '', stderr: '', exitCode: 0, ...result }) };
}

describe('hasStagedChanges', () => {
  it('is true when the index differs from HEAD', () => {
    expect(hasStagedChanges(new FakeRepo({ staged: ['a.ts'] }))).toBe(true);
  });

  it('is false with an empty index', () => {
    expect(hasStagedChanges(new FakeRepo({ staged: [] }))).toBe(false);
  });

  it('throws when git diff itself fails', () => {
    const runner = fixedRunner({ exitCode: 128, stderr: 'fatal: not a git repository' });

    expect(() => hasStagedChanges(runner)).toThrow(ExternalCommandError);
  });
});

describe('hasUnstagedChanges', () => {
  it('reflects modified tracked files', () => {
    expect(hasUnstagedChanges(new FakeRepo({ unstaged: ['b.ts'] }))).toBe(true);
    expect(hasUnstagedChanges(new FakeRepo())).toBe(false);
  });
});

describe('currentBranch', () => {
  it('returns the checked-out branch', () => {
    expect(currentBranch(new FakeRepo({ branch: 'feature/x' }))).toBe('feature/x');
  });

  it('throws DetachedHeadError on a detached HEAD', () => {
    expect(() => currentBranch(new FakeRepo({ branch: null }))).toThrow(DetachedHeadError);
  });
});

describe('remoteUrl', () => {
  it('returns the URL of the named remote', () => {
    expect(remoteUrl(new FakeRepo())).toBe('git@github.com:acme/widgets.git');
  });

  it('throws NoRemoteError naming the remote', () => {
    expect(() => remoteUrl(new FakeRepo({ remoteUrl: null }))).toThrow("Remote 'origin' is not configured.");
  });

  it('asks git for the given remote name', () => {
    const runner = fixedRunner({ exitCode: 2 });

    expect(() => remoteUrl(runner, 'upstream')).toThrow(NoRemoteError);
  });
});

describe('authenticatedUsername', () => {
  it('returns the login reported by gh', () => {
    expect(authenticatedUsername(new FakeRepo({ login: 'octo-cat' }))).toBe('octo-cat');
  });

  it('asks gh about the given host', () => {
    const repo = new FakeRepo();

    authenticatedUsername(repo, 'ghe.corp.example');

    expect(repo.calls[0].args).toEqual(['api', 'user', '--hostname', 'ghe.corp.example', '--jq', '.login']);
  });

  it('includes the first stderr line when gh fails', () => {
    expect(() => authenticatedUsername(new FakeRepo({ login: null }))).toThrow(
      'gh CLI is not authenticated: gh: To get started with GitHub CLI, please run: gh auth login. Run: gh auth login',
    );
  });

  it('throws when gh prints no login', () => {
    expect(() => authenticatedUsername(fixedRunner({ stdout: '\n' }))).toThrow(NotAuthenticatedError);
    expect(() => authenticatedUsername(fixedRunner({ stdout: '\n' }))).toThrow('gh returned no login');
  });
});

describe('localBranchExists', () => {
  it('checks refs/heads only', () => {
    const repo = new FakeRepo();

    expect(localBranchExists(repo, 'main')).toBe(true);
    expect(localBranchExists(repo, 'acp/alice/1')).toBe(false);
    expect(repo.calls[0].args).toEqual(['rev-parse', '--verify', '--quiet', 'refs/heads/main']);
  });
});

describe('stageAll', () => {
  it('moves unstaged files into the index', () => {
    const repo = new FakeRepo({ staged: [], unstaged: ['c.ts'] });

    stageAll(repo);

    expect(repo.snapshot()).toMatchObject({ staged: ['c.ts'], unstaged: [] });
  });
});
