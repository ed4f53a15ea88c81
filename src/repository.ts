import {
  DetachedHeadError,
  ExternalCommandError,
  NoRemoteError,
  NotAuthenticatedError,
} from './errors.js';
import { PUBLIC_HOST } from './remote.js';
import type { ProcessRunner } from './types.js';

/** `git diff --quiet`: exit 0 = no differences, 1 = differences, anything else is a git failure. */
function diffQuiet(runner: ProcessRunner, args: string[]): boolean {
  const result = runner.run('git', args, 'capture');
  if (result.exitCode === 0) return false;
  if (result.exitCode === 1) return true;
  throw new ExternalCommandError('git diff', result.exitCode, result.stderr);
}

/**
 * Whether the index differs from HEAD.
 */
export function hasStagedChanges(runner: ProcessRunner): boolean {
  return diffQuiet(runner, ['diff', '--cached', '--quiet']);
}

/**
 * Whether tracked files carry modifications that are not staged.
 * Untracked files are ignored; checkouts leave them alone.
 */
export function hasUnstagedChanges(runner: ProcessRunner): boolean {
  return diffQuiet(runner, ['diff', '--quiet']);
}

/**
 * Name of the checked-out branch. Throws DetachedHeadError when HEAD is not symbolic.
 */
export function currentBranch(runner: ProcessRunner): string {
  const result = runner.run('git', ['symbolic-ref', '--quiet', '--short', 'HEAD'], 'capture');
  const branch = result.stdout.trim();
  if (result.exitCode !== 0 || !branch) {
    throw new DetachedHeadError();
  }
  return branch;
}

export function remoteUrl(runner: ProcessRunner, name = 'origin'): string {
  const result = runner.run('git', ['remote', 'get-url', name], 'capture');
  const url = result.stdout.trim();
  if (result.exitCode !== 0 || !url) {
    throw new NoRemoteError(name);
  }
  return url;
}

/**
 * Login of the account gh is authenticated as on `host`.
 */
export function authenticatedUsername(runner: ProcessRunner, host: string = PUBLIC_HOST): string {
  const result = runner.run('gh', ['api', 'user', '--hostname', host, '--jq', '.login'], 'capture');
  if (result.exitCode !== 0) {
    throw new NotAuthenticatedError(result.stderr.trim().split('\n')[0] || undefined);
  }
  const login = result.stdout.trim();
  if (!login) {
    throw new NotAuthenticatedError('gh returned no login');
  }
  return login;
}

export function localBranchExists(runner: ProcessRunner, name: string): boolean {
  const result = runner.run('git', ['rev-parse', '--verify', '--quiet', `refs/heads/${name}`], 'capture');
  return result.exitCode === 0;
}

/** Stage every change in the working tree, untracked files included. */
export function stageAll(runner: ProcessRunner): void {
  runner.run('git', ['add', '--all'], 'check');
}
