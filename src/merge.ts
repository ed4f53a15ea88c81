import {
  ExternalCommandError,
  MergeConflictError,
  MergeNotAllowedError,
} from './errors.js';
import { PullRequestStatusSchema } from './schemas.js';
import type { Logger, MergeMethod, ProcessRunner } from './types.js';

/** gh stderr fragments that mean the PR cannot merge cleanly */
const CONFLICT_PATTERNS = [/conflict/i, /cannot be cleanly created/i];

/** gh stderr fragments that mean branch protection or repository settings refused the merge */
const NOT_ALLOWED_PATTERNS = [
  /protected branch/i,
  /base branch policy/i,
  /review(s)? required/i,
  /required status check/i,
  /not allowed/i,
  /not authorized/i,
  /auto-?merge is not enabled/i,
];

/**
 * Turn a failed `gh pr merge` into the matching merge error.
 * gh words both cases as `is not mergeable: <reason>`, so only the reason decides.
 * Anything unrecognized stays an ExternalCommandError.
 */
export function classifyMergeFailure(prUrl: string, error: ExternalCommandError): Error {
  if (NOT_ALLOWED_PATTERNS.some((re) => re.test(error.stderr))) {
    return new MergeNotAllowedError(prUrl, error.stderr);
  }
  if (CONFLICT_PATTERNS.some((re) => re.test(error.stderr))) {
    return new MergeConflictError(prUrl, error.stderr);
  }
  return error;
}

function runMerge(runner: ProcessRunner, prUrl: string, args: string[]): void {
  try {
    runner.run('gh', ['pr', 'merge', prUrl, ...args], 'check');
  } catch (error: unknown) {
    if (error instanceof ExternalCommandError) {
      throw classifyMergeFailure(prUrl, error);
    }
    throw error;
  }
}

/**
 * Merge a pull request now with the given method.
 * Branch deletion is left to cleanupBranches, so gh is not asked to delete anything.
 */
export function mergePullRequest(runner: ProcessRunner, prUrl: string, method: MergeMethod): void {
  runMerge(runner, prUrl, [`--${method}`]);
}

/**
 * Ask the platform to merge once required checks pass. Does not wait for it.
 */
export function enableAutoMerge(runner: ProcessRunner, prUrl: string, method: MergeMethod): void {
  runMerge(runner, prUrl, [`--${method}`, '--auto']);
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Whether the platform reports the PR as merged.
 * A merge queue can accept `gh pr merge` without merging yet. The merge call
 * has already succeeded here, so an unreadable answer counts as not merged
 * and is only warned about.
 */
export function isMerged(runner: ProcessRunner, prUrl: string, logger: Logger): boolean {
  const result = runner.run('gh', ['pr', 'view', prUrl, '--json', 'state,url'], 'capture');
  if (result.exitCode !== 0) {
    const detail = result.stderr.trim().split('\n')[0] ?? '';
    logger.warn(`Could not read the state of ${prUrl}${detail ? `: ${detail}` : ''}`);
    return false;
  }

  const parsed = PullRequestStatusSchema.safeParse(parseJson(result.stdout));
  if (!parsed.success) {
    logger.warn(`Could not read the state of ${prUrl}: unexpected gh pr view output`);
    return false;
  }
  return parsed.data.state === 'MERGED';
}

/**
 * Delete the temporary branch locally and on the remote.
 * Best-effort: each failure is logged and returned, never thrown.
 */
export function cleanupBranches(
  runner: ProcessRunner,
  remote: string,
  branch: string,
  logger: Logger,
): string[] {
  const warnings: string[] = [];
  const steps: Array<{ label: string; command: string; args: string[] }> = [
    { label: `delete local branch ${branch}`, command: 'git', args: ['branch', '-D', branch] },
    { label: `delete ${remote}/${branch}`, command: 'git', args: ['push', remote, '--delete', branch] },
  ];

  for (const step of steps) {
    const result = runner.run(step.command, step.args, 'capture');
    if (result.exitCode === 0) {
      logger.debug(`Cleanup: ${step.label}`);
      continue;
    }
    const detail = result.stderr.trim().split('\n')[0] ?? '';
    const warning = `Could not ${step.label}${detail ? `: ${detail}` : ''}`;
    logger.warn(warning);
    warnings.push(warning);
  }

  return warnings;
}
