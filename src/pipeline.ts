import { generateBranchName, type RandomSource } from './branch.js';
import type { Config } from './config.js';
import { captureRepoContext, type HostingApiFactory } from './context.js';
import {
  BranchCollisionError,
  EmptyCommitMessageError,
  MergeError,
  NoStagedChangesError,
  sanitizeError,
} from './errors.js';
import { cleanupBranches, enableAutoMerge, isMerged, mergePullRequest } from './merge.js';
import { buildPullRequestSpec, compareUrl, createPullRequest, titleFromMessage } from './pull-request.js';
import {
  currentBranch,
  hasStagedChanges,
  hasUnstagedChanges,
  localBranchExists,
  stageAll,
} from './repository.js';
import type {
  CleanupOutcome,
  HostingApi,
  Logger,
  MergeOutcome,
  MergeRequest,
  PipelineRequest,
  PipelineResult,
  PipelineState,
  ProcessRunner,
  PullRequestHandle,
  RepoContext,
} from './types.js';

export interface PipelineDeps {
  runner: ProcessRunner;
  connect: HostingApiFactory;
  logger: Logger;
  config: Config;
  random?: RandomSource;
  /** Called after each state is entered */
  onStateChange?: (state: PipelineState) => void;
}

/** What an undo step needs to act on the repository */
export interface RollbackScope {
  runner: ProcessRunner;
  context: RepoContext;
  branch: string;
  logger: Logger;
}

export interface RollbackEntry {
  undo: ((scope: RollbackScope) => void) | null;
  /** Stop unwinding here: earlier states back a PR that already exists */
  barrier: boolean;
  /** A failed undo leaves the tree in an unknown state; later undos must not run on it */
  haltOnFailure: boolean;
}

/**
 * Undo action per state, applied in reverse order of entry.
 *
 * BranchCreated undo relies on Committed having been undone first: after
 * `reset --soft` the temporary branch points at the original commit, so the
 * staged set carries over on checkout.
 */
export const ROLLBACK_TABLE: Record<PipelineState, RollbackEntry> = {
  Validated: { undo: null, barrier: false, haltOnFailure: false },
  BranchCreated: {
    undo: ({ runner, context, branch }) => {
      runner.run('git', ['checkout', context.originalBranch], 'check');
      runner.run('git', ['branch', '-D', branch], 'check');
    },
    barrier: false,
    haltOnFailure: true,
  },
  Committed: {
    undo: ({ runner }) => {
      runner.run('git', ['reset', '--soft', 'HEAD~1'], 'check');
    },
    barrier: false,
    haltOnFailure: true,
  },
  Pushed: {
    undo: ({ runner, context, branch }) => {
      runner.run('git', ['push', context.remoteName, '--delete', branch], 'check');
    },
    barrier: false,
    haltOnFailure: false,
  },
  PRCreated: {
    undo: (scope) => {
      if (currentBranch(scope.runner) !== scope.context.originalBranch) {
        restoreOriginalBranch(scope);
      }
    },
    barrier: true,
    haltOnFailure: false,
  },
  Restored: { undo: null, barrier: true, haltOnFailure: false },
  Merged: { undo: null, barrier: true, haltOnFailure: false },
  CleanedUp: { undo: null, barrier: true, haltOnFailure: false },
};

/**
 * Unwind the reached states in reverse. Undo failures are warnings; the caller
 * rethrows the original error afterwards.
 */
export function rollback(reached: readonly PipelineState[], scope: RollbackScope): void {
  for (const state of [...reached].reverse()) {
    const entry = ROLLBACK_TABLE[state];
    if (entry.undo) {
      scope.logger.debug(`Rolling back ${state}`);
      try {
        entry.undo(scope);
      } catch (error: unknown) {
        scope.logger.warn(`Rollback of ${state} failed: ${sanitizeError(error)}`);
        if (entry.haltOnFailure) {
          scope.logger.warn(`Stopped rolling back; repository left on ${scope.branch}. Recover with 'git status' and 'git reflog'.`);
          return;
        }
      }
    }
    if (entry.barrier) return;
  }
}

/**
 * Return to the original branch, carrying unstaged edits across.
 *
 * Unstaged changes to files the commit touched would block the checkout, so
 * they are stashed relative to the temporary branch and re-applied on the
 * original one. A failed pop keeps the stash and warns.
 */
export function restoreOriginalBranch({ runner, context, branch, logger }: RollbackScope): void {
  const carry = hasUnstagedChanges(runner);
  if (carry) {
    runner.run('git', ['stash', 'push', '--message', `acp: unstaged changes from ${branch}`], 'check');
  }

  try {
    runner.run('git', ['checkout', context.originalBranch], 'check');
  } catch (error: unknown) {
    if (carry) {
      const pop = runner.run('git', ['stash', 'pop'], 'capture');
      if (pop.exitCode !== 0) {
        logger.warn("Unstaged changes are still in 'git stash list'");
      }
    }
    throw error;
  }
  logger.debug(`Switched back to ${context.originalBranch}`);

  if (carry) {
    const pop = runner.run('git', ['stash', 'pop'], 'capture');
    if (pop.exitCode !== 0) {
      logger.warn(`Could not re-apply unstaged changes on ${context.originalBranch}; they are kept in 'git stash list'`);
    }
  }
}

/**
 * Pick a temporary branch name that exists neither locally nor on the remote.
 */
export async function planBranch(
  runner: ProcessRunner,
  api: HostingApi,
  context: RepoContext,
  config: Config,
  random?: RandomSource,
): Promise<string> {
  for (let attempt = 0; attempt < config.branchAttempts; attempt++) {
    const name = generateBranchName(config.branchPrefix, context.username, random);
    if (localBranchExists(runner, name)) continue;
    if (await api.branchExists(context.remote.owner, context.remote.repo, name)) continue;
    return name;
  }
  throw new BranchCollisionError(config.branchAttempts);
}

/**
 * Merge (or enable auto-merge) and, once the merge is confirmed, delete the
 * temporary branches. Nothing here is rolled back: a failed merge leaves the PR
 * open and the branches in place.
 */
function mergeAndCleanup(
  deps: PipelineDeps,
  request: Exclude<MergeRequest, { kind: 'none' }>,
  prUrl: string,
  context: RepoContext,
  branch: string,
  enter: (state: PipelineState) => void,
): { merge: MergeOutcome; cleanup: CleanupOutcome } {
  const { runner, logger } = deps;
  const skipped: CleanupOutcome = { status: 'skipped', warnings: [] };

  if (request.kind === 'auto-merge') {
    enableAutoMerge(runner, prUrl, request.method);
    enter('Merged');
    return { merge: 'auto-merge-enabled', cleanup: skipped };
  }

  mergePullRequest(runner, prUrl, request.method);
  if (!isMerged(runner, prUrl, logger)) {
    logger.info('Merge accepted but not completed yet; temporary branches kept');
    enter('Merged');
    return { merge: 'queued', cleanup: skipped };
  }
  enter('Merged');

  const warnings = cleanupBranches(runner, context.remoteName, branch, logger);
  enter('CleanedUp');
  return {
    merge: 'merged',
    cleanup: { status: warnings.length === 0 ? 'completed' : 'partial', warnings },
  };
}

/**
 * Turn the staged changes into a pull request.
 *
 * Mutations run in the order of PIPELINE_STATES. A failure before the
 * original branch is restored unwinds through ROLLBACK_TABLE and rethrows.
 * Merge and cleanup run afterwards and never roll anything back.
 */
export async function runPipeline(request: PipelineRequest, deps: PipelineDeps): Promise<PipelineResult> {
  const { runner, logger, config } = deps;
  const reached: PipelineState[] = [];
  const enter = (state: PipelineState): void => {
    reached.push(state);
    logger.debug(`State: ${state}`);
    deps.onStateChange?.(state);
  };

  if (!titleFromMessage(request.message)) {
    throw new EmptyCommitMessageError();
  }
  if (request.addAll) {
    stageAll(runner);
  }
  if (!hasStagedChanges(runner)) {
    throw new NoStagedChangesError();
  }
  enter('Validated');

  const { context, api } = await captureRepoContext(runner, config.remote, deps.connect, logger);
  const branch = await planBranch(runner, api, context, config, deps.random);
  const spec = buildPullRequestSpec(context, branch, request);
  const scope: RollbackScope = { runner, context, branch, logger };

  let pullRequest: PullRequestHandle;
  try {
    logger.debug(`Creating temporary branch: ${branch}`);
    runner.run('git', ['checkout', '-b', branch], 'check');
    enter('BranchCreated');

    logger.debug(`Committing: ${spec.title}`);
    runner.run('git', ['commit', '--message', request.message], 'interactive');
    enter('Committed');

    logger.debug(`Pushing ${branch} to ${context.remoteName}`);
    runner.run('git', ['push', '--set-upstream', context.remoteName, branch], 'check');
    enter('Pushed');

    if (request.interactive) {
      pullRequest = { kind: 'compare-url', url: compareUrl(context, branch, spec) };
    } else {
      logger.debug(`Creating PR to ${spec.baseRepo}#${spec.base}`);
      pullRequest = { kind: 'created', url: createPullRequest(runner, spec) };
    }
    enter('PRCreated');

    restoreOriginalBranch(scope);
    enter('Restored');
  } catch (error: unknown) {
    rollback(reached, scope);
    throw error;
  }

  let merge: MergeOutcome = 'not-requested';
  let cleanup: CleanupOutcome = { status: 'skipped', warnings: [] };

  if (request.merge.kind !== 'none') {
    if (pullRequest.kind !== 'created') {
      logger.warn('Merge skipped: the PR has not been submitted yet');
    } else {
      try {
        ({ merge, cleanup } = mergeAndCleanup(deps, request.merge, pullRequest.url, context, branch, enter));
      } catch (error: unknown) {
        if (!(error instanceof MergeError)) {
          logger.warn(`PR left open: ${pullRequest.url}`);
        }
        throw error;
      }
    }
  }

  return {
    branch,
    pullRequest,
    merge,
    cleanup,
    finalState: reached[reached.length - 1],
  };
}
