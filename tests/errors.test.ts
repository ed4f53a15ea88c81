import { describe, it, expect } from 'vitest';
import {
  BranchCollisionError,
  DetachedHeadError,
  EXIT_COMMAND_ERROR,
  EXIT_MERGE_ERROR,
  EXIT_PRECONDITION,
  EXIT_REMOTE_FORMAT,
  EmptyCommitMessageError,
  ExternalCommandError,
  InvalidConfigError,
  MergeConflictError,
  MergeNotAllowedError,
  NoRemoteError,
  NoStagedChangesError,
  NotAuthenticatedError,
  UnrecognizedRemoteFormatError,
  exitCodeFor,
} from '../src/errors.js';

describe('exitCodeFor', () => {
  it.each([
    [new NoStagedChangesError(), EXIT_PRECONDITION],
    [new EmptyCommitMessageError(), EXIT_PRECONDITION],
    [new DetachedHeadError(), EXIT_PRECONDITION],
    [new NoRemoteError('origin'), EXIT_PRECONDITION],
    [new NotAuthenticatedError(), EXIT_PRECONDITION],
    [new InvalidConfigError('ACP_REMOTE', 'bad'), EXIT_PRECONDITION],
    [new BranchCollisionError(3), EXIT_PRECONDITION],
    [new UnrecognizedRemoteFormatError('/srv/repo'), EXIT_REMOTE_FORMAT],
    [new ExternalCommandError('git push', 1, ''), EXIT_COMMAND_ERROR],
    [new MergeConflictError('https://github.com/acme/widgets/pull/7', ''), EXIT_MERGE_ERROR],
    [new MergeNotAllowedError('https://github.com/acme/widgets/pull/7', ''), EXIT_MERGE_ERROR],
  ])('maps %s to %i', (error, code) => {
    expect(exitCodeFor(error)).toBe(code);
  });

  it('treats unknown errors as command failures', () => {
    expect(exitCodeFor(new TypeError('boom'))).toBe(EXIT_COMMAND_ERROR);
    expect(exitCodeFor('boom')).toBe(EXIT_COMMAND_ERROR);
  });
});

describe('error classes', () => {
  it('name themselves after the concrete class', () => {
    expect(new DetachedHeadError().name).toBe('DetachedHeadError');
    expect(new MergeConflictError('u', '').name).toBe('MergeConflictError');
  });

  it('describe a failed command with its exit code', () => {
    const error = new ExternalCommandError('gh pr', 4, 'HTTP 401');

    expect(error.message).toBe("'gh pr' exited with code 4");
    expect(error.stderr).toBe('HTTP 401');
  });

  it('pluralize the collision message', () => {
    expect(new BranchCollisionError(1).message).toBe('Could not find an unused branch name after 1 attempt.');
    expect(new BranchCollisionError(3).message).toBe('Could not find an unused branch name after 3 attempts.');
  });

  it('omit the detail when gh gives none', () => {
    expect(new NotAuthenticatedError().message).toBe('gh CLI is not authenticated. Run: gh auth login');
  });
});
