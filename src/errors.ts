/** Exit code for precondition failures (no staged changes, detached HEAD, no remote, auth, config) */
export const EXIT_PRECONDITION = 1;

/** Exit code for a remote URL that matches no accepted shape */
export const EXIT_REMOTE_FORMAT = 2;

/** Exit code for git or gh returning nonzero */
export const EXIT_COMMAND_ERROR = 3;

/** Exit code for merge failures (conflict, branch protection) */
export const EXIT_MERGE_ERROR = 4;

/** Exit code after SIGINT */
export const EXIT_INTERRUPTED = 130;

export type ErrorKind = 'precondition' | 'external-command' | 'remote-format' | 'merge';

/**
 * Base class for every failure the pipeline surfaces to the CLI.
 * `kind` selects the exit code and the label printed on stderr.
 */
export abstract class AcpError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export abstract class PreconditionError extends AcpError {
  readonly kind = 'precondition';
}

export class NoStagedChangesError extends PreconditionError {
  constructor() {
    super("No staged changes. Run 'git add' first (or pass --add).");
  }
}

export class EmptyCommitMessageError extends PreconditionError {
  constructor() {
    super('Commit message is empty.');
  }
}

export class DetachedHeadError extends PreconditionError {
  constructor() {
    super('HEAD is detached. Check out a branch first.');
  }
}

export class NoRemoteError extends PreconditionError {
  constructor(readonly remote: string) {
    super(`Remote '${remote}' is not configured.`);
  }
}

export class NotAuthenticatedError extends PreconditionError {
  constructor(detail?: string) {
    super(`gh CLI is not authenticated${detail ? `: ${detail}` : ''}. Run: gh auth login`);
  }
}

export class InvalidConfigError extends PreconditionError {
  constructor(readonly variable: string, detail: string) {
    super(`Invalid ${variable}: ${detail}`);
  }
}

export class BranchCollisionError extends PreconditionError {
  constructor(readonly attempts: number) {
    super(`Could not find an unused branch name after ${attempts} attempt${attempts === 1 ? '' : 's'}.`);
  }
}

export class ExternalCommandError extends AcpError {
  readonly kind = 'external-command';

  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    super(`'${command}' exited with code ${exitCode}`);
  }
}

export class UnrecognizedRemoteFormatError extends AcpError {
  readonly kind = 'remote-format';

  constructor(readonly url: string) {
    super(`Unrecognized remote URL: ${url}`);
  }
}

export abstract class MergeError extends AcpError {
  readonly kind = 'merge';

  constructor(
    message: string,
    readonly prUrl: string,
    readonly stderr: string,
  ) {
    super(message);
  }
}

export class MergeConflictError extends MergeError {
  constructor(prUrl: string, stderr: string) {
    super('Pull request has merge conflicts', prUrl, stderr);
  }
}

export class MergeNotAllowedError extends MergeError {
  constructor(prUrl: string, stderr: string) {
    super('Merge rejected by branch protection', prUrl, stderr);
  }
}

/** Map an error to the process exit code. Unknown errors are treated as command failures. */
export function exitCodeFor(error: unknown): number {
  if (!(error instanceof AcpError)) return EXIT_COMMAND_ERROR;
  switch (error.kind) {
    case 'precondition':
      return EXIT_PRECONDITION;
    case 'remote-format':
      return EXIT_REMOTE_FORMAT;
    case 'external-command':
      return EXIT_COMMAND_ERROR;
    case 'merge':
      return EXIT_MERGE_ERROR;
  }
}

/**
 * Scrub secrets and credentials from a string.
 * Replaces known token/key patterns with [REDACTED].
 */
export function scrubSecrets(text: string): string {
  return text
    // GitHub classic tokens (ghp_, gho_, ghs_, ghr_, ghu_)
    .replace(/\b(ghp_|gho_|ghs_|ghr_|ghu_)[a-zA-Z0-9_]+/g, '[REDACTED]')
    // GitHub fine-grained PATs
    .replace(/\bgithub_pat_[a-zA-Z0-9_]+/g, '[REDACTED]')
    // Bearer/token auth headers
    .replace(/(Bearer|token)\s+[a-zA-Z0-9._\-]+/gi, '$1 [REDACTED]')
    // URL-embedded credentials
    .replace(/https?:\/\/[^@\s/]+@/g, 'https://[REDACTED]@');
}

/**
 * Extract a safe error message from an unknown error value.
 * Converts to string, then scrubs any embedded secrets.
 */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return scrubSecrets(message);
}
