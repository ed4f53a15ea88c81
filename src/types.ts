/** How the Process Runner attaches to a child process */
export type RunMode = 'capture' | 'check' | 'interactive';

/** Captured result of one external command */
export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Executes external commands (git, gh). The only way the core touches the outside world. */
export interface ProcessRunner {
  run(command: string, args: readonly string[], mode: RunMode): CommandResult;
}

/** Sink for progress and warnings. The core never writes to the console itself. */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

/** Host, owner and repository parsed from a remote URL */
export interface RemoteLocation {
  host: string;
  owner: string;
  repo: string;
}

/** Repository metadata as reported by the hosting platform */
export interface RepositoryMetadata {
  owner: string;
  repo: string;
  defaultBranch: string;
  parent: {
    owner: string;
    repo: string;
    defaultBranch: string;
  } | null;
}

/** Read-only queries against the hosting platform */
export interface HostingApi {
  getRepository(owner: string, repo: string): Promise<RepositoryMetadata>;
  branchExists(owner: string, repo: string, branch: string): Promise<boolean>;
}

/** Base repository a PR targets */
export interface UpstreamTarget {
  owner: string;
  repo: string;
  defaultBranch: string;
}

/** Outcome of fork detection */
export interface Topology {
  isFork: boolean;
  /** Parent repository when the origin is a fork, otherwise null */
  upstream: UpstreamTarget | null;
  /** Repository the PR is opened against */
  target: UpstreamTarget;
}

/** Immutable snapshot of the repository taken once per invocation */
export interface RepoContext {
  readonly originalBranch: string;
  readonly remoteName: string;
  readonly remoteUrl: string;
  readonly remote: RemoteLocation;
  readonly username: string;
  readonly isFork: boolean;
  readonly upstream: UpstreamTarget | null;
  readonly baseBranch: string;
}

export interface PullRequestSpec {
  title: string;
  body: string;
  /** Branch name, or `owner:branch` when the PR crosses from a fork */
  head: string;
  base: string;
  /** `owner/repo` the PR is opened in */
  baseRepo: string;
  reviewers: string[];
  draft: boolean;
}

export type MergeMethod = 'merge' | 'squash' | 'rebase';

export type MergeRequest =
  | { kind: 'none' }
  | { kind: 'merge'; method: MergeMethod }
  | { kind: 'auto-merge'; method: MergeMethod };

/** Everything the CLI hands to the pipeline */
export interface PipelineRequest {
  message: string;
  body: string;
  /** Print a compare URL instead of submitting the PR */
  interactive: boolean;
  /** Stage all changes before validating */
  addAll: boolean;
  draft: boolean;
  reviewers: string[];
  merge: MergeRequest;
}

/** `queued`: gh accepted the merge but the platform has not merged yet (merge queue) */
export type MergeOutcome = 'merged' | 'auto-merge-enabled' | 'queued' | 'not-requested';

export interface CleanupOutcome {
  status: 'skipped' | 'completed' | 'partial';
  warnings: string[];
}

export type PullRequestHandle =
  | { kind: 'created'; url: string }
  | { kind: 'compare-url'; url: string };

export interface PipelineResult {
  branch: string;
  pullRequest: PullRequestHandle;
  merge: MergeOutcome;
  cleanup: CleanupOutcome;
  finalState: PipelineState;
}

export const PIPELINE_STATES = [
  'Validated',
  'BranchCreated',
  'Committed',
  'Pushed',
  'PRCreated',
  'Restored',
  'Merged',
  'CleanedUp',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

/** A prerequisite check failure with actionable help */
export interface PrereqFailure {
  name: string;
  message: string;
  help: string;
}
