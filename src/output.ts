import pc from 'picocolors';
import type { Logger, PipelineResult, PrereqFailure } from './types.js';
import { AcpError, ExternalCommandError, MergeError, scrubSecrets, sanitizeError } from './errors.js';

/**
 * Print prerequisite failures as red errors with actionable help.
 */
export function printErrors(failures: PrereqFailure[]): void {
  for (const f of failures) {
    console.error(pc.red(`✖ ${f.message}`));
    console.error(pc.dim(`  ${f.help}`));
  }
}

/**
 * Print a [debug] line in dimmed text. Only call when --verbose is active.
 */
export function printDebug(message: string): void {
  console.log(pc.dim(`[debug] ${message}`));
}

/** Print a non-fatal warning to stderr. */
export function printWarning(message: string): void {
  console.error(pc.yellow(`⚠ ${scrubSecrets(message)}`));
}

/**
 * Build the logger handed to the pipeline. Debug lines are dropped unless verbose.
 */
export function createLogger(verbose: boolean): Logger {
  return {
    debug: (message) => {
      if (verbose) printDebug(message);
    },
    info: (message) => console.log(message),
    warn: printWarning,
  };
}

/**
 * Format milliseconds as human-readable duration.
 * Under 60s: "1.2s", over 60s: "1m 12s"
 */
export function formatDuration(ms: number): string {
  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60_000);
  const seconds = ((ms % 60_000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Print the outcome of a successful run: PR (or compare) URL, merge and cleanup lines.
 */
export function printResult(result: PipelineResult): void {
  if (result.pullRequest.kind === 'created') {
    console.log(`${pc.green('✔')} PR created: ${result.pullRequest.url}`);
  } else {
    console.log(`${pc.cyan('➜')} Open to create the PR: ${result.pullRequest.url}`);
  }

  if (result.merge === 'merged') {
    console.log(`${pc.green('✔')} Merged`);
  } else if (result.merge === 'auto-merge-enabled') {
    console.log(`${pc.green('✔')} Auto-merge enabled`);
  }

  if (result.cleanup.status === 'completed') {
    console.log(pc.dim(`Deleted ${result.branch} locally and on the remote`));
  } else if (result.cleanup.status === 'partial') {
    console.log(pc.yellow(`Cleanup of ${result.branch} incomplete`));
  }
}

/**
 * Print a pipeline failure: kind label, message, and scrubbed stderr when present.
 */
export function printFailure(error: unknown): void {
  const label = error instanceof AcpError ? error.kind : 'error';
  console.error(pc.red(`✖ [${label}] ${sanitizeError(error)}`));

  if (error instanceof MergeError) {
    console.error(pc.dim(`  PR left open: ${error.prUrl}`));
  }

  const stderr = error instanceof ExternalCommandError || error instanceof MergeError ? error.stderr.trim() : '';
  if (stderr) {
    for (const line of scrubSecrets(stderr).split('\n')) {
      console.error(pc.dim(`  ${line}`));
    }
  }
}
