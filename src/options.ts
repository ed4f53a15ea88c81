import { InvalidArgumentError } from 'commander';
import type { MergeMethod, MergeRequest, PipelineRequest } from './types.js';

export const MERGE_METHODS: readonly MergeMethod[] = ['merge', 'squash', 'rebase'];

/** Parsed options of `acp pr` as commander hands them to the action */
export interface PrOptions {
  body: string;
  verbose?: boolean;
  interactive?: boolean;
  add?: boolean;
  draft?: boolean;
  reviewers: string[];
  merge?: boolean;
  autoMerge?: boolean;
  mergeMethod: MergeMethod;
}

/**
 * commander argument parser for `--reviewers a,b`. Repeating the flag accumulates.
 */
export function parseReviewers(value: string, previous: string[] = []): string[] {
  const logins = value.split(',').map((s) => s.trim()).filter(Boolean);
  for (const login of logins) {
    if (!/^[A-Za-z0-9](?:[A-Za-z0-9-]*)(?:\/[A-Za-z0-9._-]+)?$/.test(login)) {
      throw new InvalidArgumentError(`'${login}' is not a GitHub login or org/team.`);
    }
  }
  return [...new Set([...previous, ...logins])];
}

function mergeRequest(options: PrOptions): MergeRequest {
  if (options.merge) return { kind: 'merge', method: options.mergeMethod };
  if (options.autoMerge) return { kind: 'auto-merge', method: options.mergeMethod };
  return { kind: 'none' };
}

export function buildPipelineRequest(message: string, options: PrOptions): PipelineRequest {
  return {
    message,
    body: options.body,
    interactive: Boolean(options.interactive),
    addAll: Boolean(options.add),
    draft: Boolean(options.draft),
    reviewers: options.reviewers,
    merge: mergeRequest(options),
  };
}
