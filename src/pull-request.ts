import { ExternalCommandError } from './errors.js';
import { PUBLIC_HOST } from './remote.js';
import type { ProcessRunner, PullRequestSpec, RepoContext } from './types.js';

/** PR title: first non-empty line of the commit message */
export function titleFromMessage(message: string): string {
  return message.split('\n').map((line) => line.trim()).find(Boolean) ?? '';
}

/**
 * Head ref as the base repository sees it. Crossing from a fork needs the
 * fork owner's prefix, otherwise gh looks for the branch in the base repo.
 */
export function headRef(context: RepoContext, branch: string): string {
  return context.isFork ? `${context.remote.owner}:${branch}` : branch;
}

/** `owner/repo` the PR is opened in, without the host */
function baseSlug(context: RepoContext): string {
  const target = context.upstream ?? context.remote;
  return `${target.owner}/${target.repo}`;
}

/**
 * Repository argument for `gh --repo`. gh assumes github.com unless the
 * host is spelled out, so other hosts use `host/owner/repo`.
 */
export function baseRepo(context: RepoContext): string {
  const slug = baseSlug(context);
  return context.remote.host === PUBLIC_HOST ? slug : `${context.remote.host}/${slug}`;
}

export function buildPullRequestSpec(
  context: RepoContext,
  branch: string,
  options: { message: string; body: string; reviewers: string[]; draft: boolean },
): PullRequestSpec {
  return {
    title: titleFromMessage(options.message),
    body: options.body,
    head: headRef(context, branch),
    base: context.baseBranch,
    baseRepo: baseRepo(context),
    reviewers: options.reviewers,
    draft: options.draft,
  };
}

/** Arguments for `gh pr create` */
export function buildCreateArgs(spec: PullRequestSpec): string[] {
  const args = [
    'pr', 'create',
    '--repo', spec.baseRepo,
    '--base', spec.base,
    '--head', spec.head,
    '--title', spec.title,
    '--body', spec.body,
  ];
  if (spec.reviewers.length > 0) {
    args.push('--reviewer', spec.reviewers.join(','));
  }
  if (spec.draft) {
    args.push('--draft');
  }
  return args;
}

/**
 * Open the PR with gh and return its URL.
 * gh prints the URL as the last line of stdout on success.
 */
export function createPullRequest(runner: ProcessRunner, spec: PullRequestSpec): string {
  const { stdout } = runner.run('gh', buildCreateArgs(spec), 'check');

  const url = stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => /^https?:\/\//.test(line))
    .pop();

  if (!url) {
    throw new ExternalCommandError('gh pr create', 0, `Unexpected gh output: ${stdout.trim()}`);
  }
  return url;
}

/**
 * URL of the platform's "open a pull request" page, prefilled with title and body.
 * Used in interactive mode where the operator submits the PR in the browser.
 */
export function compareUrl(context: RepoContext, branch: string, spec: PullRequestSpec): string {
  const params = new URLSearchParams({ expand: '1', title: spec.title });
  if (spec.body) {
    params.set('body', spec.body);
  }
  return `https://${context.remote.host}/${baseSlug(context)}/compare/${spec.base}...${headRef(context, branch)}?${params.toString()}`;
}
