import { Octokit } from '@octokit/rest';
import { NotAuthenticatedError } from './errors.js';
import { PUBLIC_HOST } from './remote.js';
import type { HostingApi, ProcessRunner, RepositoryMetadata } from './types.js';

/**
 * Get a GitHub auth token from the gh CLI for the given host.
 * Requires gh to be installed and authenticated.
 */
function getGitHubToken(runner: ProcessRunner, host: string): string {
  const result = runner.run('gh', ['auth', 'token', '--hostname', host], 'capture');
  const token = result.stdout.trim();

  if (result.exitCode !== 0 || !token) {
    throw new NotAuthenticatedError(`no credentials for ${host}`);
  }

  return token;
}

/** REST base URL: api.github.com for the public host, /api/v3 on Enterprise hosts */
export function apiBaseUrl(host: string): string {
  return host === PUBLIC_HOST ? 'https://api.github.com' : `https://${host}/api/v3`;
}

/**
 * Create an authenticated Octokit instance using the gh CLI token.
 */
export function createOctokit(runner: ProcessRunner, host: string = PUBLIC_HOST): Octokit {
  const token = getGitHubToken(runner, host);
  return new Octokit({ auth: token, baseUrl: apiBaseUrl(host) });
}

function isHttpStatus(error: unknown, status: number): boolean {
  return typeof error === 'object' && error !== null && 'status' in error && error.status === status;
}

/**
 * Fetch repository metadata, including the parent when the repository is a fork.
 */
export async function fetchRepository(octokit: Octokit, owner: string, repo: string): Promise<RepositoryMetadata> {
  const { data } = await octokit.repos.get({ owner, repo });

  return {
    owner: data.owner.login,
    repo: data.name,
    defaultBranch: data.default_branch,
    parent: data.parent
      ? {
          owner: data.parent.owner.login,
          repo: data.parent.name,
          defaultBranch: data.parent.default_branch,
        }
      : null,
  };
}

/**
 * Whether a branch exists on the remote repository. 404 means it does not.
 */
export async function remoteBranchExists(
  octokit: Octokit,
  owner: string,
  repo: string,
  branch: string,
): Promise<boolean> {
  try {
    await octokit.repos.getBranch({ owner, repo, branch });
    return true;
  } catch (error: unknown) {
    if (isHttpStatus(error, 404)) return false;
    throw error;
  }
}

/**
 * HostingApi backed by the GitHub REST API.
 */
export function createGitHubApi(octokit: Octokit): HostingApi {
  return {
    getRepository: (owner, repo) => fetchRepository(octokit, owner, repo),
    branchExists: (owner, repo, branch) => remoteBranchExists(octokit, owner, repo, branch),
  };
}
