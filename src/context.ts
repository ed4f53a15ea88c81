import { parseRemoteUrl, resolveTopology } from './remote.js';
import { authenticatedUsername, currentBranch, remoteUrl } from './repository.js';
import type { HostingApi, Logger, ProcessRunner, RepoContext } from './types.js';

/** Builds the hosting API client once the remote's host is known */
export type HostingApiFactory = (host: string) => HostingApi;

export interface RepoSession {
  context: RepoContext;
  api: HostingApi;
}

/**
 * Snapshot everything the pipeline needs from the local repository and the
 * hosting platform. Read-only: nothing is mutated here, so failures need no rollback.
 *
 * Identity and fork topology are resolved exactly once and frozen into the context.
 */
export async function captureRepoContext(
  runner: ProcessRunner,
  remoteName: string,
  connect: HostingApiFactory,
  logger: Logger,
): Promise<RepoSession> {
  const originalBranch = currentBranch(runner);
  logger.debug(`Current branch: ${originalBranch}`);

  const url = remoteUrl(runner, remoteName);
  const { host, owner, repo } = parseRemoteUrl(url);

  const username = authenticatedUsername(runner, host);
  logger.debug(`Authenticated as ${username}`);

  const api = connect(host);
  const topology = await resolveTopology(api, owner, repo);
  const target = topology.target;
  if (topology.isFork) {
    logger.debug(`${owner}/${repo} is a fork of ${target.owner}/${target.repo}`);
  }
  logger.debug(`PR target: ${target.owner}/${target.repo}#${target.defaultBranch}`);

  const context: RepoContext = Object.freeze({
    originalBranch,
    remoteName,
    remoteUrl: url,
    remote: Object.freeze({ host, owner, repo }),
    username,
    isFork: topology.isFork,
    upstream: topology.upstream ? Object.freeze({ ...topology.upstream }) : null,
    baseBranch: target.defaultBranch,
  });

  return { context, api };
}
