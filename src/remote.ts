import { UnrecognizedRemoteFormatError } from './errors.js';
import type { HostingApi, RemoteLocation, Topology } from './types.js';

/** Host gh and the REST API treat as the default */
export const PUBLIC_HOST = 'github.com';

/** Accepted remote URL shapes */
export type RemoteForm = 'scp' | 'ssh' | 'https';

/** A remote URL recognized as one of the accepted shapes */
export type ParsedRemote = RemoteLocation & { form: RemoteForm };

const SEGMENT = '[A-Za-z0-9_.-]+';
const SUFFIX = '(?:\\.git)?\\/?';

/**
 * One pattern per accepted shape. Each captures host, owner, repo in that order.
 * Adding a shape means adding an entry here and to RemoteForm.
 */
const REMOTE_PATTERNS: Record<RemoteForm, RegExp> = {
  // git@github.com:owner/repo.git
  scp: new RegExp(`^(?:${SEGMENT}@)?(${SEGMENT}):(?!\\/)(${SEGMENT})\\/(${SEGMENT}?)${SUFFIX}$`),
  // ssh://git@github.com:22/owner/repo.git
  ssh: new RegExp(`^ssh:\\/\\/(?:${SEGMENT}@)?(${SEGMENT})(?::\\d+)?\\/(${SEGMENT})\\/(${SEGMENT}?)${SUFFIX}$`),
  // https://github.com/owner/repo.git, optionally with user[:token]@
  https: new RegExp(`^https?:\\/\\/(?:[^@\\/\\s]+@)?(${SEGMENT})(?::\\d+)?\\/(${SEGMENT})\\/(${SEGMENT}?)${SUFFIX}$`),
};

/** Match order */
const FORMS: readonly RemoteForm[] = ['scp', 'ssh', 'https'];

/**
 * Parse a git remote URL into host, owner and repo.
 *
 * Accepts:
 *   git@github.com:owner/repo.git
 *   ssh://git@github.com/owner/repo.git
 *   https://github.com/owner/repo(.git)
 *
 * The `.git` suffix and a trailing slash are optional.
 */
export function parseRemoteUrl(url: string): ParsedRemote {
  const input = url.trim();

  for (const form of FORMS) {
    const match = input.match(REMOTE_PATTERNS[form]);
    if (!match) continue;

    const [, host, owner, rawRepo] = match;
    const repo = rawRepo.replace(/\.git$/, '');
    if (!repo || repo === '.' || repo === '..' || owner === '.' || owner === '..') {
      break;
    }
    return { form, host, owner, repo };
  }

  throw new UnrecognizedRemoteFormatError(url);
}

/**
 * Decide which repository and branch a PR from `owner/repo` should target.
 *
 * When the hosting platform reports a parent, the repository is a fork and the
 * PR goes to the parent's default branch. Otherwise it goes to the repository's
 * own default branch.
 */
export async function resolveTopology(api: HostingApi, owner: string, repo: string): Promise<Topology> {
  const metadata = await api.getRepository(owner, repo);

  if (metadata.parent) {
    const upstream = { ...metadata.parent };
    return { isFork: true, upstream, target: upstream };
  }

  return {
    isFork: false,
    upstream: null,
    target: { owner: metadata.owner, repo: metadata.repo, defaultBranch: metadata.defaultBranch },
  };
}
