import { z } from 'zod';
import { InvalidConfigError } from './errors.js';

/** A single ref component: no slashes, no leading dash or dot, nothing git forbids in refs */
const REF_COMPONENT_RE = /^(?![-.])[A-Za-z0-9._-]+(?<!\.lock)(?<!\.)$/;

/** Schema for the ACP_* environment variables */
export const ConfigSchema = z.object({
  ACP_BRANCH_PREFIX: z
    .string()
    .regex(REF_COMPONENT_RE, 'must be a single branch-name component such as "acp"')
    .refine((value) => !value.includes('..'), 'must not contain ".."')
    .default('acp'),
  ACP_REMOTE: z
    .string()
    .regex(/^(?!-)[A-Za-z0-9._-]+$/, 'must be a remote name such as "origin"')
    .default('origin'),
  ACP_BRANCH_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
});

export interface Config {
  branchPrefix: string;
  remote: string;
  /** How many fresh branch names to try before giving up on a collision */
  branchAttempts: number;
}

/**
 * Read and validate configuration from the environment.
 * Empty variables count as unset. Throws InvalidConfigError naming the first bad variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const input = {
    ACP_BRANCH_PREFIX: env.ACP_BRANCH_PREFIX || undefined,
    ACP_REMOTE: env.ACP_REMOTE || undefined,
    ACP_BRANCH_ATTEMPTS: env.ACP_BRANCH_ATTEMPTS || undefined,
  };

  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? String(issue.path[0]) : 'configuration';
    throw new InvalidConfigError(variable, issue?.message ?? parsed.error.message);
  }

  return {
    branchPrefix: parsed.data.ACP_BRANCH_PREFIX,
    remote: parsed.data.ACP_REMOTE,
    branchAttempts: parsed.data.ACP_BRANCH_ATTEMPTS,
  };
}
