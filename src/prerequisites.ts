import { execFileSync } from 'node:child_process';
import type { PrereqFailure } from './types.js';

/**
 * Check all prerequisites and collect failures.
 *
 * Checks in order: git existence, gh CLI existence, gh auth status.
 * All failures are collected and returned at once (not fail-fast).
 * Returns an empty array when all checks pass (silent on success).
 */
export function checkPrerequisites(): PrereqFailure[] {
  const failures: PrereqFailure[] = [];
  const whichCmd = process.platform === 'win32' ? 'where' : 'which';

  // 1. Check git exists
  try {
    execFileSync(whichCmd, ['git'], { stdio: 'pipe' });
  } catch {
    failures.push({
      name: 'git',
      message: 'git not found',
      help: 'Install it: https://git-scm.com/downloads',
    });
  }

  // 2. Check gh CLI exists
  let ghExists = false;
  try {
    execFileSync(whichCmd, ['gh'], { stdio: 'pipe' });
    ghExists = true;
  } catch {
    failures.push({
      name: 'gh',
      message: 'gh CLI not found',
      help: 'Install it: https://cli.github.com',
    });
  }

  // 3. If gh exists, check authentication
  if (ghExists) {
    try {
      execFileSync('gh', ['auth', 'status'], { stdio: 'pipe' });
    } catch {
      failures.push({
        name: 'gh-auth',
        message: 'gh CLI is not authenticated',
        help: 'Run: gh auth login',
      });
    }
  }

  return failures;
}
