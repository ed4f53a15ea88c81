import { spawnSync } from 'node:child_process';
import { constants } from 'node:os';
import { ExternalCommandError } from './errors.js';
import type { CommandResult, Logger, ProcessRunner, RunMode } from './types.js';

/** Max buffer for captured git/gh output: 10MB */
const MAX_BUFFER = 10 * 1024 * 1024;

/** Conventional shell exit code for "command not found" */
const EXIT_NOT_FOUND = 127;

export interface ProcessRunnerOptions {
  cwd?: string;
  logger?: Logger;
}

/** Quote an argument for the debug log only; never used to build a command line. */
function displayArg(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : JSON.stringify(arg);
}

function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (constants.signals[signal] ?? 0);
}

/**
 * Create the runner every git and gh invocation goes through.
 *
 * Commands run synchronously with no shell. `interactive` attaches the
 * terminal so commit hooks can prompt; the other modes capture output.
 * The debug log shows the command line, never the output (gh can print tokens).
 */
export function createProcessRunner(options: ProcessRunnerOptions = {}): ProcessRunner {
  return {
    run(command: string, args: readonly string[], mode: RunMode): CommandResult {
      options.logger?.debug(`$ ${[command, ...args].map(displayArg).join(' ')}`);

      const child = spawnSync(command, args, {
        cwd: options.cwd,
        encoding: 'utf-8',
        maxBuffer: MAX_BUFFER,
        stdio: mode === 'interactive' ? 'inherit' : 'pipe',
      });

      const label = `${command} ${args[0] ?? ''}`.trim();

      if (child.error) {
        const notFound = 'code' in child.error && child.error.code === 'ENOENT';
        throw new ExternalCommandError(label, notFound ? EXIT_NOT_FOUND : -1, child.error.message);
      }

      const result: CommandResult = {
        stdout: child.stdout ?? '',
        stderr: child.stderr ?? '',
        exitCode: child.status ?? (child.signal ? signalExitCode(child.signal) : -1),
      };

      if (mode !== 'capture' && result.exitCode !== 0) {
        throw new ExternalCommandError(label, result.exitCode, result.stderr);
      }

      return result;
    },
  };
}
