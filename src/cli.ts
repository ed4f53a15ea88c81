#!/usr/bin/env node
import { Command, Option } from 'commander';
import pc from 'picocolors';
import { loadConfig } from './config.js';
import { EXIT_INTERRUPTED, EXIT_PRECONDITION, exitCodeFor } from './errors.js';
import { createGitHubApi, createOctokit } from './github.js';
import { MERGE_METHODS, buildPipelineRequest, parseReviewers, type PrOptions } from './options.js';
import { createLogger, formatDuration, printErrors, printFailure, printResult } from './output.js';
import { runPipeline } from './pipeline.js';
import { checkPrerequisites } from './prerequisites.js';
import { createProcessRunner } from './runner.js';

// Rollback is not guaranteed after an interrupt; the repository may need manual cleanup.
process.on('SIGINT', () => {
  console.error(pc.dim('\n\nCancelled.'));
  process.exit(EXIT_INTERRUPTED);
});

const program = new Command();

program
  .name('acp')
  .description('Automatic Commit Pusher: turn staged changes into a pull request in one command')
  .version('0.1.0');

program
  .command('pr')
  .description('Commit staged changes to a temporary branch, push it and open a pull request')
  .argument('<message>', 'Commit message; its first line becomes the PR title')
  .option('-b, --body <text>', 'Custom PR body message', '')
  .option('-v, --verbose', 'Show detailed output')
  .addOption(
    new Option('-i, --interactive', 'Print a prefilled PR link instead of creating the PR')
      .conflicts(['merge', 'autoMerge', 'draft'])
  )
  .option('-a, --add', 'Stage all changes (git add --all) before creating the PR')
  .option('-d, --draft', 'Open the PR as a draft')
  .option('-r, --reviewers <logins>', 'Comma-separated reviewers to request', parseReviewers, [])
  .addOption(new Option('--merge', 'Merge the PR right after creating it').conflicts('autoMerge'))
  .addOption(new Option('--auto-merge', 'Enable auto-merge so the PR merges once checks pass'))
  .addOption(
    new Option('--merge-method <method>', 'Merge method for --merge and --auto-merge')
      .choices(MERGE_METHODS)
      .default('squash')
  )
  .action(async (message: string, options: PrOptions) => {
    // 1. Check prerequisites (collect all failures, report at once)
    const failures = checkPrerequisites();
    if (failures.length > 0) {
      printErrors(failures);
      process.exit(EXIT_PRECONDITION);
    }

    const logger = createLogger(Boolean(options.verbose));
    const start = performance.now();

    try {
      // 2. Configuration from ACP_* environment variables
      const config = loadConfig();
      const runner = createProcessRunner({ logger });

      // 3. Run the pipeline; on failure it has already rolled back what it could
      const result = await runPipeline(buildPipelineRequest(message, options), {
        runner,
        logger,
        config,
        connect: (host) => createGitHubApi(createOctokit(runner, host)),
      });

      printResult(result);
      logger.debug(`Done in ${formatDuration(performance.now() - start)}`);
    } catch (error: unknown) {
      printFailure(error);
      process.exit(exitCodeFor(error));
    }
  });

await program.parseAsync();
