// src/cli/commands/register-core.ts - Core command registrations

import { InvalidArgumentError, type Command } from 'commander';

import { runCommand } from './run.js';
import { validateCommand } from './validate.js';
import { listCommand } from './list.js';
import { statusCommand } from './status.js';
import { initCommand } from './init.js';

function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive number.');
  }
  return parsed;
}

export function registerCoreCommands(program: Command, repoPath: string): void {
  program
    .command('run')
    .description('Run a job: provision, start services, install, test, report')
    .argument('<job>', 'Job name under .testbed/jobs/')
    .requiredOption('-t, --version-tag <tag>', 'Environment version tag (e.g. 3.11)')
    .option('-c, --checkout <dir>', 'Package checkout to mount (default: current directory)')
    .option('--timeout <minutes>', 'Override the job timeout', parsePositiveNumber)
    .option('--strict-env', 'Fail on environment variable collisions')
    .option('--quiet', 'Only print the final summary')
    .action(async (job: string, opts: {
      versionTag: string;
      checkout?: string;
      timeout?: number;
      strictEnv?: boolean;
      quiet?: boolean;
    }) => {
      process.exitCode = await runCommand(repoPath, job, {
        versionTag: opts.versionTag,
        checkout: opts.checkout,
        timeoutMinutes: opts.timeout,
        strictEnv: opts.strictEnv,
        quiet: opts.quiet,
      });
    });

  program
    .command('validate')
    .description('Validate a job definition')
    .argument('<job>', 'Job name to validate')
    .option('--check-engine', 'Also check that the container engine is reachable')
    .action(async (job: string, opts: { checkEngine?: boolean }) => {
      process.exitCode = await validateCommand(repoPath, job, opts);
    });

  program
    .command('list')
    .description('Show available jobs')
    .action(async () => {
      await listCommand(repoPath);
    });

  program
    .command('status')
    .description('Show last run status')
    .action(async () => {
      await statusCommand(repoPath);
    });

  program
    .command('init')
    .description('Initialize project with an example job')
    .action(async () => {
      await initCommand(repoPath);
    });
}
