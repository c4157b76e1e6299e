// src/cli/commands/init.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { JobLoader } from '../../config/job-loader.js';
import { JobValidator } from '../../validators/job-validator.js';
import { Logger } from '../../utils/logger.js';

// Resolves to <package>/templates/jobs from both src/ and dist/
const TEMPLATES_DIR = fileURLToPath(new URL('../../../templates/jobs/', import.meta.url));

const EXAMPLE_JOBS = ['python-tests'];

const GITIGNORE_MARKER = '.testbed/state/';
const GITIGNORE_ENTRY = `
# Testbed runner
.testbed/state/
.testbed/logs/
.testbed/artifacts/
`;

export async function initCommand(repoPath: string, templatesDir: string = TEMPLATES_DIR): Promise<void> {
  console.log('\n🚀 Initializing testbed...\n');

  const jobsDir = new JobLoader(repoPath).getJobsDir();
  await fs.mkdir(jobsDir, { recursive: true });

  console.log('✅ Created directory structure:');
  console.log('   - .testbed/jobs/\n');

  console.log('✅ Creating jobs:');
  for (const jobName of EXAMPLE_JOBS) {
    const created = await copyJobTemplate(templatesDir, jobName, jobsDir);
    console.log(created
      ? `   - .testbed/jobs/${jobName}.yml`
      : `   - .testbed/jobs/${jobName}.yml (exists, left unchanged)`);
  }
  console.log('');

  await updateGitignore(repoPath);

  console.log('🔍 Validating jobs...\n');
  const allValid = await validateCreatedJobs(repoPath, EXAMPLE_JOBS);

  console.log(`${'='.repeat(60)}`);
  if (!allValid) {
    console.log('\n⚠️  testbed initialized with validation issues.\n');
    console.log('Fix the errors above before running jobs.');
    console.log(`\n${'='.repeat(60)}\n`);
    return;
  }

  console.log('\n✨ testbed initialized successfully!\n');
  console.log('Next steps:');
  console.log('  1. Adjust .testbed/jobs/python-tests.yml to your package');
  console.log('  2. Run it against an interpreter version:');
  console.log('     testbed run python-tests --version-tag 3.11');
  console.log(`\n${'='.repeat(60)}\n`);
}

/**
 * Copy a job template unless the target already exists.
 * Returns whether a file was written.
 */
async function copyJobTemplate(templatesDir: string, jobName: string, targetDir: string): Promise<boolean> {
  const targetPath = path.join(targetDir, `${jobName}.yml`);
  const templateContent = await fs.readFile(path.join(templatesDir, `${jobName}.yml`), 'utf-8');

  try {
    await fs.writeFile(targetPath, templateContent, { encoding: 'utf-8', flag: 'wx' });
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
      return false;
    }
    throw error;
  }
}

async function updateGitignore(repoPath: string): Promise<void> {
  const gitignorePath = path.join(repoPath, '.gitignore');

  let gitignoreContent = '';
  try {
    gitignoreContent = await fs.readFile(gitignorePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      Logger.warn(`Could not read .gitignore: ${error instanceof Error ? error.message : String(error)}`);
      return;
    }
  }

  if (!gitignoreContent.includes(GITIGNORE_MARKER)) {
    await fs.appendFile(gitignorePath, GITIGNORE_ENTRY, 'utf-8');
  }
}

async function validateCreatedJobs(repoPath: string, jobNames: string[]): Promise<boolean> {
  const loader = new JobLoader(repoPath);
  const validator = new JobValidator();
  let hasErrors = false;

  for (const jobName of jobNames) {
    try {
      const { definition } = await loader.loadJob(jobName);
      const errors = await validator.validate(definition, repoPath);

      const jobErrors = errors.filter(e => e.severity === 'error');
      const jobWarnings = errors.filter(e => e.severity === 'warning');

      if (jobErrors.length > 0) {
        hasErrors = true;
        console.log(`❌ ${jobName}: ${jobErrors.length} error(s)`);
        for (const error of jobErrors) {
          console.log(`   • ${error.field}: ${error.message}`);
        }
      } else if (jobWarnings.length > 0) {
        console.log(`✅ ${jobName}: valid (${jobWarnings.length} warning(s))`);
        for (const warning of jobWarnings) {
          console.log(`   ⚠️  ${warning.field}: ${warning.message}`);
        }
      } else {
        console.log(`✅ ${jobName}: valid`);
      }
    } catch (error) {
      hasErrors = true;
      console.log(`❌ ${jobName}: failed to load - ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return !hasErrors;
}
