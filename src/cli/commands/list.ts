// src/cli/commands/list.ts

import { JobLoader } from '../../config/job-loader.js';

export async function listCommand(repoPath: string): Promise<void> {
  const loader = new JobLoader(repoPath);
  const jobs = await loader.listJobs();

  if (jobs.length === 0) {
    console.log('No jobs found in .testbed/jobs/');
  } else {
    console.log('Available jobs:');
    jobs.forEach(j => console.log(`  - ${j}`));
  }
}
