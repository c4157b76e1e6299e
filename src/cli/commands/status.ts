// src/cli/commands/status.ts

import { JobStateManager } from '../../core/state-manager.js';

export async function statusCommand(repoPath: string): Promise<void> {
  const stateManager = new JobStateManager(repoPath);
  const latestRun = await stateManager.getLatestRun();

  if (!latestRun) {
    console.log('No job runs found');
    return;
  }

  console.log(`\n${'='.repeat(60)}`);
  console.log(`Latest Job Run: ${latestRun.jobName}`);
  console.log(`${'='.repeat(60)}\n`);

  console.log(`Run ID:       ${latestRun.runId}`);
  console.log(`Version tag:  ${latestRun.versionTag || '(empty)'}`);
  console.log(`Status:       ${latestRun.status.toUpperCase()}`);
  console.log(`Started:      ${latestRun.startedAt}`);
  console.log(`Finished:     ${latestRun.finishedAt ?? 'N/A'}`);

  if (latestRun.exitStatus) {
    console.log(`Result:       ${latestRun.exitStatus.reason} (exit ${latestRun.exitStatus.exitCode})`);
    console.log(`              ${latestRun.exitStatus.message}`);
  }

  if (latestRun.artifacts.testLogPath) {
    console.log(`Test log:     ${latestRun.artifacts.testLogPath}`);
  }
  if (latestRun.artifacts.coveragePath) {
    console.log(`Coverage:     ${latestRun.artifacts.coveragePath}`);
  }

  console.log(`\n${'─'.repeat(60)}`);
  console.log('Stages:\n');

  latestRun.stages.forEach(stage => {
    const statusIcon = stage.status === 'success' ? '✅' :
                     stage.status === 'failed' ? '❌' :
                     stage.status === 'skipped' ? '⏭️' : '⏳';
    const duration = stage.duration !== undefined ? `${stage.duration.toFixed(1)}s` : 'N/A';

    console.log(`${statusIcon} ${stage.stageName}`);
    console.log(`   Status: ${stage.status}`);
    console.log(`   Duration: ${duration}`);

    if (stage.error) {
      console.log(`   Error: ${stage.error.message}`);
      if (stage.error.suggestion) {
        console.log(`   💡 ${stage.error.suggestion}`);
      }
    }

    console.log('');
  });

  const failedReleases = latestRun.teardown.filter(t => t.status === 'failed');
  const released = latestRun.teardown.length - failedReleases.length;
  console.log(`Teardown: ${released} released, ${failedReleases.length} failed`);
  failedReleases.forEach(t => console.log(`   ⚠️  ${t.label}: ${t.error ?? 'unknown error'}`));

  console.log(`${'='.repeat(60)}\n`);
}
