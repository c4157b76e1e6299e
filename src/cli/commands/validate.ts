// src/cli/commands/validate.ts

import { JobLoader } from '../../config/job-loader.js';
import { ProjectConfigLoader } from '../../config/project-config-loader.js';
import { JobValidator } from '../../validators/job-validator.js';
import { ContainerEngineRegistry } from '../../core/container-engine-registry.js';
import type { ContainerEngine } from '../../core/types/container-engine.js';
import { EXIT_CODES } from '../../core/result-reporter.js';

export async function validateCommand(
  repoPath: string,
  jobName: string,
  options: { checkEngine?: boolean } = {}
): Promise<number> {
  try {
    console.log(`\n📋 Validating job: ${jobName}\n`);

    const loader = new JobLoader(repoPath);
    const { definition } = await loader.loadJob(jobName);

    let engine: ContainerEngine | undefined;
    if (options.checkEngine) {
      const projectConfig = await new ProjectConfigLoader(repoPath).load();
      engine = ContainerEngineRegistry.getEngine(projectConfig.engine.type);
    }

    const isValid = await JobValidator.validateAndReport(definition, repoPath, engine);

    if (isValid) {
      console.log('\n✅ Job is valid!\n');
      return EXIT_CODES.passed;
    }
    console.log('\n❌ Job has validation errors\n');
    return EXIT_CODES.setupFailure;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (message.startsWith('Job not found')) {
      console.error(`❌ Job "${jobName}" not found`);
    } else {
      console.error(`❌ Validation failed: ${message}`);
    }
    return EXIT_CODES.setupFailure;
  }
}
