// src/cli/program.ts - Commander program factory

import { Command, CommanderError } from 'commander';
import * as fs from 'fs/promises';

import { Logger } from '../utils/logger.js';
import { ProjectConfigLoader } from '../config/project-config-loader.js';

// Engine registration
import { ContainerEngineRegistry } from '../core/container-engine-registry.js';
import { DockerCliEngine } from '../core/engines/docker-cli-engine.js';

// Command registration
import { registerCoreCommands } from './commands/register-core.js';

/**
 * Configure logging and register the container engine named in
 * .testbed/config.yml. Runs before every command action.
 */
export async function registerEngines(repoPath: string): Promise<void> {
  const config = await new ProjectConfigLoader(repoPath).load();
  Logger.configureFromEnv(process.env, config.logLevel);

  if (!ContainerEngineRegistry.hasEngine('docker-cli')) {
    ContainerEngineRegistry.register(new DockerCliEngine(config.engine.binary));
  }

  if (!ContainerEngineRegistry.hasEngine(config.engine.type)) {
    Logger.warn(
      `Engine type '${config.engine.type}' from config.yml is not available. ` +
      `Available engines: ${ContainerEngineRegistry.getAvailableTypes().join(', ')}`
    );
  }
}

export async function createProgram(repoPath: string = process.cwd()): Promise<Command> {
  const pkgPath = new URL('../../package.json', import.meta.url);
  const pkg: { version: string } = JSON.parse(await fs.readFile(pkgPath, 'utf-8'));

  const program = new Command();

  program
    .name('testbed')
    .version(`testbed v${pkg.version}`, '-v, --version')
    .description('Run a test suite in a disposable container environment with its service dependencies')
    .exitOverride();

  program.hook('preAction', async () => {
    await registerEngines(repoPath);
  });

  registerCoreCommands(program, repoPath);

  return program;
}

export { CommanderError };
