#!/usr/bin/env node

// src/index.ts - CLI entry point

import { createProgram, CommanderError } from './cli/program.js';
import { EXIT_CODES } from './core/result-reporter.js';
import { Logger } from './utils/logger.js';

async function main(): Promise<void> {
  try {
    const program = await createProgram(process.cwd());
    await program.parseAsync(process.argv);
  } catch (error) {
    // --help, --version and usage errors already printed their output
    if (error instanceof CommanderError) {
      process.exitCode = error.exitCode;
      return;
    }

    Logger.error(error instanceof Error ? error.message : String(error));
    if (process.env.DEBUG) {
      console.error(error);
    }
    process.exitCode = EXIT_CODES.setupFailure;
  }
}

await main();
