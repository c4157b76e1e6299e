// src/utils/job-logger.ts

import * as fs from 'fs';
import * as path from 'path';

/**
 * Per-run log that writes to a file under .testbed/logs/ and, unless quiet,
 * echoes to the console.
 */
export class JobLogger {
  private logStream: fs.WriteStream | null = null;
  private logPath: string;
  private quiet: boolean;

  constructor(repoPath: string, jobName: string, runId: string, quiet: boolean = false) {
    this.quiet = quiet;

    const logDir = path.join(repoPath, '.testbed', 'logs');
    fs.mkdirSync(logDir, { recursive: true });

    this.logPath = path.join(logDir, `${jobName}-${runId.substring(0, 8)}.log`);
    this.logStream = fs.createWriteStream(this.logPath, { flags: 'a' });
  }

  getLogPath(): string {
    return this.logPath;
  }

  log(message: string): void {
    const timestamp = new Date().toISOString();
    this.logStream?.write(`[${timestamp}] ${message}\n`);

    if (!this.quiet) {
      console.log(message);
    }
  }

  /**
   * Raw process output; goes to the file unchanged and to stdout as-is.
   */
  output(chunk: Buffer): void {
    this.logStream?.write(chunk);

    if (!this.quiet) {
      process.stdout.write(chunk);
    }
  }

  error(message: string): void {
    const timestamp = new Date().toISOString();
    this.logStream?.write(`[${timestamp}] ERROR: ${message}\n`);

    if (!this.quiet) {
      console.error(message);
    }
  }

  stageStart(stageName: string): void {
    this.log(`Stage: ${stageName} - STARTED`);
  }

  stageComplete(stageName: string, duration: number): void {
    this.log(`Stage: ${stageName} - COMPLETED (${duration.toFixed(1)}s)`);
  }

  stageFailed(stageName: string, error: string): void {
    this.error(`Stage: ${stageName} - FAILED: ${error}`);
  }

  stageSkipped(stageName: string, reason: string): void {
    this.log(`Stage: ${stageName} - SKIPPED: ${reason}`);
  }

  jobStart(jobName: string, runId: string, versionTag: string): void {
    this.log('═'.repeat(60));
    this.log(`Job: ${jobName}`);
    this.log(`Run ID: ${runId.substring(0, 8)}`);
    this.log(`Version tag: ${versionTag || '(empty)'}`);
    this.log('═'.repeat(60));
  }

  jobComplete(reason: string, totalDuration: number): void {
    this.log('═'.repeat(60));
    this.log(`Job ${reason.toUpperCase()}`);
    this.log(`Total duration: ${totalDuration.toFixed(1)}s`);
    this.log('═'.repeat(60));
  }

  /**
   * Flush and close the file. Resolves once everything is on disk.
   */
  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(() => resolve()));
  }
}
