// src/core/abort-controller.ts

import type { ChildProcess } from 'child_process';
import { EventEmitter } from 'events';
import type { AbortReason } from '../config/schema.js';

const KILL_GRACE_MS = 5000;

/**
 * Single cancellation mechanism for a job run.
 *
 * The job deadline and SIGINT both end up in abort(). Engines register the
 * child processes they spawn so abort() can terminate them; stages check
 * throwIfAborted() at their boundaries.
 *
 * Events:
 * - 'abort' (reason: AbortReason): emitted once, when abort() is first called
 */
export class JobAbortController extends EventEmitter {
  private _reason: AbortReason | undefined;
  private childProcesses: Set<ChildProcess> = new Set();
  private killTimers: Map<ChildProcess, NodeJS.Timeout> = new Map();
  private deadlineTimer: NodeJS.Timeout | undefined;
  private deadlineAt: number | undefined;

  get aborted(): boolean {
    return this._reason !== undefined;
  }

  get reason(): AbortReason | undefined {
    return this._reason;
  }

  /**
   * Register a child process for termination on abort.
   * Process is automatically unregistered when it exits.
   */
  registerProcess(process: ChildProcess): void {
    this.childProcesses.add(process);
    process.on('exit', () => {
      this.childProcesses.delete(process);
      const timer = this.killTimers.get(process);
      if (timer) {
        clearTimeout(timer);
        this.killTimers.delete(process);
      }
    });
  }

  /**
   * Abort after `ms` with reason 'timeout'. Re-arming replaces the previous deadline.
   */
  armDeadline(ms: number): void {
    this.disarmDeadline();
    this.deadlineAt = Date.now() + ms;
    this.deadlineTimer = setTimeout(() => this.abort('timeout'), ms);
    this.deadlineTimer.unref?.();
  }

  disarmDeadline(): void {
    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = undefined;
    }
    this.deadlineAt = undefined;
  }

  /**
   * Milliseconds left before the deadline fires, or undefined when none is armed.
   */
  remainingMs(): number | undefined {
    if (this.deadlineAt === undefined) return undefined;
    return Math.max(0, this.deadlineAt - Date.now());
  }

  /**
   * Abort the job.
   * - Records the reason (first caller wins)
   * - Emits 'abort'
   * - Kills all registered child processes (SIGTERM, then SIGKILL after 5s)
   */
  abort(reason: AbortReason = 'interrupted'): void {
    if (this._reason) {
      return;
    }

    this._reason = reason;
    this.disarmDeadline();
    this.emit('abort', reason);

    for (const proc of this.childProcesses) {
      if (!proc.killed) {
        proc.kill('SIGTERM');

        // Cleared by the exit listener when SIGTERM was enough
        const timer = setTimeout(() => {
          proc.kill('SIGKILL');
          this.killTimers.delete(proc);
        }, KILL_GRACE_MS);
        timer.unref?.();
        this.killTimers.set(proc, timer);
      }
    }
  }

  throwIfAborted(): void {
    if (this._reason) {
      throw new JobAbortError(this._reason);
    }
  }
}

/**
 * Raised when a stage notices the job was aborted (deadline or interrupt).
 */
export class JobAbortError extends Error {
  readonly isAbortError = true;

  constructor(
    public readonly reason: AbortReason,
    message: string = reason === 'timeout' ? 'Job timed out' : 'Job interrupted'
  ) {
    super(message);
    this.name = 'JobAbortError';
  }
}
