// src/utils/error-factory.ts

import { JobError } from './errors.js';

export interface StageErrorDetails {
  message: string;
  kind?: string;
  stack?: string;
  timestamp: string;
  suggestion?: string;
}

export class ErrorFactory {
  static createStageError(error: unknown): StageErrorDetails {
    const baseError: StageErrorDetails = {
      message: error instanceof Error ? error.message : String(error),
      kind: error instanceof JobError ? error.kind : undefined,
      stack: error instanceof Error ? error.stack : undefined,
      timestamp: new Date().toISOString()
    };

    const suggestion = this.getSuggestion(baseError.message, baseError.kind);
    if (suggestion) {
      baseError.suggestion = suggestion;
    }

    return baseError;
  }

  private static getSuggestion(message: string, kind?: string): string | undefined {
    if (kind === 'InvalidVersionTag') {
      return 'Pass a tag that exists for the environment image, e.g. --version-tag 3.11';
    }

    if (kind === 'PortConflict' || /already allocated|address already in use/i.test(message)) {
      return 'Stop whatever holds the port, or publish the service on a dynamic port ("1883" instead of "1883:1883").';
    }

    if (kind === 'StartupTimeout') {
      return 'Service did not accept connections in time. Raise readiness.timeoutMs or check the service logs.';
    }

    if (kind === 'NetworkFailure') {
      return 'Package index unreachable from the container. Check DNS and proxy settings.';
    }

    if (kind === 'ResolutionFailed') {
      return 'Dependency constraints cannot be satisfied for this runtime version.';
    }

    if (message.includes('Failed to spawn') || message.includes('ENOENT')) {
      return 'Container CLI not found. Install docker or set engine.binary in .testbed/config.yml.';
    }

    if (message.includes('Cannot connect to the Docker daemon') || message.includes('permission denied')) {
      return 'Start the container daemon and check that your user may access its socket.';
    }

    if (message.includes('timed out') || message.includes('timeout')) {
      return 'Job exceeded its time budget. Consider raising timeoutMinutes in the job definition.';
    }

    if (message.includes('YAML') || message.includes('parse')) {
      return 'Check YAML syntax in the job definition file.';
    }

    return undefined;
  }
}
