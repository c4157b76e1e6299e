// src/config/schema.ts

/**
 * Caller-supplied input for a single job invocation.
 * The version tag selects the execution environment image.
 */
export interface JobInput {
  versionTag: string;
}

export interface PortMapping {
  hostPort: number;                    // 0 = let the engine allocate one
  containerPort: number;
}

/**
 * How the orchestrator decides a service is ready.
 * - probe: open TCP connections to the published host port until one succeeds
 * - grace: wait a fixed period and assume the service is up
 *
 * @default 'probe'
 */
export type ReadinessStrategy = 'probe' | 'grace';

export interface ReadinessConfig {
  strategy: ReadinessStrategy;
  gracePeriodMs: number;               // Default: 2000
  timeoutMs: number;                   // Default: 30000
}

export interface ServiceConnectionConfig {
  scheme: string;                      // e.g. 'mqtt', 'redis', 'tcp'
  envVar: string;                      // Variable handed to the test process
}

/**
 * Declaration of an auxiliary network service the test suite depends on.
 */
export interface ServiceSpec {
  name: string;                        // Also the network alias inside the job network
  image: string;
  ports: PortMapping[];
  connection: ServiceConnectionConfig;
  env: Record<string, string>;
  readiness: ReadinessConfig;
}

export interface EnvironmentConfig {
  image: string;                       // Template, must contain {{versionTag}}
  workdir: string;                     // Checkout mount point inside the sandbox
}

export interface InstallConfig {
  upgradeCommand?: string;             // Omit to skip the package manager upgrade
  installCommand: string;              // Supports {{extras}} and {{extrasSuffix}}
  extras: string[];
}

export interface TestConfig {
  command: string;
  env: Record<string, string>;         // Static variables added after service variables
  coverage?: {
    path: string;                      // Relative to the checkout
  };
}

export interface JobSettings {
  strictEnv: boolean;                  // Treat variable collisions as configuration errors
  abortExitCode: number;               // Reserved exit code for timeouts/interrupts
}

/**
 * A fully-defaulted job definition, as produced by JobLoader.
 */
export interface JobDefinition {
  name: string;
  environment: EnvironmentConfig;
  services: ServiceSpec[];
  install: InstallConfig;
  test: TestConfig;
  timeoutMinutes: number;
  settings: JobSettings;
}

export interface JobMetadata {
  sourcePath: string;                  // Absolute path to the YAML file
  loadedAt: string;                    // ISO timestamp
}

export interface ExecutionEnvironment {
  readonly versionTag: string;
  readonly imageReference: string;
  readonly containerId: string;
  readonly containerName: string;
  readonly networkName: string;
  readonly workdir: string;            // Path inside the sandbox
  readonly workspacePath: string;      // Host path mounted at workdir
}

export interface ConnectionInfo {
  readonly serviceName: string;
  readonly host: string;
  readonly port: number;               // Container port reachable from the sandbox
  readonly hostPort?: number;          // Port published on the host, if any
  readonly url: string;
  readonly envVar: string;
}

export type EnvironmentVariableSet = Readonly<Record<string, string>>;

export interface CoverageArtifact {
  readonly path: string;
  readonly data: Buffer;
}

export type AbortReason = 'timeout' | 'interrupted';

export interface JobResult {
  readonly exitCode: number;
  readonly rawExitCode: number | null;
  readonly timedOut: boolean;
  readonly abortReason?: AbortReason;
  readonly logs: Buffer;
  readonly coverageArtifact?: CoverageArtifact;
  readonly durationMs: number;
}

export type FailureReason = 'TestFailure' | 'RunnerAbort' | 'SetupFailure';

export interface ExitStatus {
  readonly success: boolean;
  readonly reason: 'Passed' | FailureReason;
  readonly exitCode: number;
  readonly message: string;
}

export type StageName = 'provision' | 'services' | 'install' | 'test' | 'report';

export interface StageExecution {
  stageName: StageName;
  status: 'pending' | 'running' | 'success' | 'failed' | 'skipped';

  startTime: string;
  endTime?: string;
  duration?: number;                   // Seconds

  error?: {
    message: string;
    kind?: string;
    stack?: string;
    timestamp?: string;
    suggestion?: string;
  };
}

export interface TeardownEntry {
  label: string;
  status: 'released' | 'failed';
  error?: string;
}

export interface JobRunRecord {
  runId: string;
  jobName: string;
  versionTag: string;
  startedAt: string;
  finishedAt?: string;
  status: 'running' | 'passed' | 'failed' | 'aborted';

  stages: StageExecution[];

  exitStatus?: ExitStatus;
  result?: {
    exitCode: number;
    rawExitCode: number | null;
    timedOut: boolean;
    abortReason?: AbortReason;
    durationMs: number;
  };

  artifacts: {
    logPath?: string;
    testLogPath?: string;
    coveragePath?: string;
  };

  teardown: TeardownEntry[];
}

export interface ProjectConfig {
  engine: {
    type: string;                      // Registered engine type
    binary: string;                    // CLI binary (docker, podman)
  };
  artifactsDir: string;                // Absolute
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}
