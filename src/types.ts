import type { SweepValidationError } from "./errors.js";

export type ModelFamily = "sage" | "gcn" | "gat";
export type SampleMode = "gpu" | "uva" | "cpu";
export type DistributedDebugLevel = "OFF" | "INFO" | "DETAIL";

export const FAILURE_POLICIES = ["abort", "continue"] as const;
export type FailurePolicy = (typeof FAILURE_POLICIES)[number];

export type ExperimentConfig = {
  dataset: string;
  fanouts: readonly number[];
  model: ModelFamily;
  hiddenSize: number;
  epochs: number;
  dataDir: string;
  hosts: number;
  acceleratorsPerHost: number;
  artifactName?: string;
  numLayers?: number;
  batchSize?: number;
  sampleMode?: SampleMode;
  lr?: number;
  weightDecay?: number;
  dropout?: number;
  numHead?: number;
  numPartition?: number;
  evaluate?: boolean;
};

/** An entry together with its position in the authored sweep. */
export type IndexedExperiment = {
  index: number;
  config: ExperimentConfig;
};

export type ClusterTopology = {
  nodes: number;
  workersPerNode: number;
  totalWorkers: number;
};

export type SweepSpecification = {
  systemId: string;
  experiments: readonly ExperimentConfig[];
};

export type LaunchEnvironment = {
  cudaAllocConf?: string;
  distributedDebug?: DistributedDebugLevel;
  vars: Record<string, string>;
};

export type RendezvousSettings = {
  backend: string;
  endpoint: string;
};

export type LauncherSettings = {
  command: string;
  launcherArgs: string[];
  entryPoint: string;
  workDir: string;
  logDir?: string;
  timeoutMs: number;
  killGraceMs: number;
  rendezvous?: RendezvousSettings;
};

export type SweepFile = {
  sweep: SweepSpecification;
  failurePolicy: FailurePolicy;
  launcher: LauncherSettings;
  environment: LaunchEnvironment;
};

export type LaunchInvocation = {
  command: string;
  args: string[];
  env: Record<string, string>;
  cwd: string;
  topology: ClusterTopology;
  artifactName: string;
  artifactPath: string;
};

export type RunStatus = "success" | "launch_failure" | "runtime_failure" | "timeout" | "cancelled";

export type RunResult = {
  index: number;
  config: ExperimentConfig;
  topology: ClusterTopology;
  artifactName: string;
  status: RunStatus;
  exitCode?: number;
  signal?: string;
  error?: string;
  artifactPath?: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
};

export type SweepOutcome = "completed" | "partial" | "validation_failed" | "cancelled";

export type SweepState = "idle" | "validating" | "validation_failed" | "running" | "done";

export type SweepResult = {
  outcome: SweepOutcome;
  policy: FailurePolicy;
  systemId: string;
  total: number;
  attempted: number;
  succeeded: number;
  failed: number;
  notAttempted: number;
  results: RunResult[];
  validationErrors: SweepValidationError[];
  startedAt: string;
  finishedAt: string;
  durationMs: number;
};

export type SweepLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug?: (message: string) => void;
};

export type CommandResult = {
  code: number | null;
  signal: NodeJS.Signals | null;
  stderrTail: string;
  timedOut: boolean;
  aborted: boolean;
};

export type CommandOptions = {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
  killGraceMs?: number;
  signal?: AbortSignal;
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;
