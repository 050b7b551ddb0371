import path from "node:path";
import { toErrorText } from "./errors.js";
import { defaultCommandRunner } from "./exec.js";
import { artifactName as nameArtifact } from "./naming.js";
import { ensureDir, fileExists, resolveArtifactPath } from "./paths.js";
import { formatCommandLine, isValidEnvName } from "./shell.js";
import type {
  ClusterTopology,
  CommandResult,
  CommandRunner,
  ExperimentConfig,
  LaunchEnvironment,
  LaunchInvocation,
  LauncherSettings,
  RunResult,
  RunStatus,
  SweepLogger,
} from "./types.js";

export const CUDA_ALLOC_CONF_ENV = "PYTORCH_CUDA_ALLOC_CONF";
export const DISTRIBUTED_DEBUG_ENV = "TORCH_DISTRIBUTED_DEBUG";
export const TOTAL_WORKERS_ENV = "GNN_SWEEP_TOTAL_WORKERS";

export function renderLaunchEnvironment(
  environment: LaunchEnvironment,
  topology: ClusterTopology,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(environment.vars)) {
    if (!isValidEnvName(key)) {
      throw new Error(`Invalid environment variable name: ${key}`);
    }
    env[key] = value;
  }
  if (environment.cudaAllocConf) {
    env[CUDA_ALLOC_CONF_ENV] = environment.cudaAllocConf;
  }
  if (environment.distributedDebug) {
    env[DISTRIBUTED_DEBUG_ENV] = environment.distributedDebug;
  }
  env[TOTAL_WORKERS_ENV] = String(topology.totalWorkers);
  return env;
}

function optionalArg(flag: string, value: string | number | undefined): string[] {
  return value == null ? [] : [flag, String(value)];
}

export function entryPointArgs(config: ExperimentConfig, logFile: string): string[] {
  const args = [
    "--num_host",
    String(config.hosts),
    "--num_gpu_per_host",
    String(config.acceleratorsPerHost),
    "--data_dir",
    config.dataDir,
    "--graph_name",
    config.dataset,
    "--fanouts",
    config.fanouts.join(","),
    "--model",
    config.model,
    "--hid_size",
    String(config.hiddenSize),
    "--log_file",
    logFile,
    "--num_epoch",
    String(config.epochs),
  ];

  args.push(...optionalArg("--num_layers", config.numLayers));
  args.push(...optionalArg("--batch_size", config.batchSize));
  args.push(...optionalArg("--sample_mode", config.sampleMode));
  args.push(...optionalArg("--lr", config.lr));
  args.push(...optionalArg("--weight_decay", config.weightDecay));
  args.push(...optionalArg("--dropout", config.dropout));
  args.push(...optionalArg("--num_head", config.numHead));
  args.push(...optionalArg("--num_partition", config.numPartition));
  if (config.evaluate != null) {
    args.push(config.evaluate ? "--eval" : "--no-eval");
  }
  return args;
}

export function buildLaunchInvocation(params: {
  config: ExperimentConfig;
  topology: ClusterTopology;
  settings: LauncherSettings;
  environment: LaunchEnvironment;
  artifactName: string;
}): LaunchInvocation {
  const { config, topology, settings } = params;
  const cwd = path.resolve(settings.workDir);
  const artifactPath = resolveArtifactPath(cwd, params.artifactName, settings.logDir);
  // The entry point resolves --log_file against its own cwd, which is `cwd`.
  const logFile = settings.logDir
    ? path.join(settings.logDir, params.artifactName)
    : params.artifactName;

  const launcherArgs = [
    "--nnodes",
    String(topology.nodes),
    "--nproc-per-node",
    String(topology.workersPerNode),
  ];
  if (settings.rendezvous) {
    launcherArgs.push(
      "--rdzv-backend",
      settings.rendezvous.backend,
      "--rdzv-endpoint",
      settings.rendezvous.endpoint,
    );
  }

  return {
    command: settings.command,
    args: [
      ...launcherArgs,
      ...settings.launcherArgs,
      settings.entryPoint,
      ...entryPointArgs(config, logFile),
    ],
    env: renderLaunchEnvironment(params.environment, topology),
    cwd,
    topology,
    artifactName: params.artifactName,
    artifactPath,
  };
}

function definedEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

export type JobLauncherParams = {
  systemId: string;
  settings: LauncherSettings;
  environment: LaunchEnvironment;
  runner?: CommandRunner;
  logger?: SweepLogger;
  baseEnv?: NodeJS.ProcessEnv;
  now?: () => Date;
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
};

export type LaunchOptions = {
  index: number;
  artifactName?: string;
  signal?: AbortSignal;
};

export class JobLauncher {
  private readonly systemId: string;
  private readonly settings: LauncherSettings;
  private readonly environment: LaunchEnvironment;
  private readonly runner: CommandRunner;
  private readonly logger?: SweepLogger;
  private readonly baseEnv: Record<string, string>;
  private readonly now: () => Date;
  private readonly onStdout?: (chunk: string) => void;
  private readonly onStderr?: (chunk: string) => void;

  constructor(params: JobLauncherParams) {
    this.systemId = params.systemId;
    this.settings = params.settings;
    this.environment = params.environment;
    this.runner = params.runner ?? defaultCommandRunner;
    this.logger = params.logger;
    this.baseEnv = definedEnv(params.baseEnv ?? process.env);
    this.now = params.now ?? (() => new Date());
    this.onStdout = params.onStdout;
    this.onStderr = params.onStderr;
  }

  invocationFor(config: ExperimentConfig, topology: ClusterTopology, name?: string): LaunchInvocation {
    return buildLaunchInvocation({
      config,
      topology,
      settings: this.settings,
      environment: this.environment,
      artifactName: name ?? nameArtifact(this.systemId, config),
    });
  }

  /**
   * Runs one distributed launch to completion. Run-time failures come back as a
   * tagged RunResult; this never retries and never throws for them.
   */
  async launch(
    config: ExperimentConfig,
    topology: ClusterTopology,
    options: LaunchOptions,
  ): Promise<RunResult> {
    const started = this.now();
    const name = options.artifactName ?? nameArtifact(this.systemId, config);

    const finish = (
      status: RunStatus,
      extra: Pick<RunResult, "exitCode" | "signal" | "error" | "artifactPath"> = {},
    ): RunResult => {
      const finished = this.now();
      return Object.freeze({
        index: options.index,
        config,
        topology,
        artifactName: name,
        status,
        ...extra,
        startedAt: started.toISOString(),
        finishedAt: finished.toISOString(),
        durationMs: Math.max(0, finished.getTime() - started.getTime()),
      });
    };

    let invocation: LaunchInvocation;
    try {
      invocation = this.invocationFor(config, topology, name);
      await ensureDir(path.dirname(invocation.artifactPath));
    } catch (err) {
      return finish("launch_failure", { error: toErrorText(err) });
    }

    this.logger?.debug?.(
      `[gnn-sweep] ${formatCommandLine(invocation.command, invocation.args, invocation.env)}`,
    );

    let result: CommandResult;
    try {
      result = await this.runner(invocation.command, invocation.args, {
        cwd: invocation.cwd,
        env: { ...this.baseEnv, ...invocation.env },
        timeoutMs: this.settings.timeoutMs,
        killGraceMs: this.settings.killGraceMs,
        signal: options.signal,
        onStdout: this.onStdout,
        onStderr: this.onStderr,
      });
    } catch (err) {
      return finish("launch_failure", { error: toErrorText(err) });
    }

    const artifactPath = (await fileExists(invocation.artifactPath))
      ? invocation.artifactPath
      : undefined;
    const signal = result.signal ?? undefined;

    if (result.aborted) {
      return finish("cancelled", { signal, artifactPath, error: "cancelled before completion" });
    }
    if (result.timedOut) {
      return finish("timeout", {
        signal,
        artifactPath,
        error: `timed out after ${this.settings.timeoutMs}ms`,
      });
    }
    if (result.code === 0) {
      return finish("success", { exitCode: 0, artifactPath });
    }

    const detail = result.stderrTail.trim();
    const reason =
      result.code != null ? `exit code ${result.code}` : `terminated by ${result.signal ?? "signal"}`;
    return finish("runtime_failure", {
      exitCode: result.code ?? undefined,
      signal,
      artifactPath,
      error: detail ? `${reason}: ${detail}` : reason,
    });
  }
}
