import fs from "node:fs/promises";
import path from "node:path";
import { loadSweepFile, type SweepOverrides } from "./config.js";
import {
  DuplicateArtifactNameError,
  SweepConfigError,
  toErrorText,
  type ConfigIssue,
  type SweepValidationError,
} from "./errors.js";
import { JobLauncher } from "./launcher.js";
import { createStreamLogger, type TextSink } from "./logger.js";
import { artifactName } from "./naming.js";
import { renderSweepScript } from "./script.js";
import { RunSequencer, validateSweep } from "./sequencer.js";
import { resolveExperimentTopology } from "./topology.js";
import {
  FAILURE_POLICIES,
  type CommandRunner,
  type FailurePolicy,
  type SweepFile,
  type SweepResult,
} from "./types.js";

export const EXIT_OK = 0;
export const EXIT_RUN_FAILED = 1;
export const EXIT_VALIDATION_FAILED = 2;
export const EXIT_USAGE = 64;
export const EXIT_INTERNAL = 70;
export const EXIT_CANCELLED = 130;

const COMMANDS = ["run", "validate", "render"] as const;
type CliCommand = (typeof COMMANDS)[number];

export const USAGE = `Usage: gnn-sweep <run|validate|render> --sweep <file> [options]

Commands:
  run        validate the sweep, then launch every entry in order
  validate   check topology, fanouts and artifact names without launching
  render     print a bash script equivalent to the sweep

Options:
  --sweep <file>            sweep definition (.json, .yaml or .yml)
  --system-id <id>          system identifier used in artifact names
  --policy <abort|continue> failure policy (default: abort)
  --timeout-minutes <n>     wall-clock budget per run, 0 for none
  --log-dir <dir>           directory for run logs, relative to the launcher workDir
  --out <file>              render: write the script here instead of stdout
  --json                    run/validate: print the result as JSON on stdout
  --quiet                   only log warnings and errors
  --verbose                 also log each launch command line
  -h, --help                show this help

Exit codes:
  0    every entry succeeded
  1    one or more runs failed
  2    the sweep was rejected before anything ran
  64   usage error or unreadable sweep file
  70   internal error
  130  cancelled by signal`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export type CliArgs = {
  command: CliCommand;
  sweepPath: string;
  systemId?: string;
  policy?: FailurePolicy;
  timeoutMinutes?: number;
  logDir?: string;
  out?: string;
  json: boolean;
  quiet: boolean;
  verbose: boolean;
};

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some((command) => command === value);
}

function isPolicy(value: string): value is FailurePolicy {
  return FAILURE_POLICIES.some((policy) => policy === value);
}

/** Returns undefined when help was requested. */
export function parseCliArgs(argv: string[]): CliArgs | undefined {
  if (argv.includes("-h") || argv.includes("--help") || argv.length === 0) {
    return undefined;
  }

  const [commandToken, ...rest] = argv;
  if (!commandToken || !isCommand(commandToken)) {
    throw new CliUsageError(`Unknown command: ${commandToken ?? "<none>"}`);
  }

  const args: Omit<CliArgs, "sweepPath"> & { sweepPath?: string } = {
    command: commandToken,
    json: false,
    quiet: false,
    verbose: false,
  };

  for (let index = 0; index < rest.length; index += 1) {
    const token = rest[index] ?? "";
    const next = () => {
      const value = rest[index + 1];
      if (value == null || value.startsWith("--")) {
        throw new CliUsageError(`${token} requires a value`);
      }
      index += 1;
      return value;
    };

    switch (token) {
      case "--sweep":
        args.sweepPath = next();
        break;
      case "--system-id":
        args.systemId = next();
        break;
      case "--policy": {
        const value = next();
        if (!isPolicy(value)) {
          throw new CliUsageError(`--policy must be one of: ${FAILURE_POLICIES.join(", ")}`);
        }
        args.policy = value;
        break;
      }
      case "--timeout-minutes": {
        const value = Number(next());
        if (!Number.isFinite(value) || value < 0) {
          throw new CliUsageError("--timeout-minutes must be a non-negative number");
        }
        args.timeoutMinutes = value;
        break;
      }
      case "--log-dir":
        args.logDir = next();
        break;
      case "--out":
        args.out = next();
        break;
      case "--json":
        args.json = true;
        break;
      case "--quiet":
        args.quiet = true;
        break;
      case "--verbose":
        args.verbose = true;
        break;
      default:
        throw new CliUsageError(`Unknown option: ${token}`);
    }
  }

  if (!args.sweepPath) {
    throw new CliUsageError("--sweep is required");
  }
  return { ...args, sweepPath: args.sweepPath };
}

export function exitCodeFor(result: SweepResult): number {
  if (result.outcome === "validation_failed") {
    return EXIT_VALIDATION_FAILED;
  }
  if (result.outcome === "cancelled") {
    return EXIT_CANCELLED;
  }
  return result.failed > 0 ? EXIT_RUN_FAILED : EXIT_OK;
}

function serializeErrors(errors: SweepValidationError[]) {
  return errors.map((error) =>
    error instanceof DuplicateArtifactNameError
      ? { name: error.name, message: error.message, pairs: error.pairs() }
      : { name: error.name, message: error.message },
  );
}

function writeInvalid(
  stdout: TextSink,
  errors: SweepValidationError[],
  issues: ConfigIssue[] = [],
) {
  const body = { valid: false, issues, errors: serializeErrors(errors) };
  stdout.write(`${JSON.stringify(body, null, 2)}\n`);
}

export function formatSweepResult(result: SweepResult): string {
  const lines = [
    `sweep ${result.systemId}: ${result.outcome} (policy ${result.policy})`,
    `  total ${result.total}, attempted ${result.attempted}, succeeded ${result.succeeded}, failed ${result.failed}, not attempted ${result.notAttempted}`,
  ];
  for (const run of result.results) {
    const code = run.exitCode != null ? ` exit=${run.exitCode}` : "";
    lines.push(
      `  [${run.index}] ${run.status}${code} ${(run.durationMs / 1000).toFixed(1)}s ${run.artifactPath ?? run.artifactName}`,
    );
  }
  for (const error of result.validationErrors) {
    lines.push(`  ${error.name}: ${error.message}`);
  }
  return `${lines.join("\n")}\n`;
}

export type RunCliParams = {
  stdout?: TextSink;
  stderr?: TextSink;
  signal?: AbortSignal;
  runner?: CommandRunner;
  cwd?: string;
};

function overridesFrom(args: CliArgs): SweepOverrides {
  return {
    systemId: args.systemId,
    failurePolicy: args.policy,
    timeoutMs: args.timeoutMinutes != null ? Math.round(args.timeoutMinutes * 60_000) : undefined,
    logDir: args.logDir,
  };
}

export async function runCli(argv: string[], params: RunCliParams = {}): Promise<number> {
  const stdout = params.stdout ?? process.stdout;
  const stderr = params.stderr ?? process.stderr;

  let args: CliArgs | undefined;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    stderr.write(`${err instanceof Error ? err.message : String(err)}\n\n${USAGE}\n`);
    return EXIT_USAGE;
  }
  if (!args) {
    stdout.write(`${USAGE}\n`);
    return EXIT_OK;
  }

  const logger = createStreamLogger(stderr, { quiet: args.quiet, verbose: args.verbose });

  let file: SweepFile;
  try {
    file = await loadSweepFile(
      path.resolve(params.cwd ?? process.cwd(), args.sweepPath),
      overridesFrom(args),
    );
  } catch (err) {
    if (err instanceof SweepConfigError) {
      logger.error(`[gnn-sweep] ${err.message}`);
      if (args.json) {
        writeInvalid(stdout, err.validationErrors, err.issues);
      }
      return EXIT_VALIDATION_FAILED;
    }
    logger.error(`[gnn-sweep] cannot load ${args.sweepPath}: ${toErrorText(err)}`);
    return EXIT_USAGE;
  }

  const launcher = new JobLauncher({
    systemId: file.sweep.systemId,
    settings: file.launcher,
    environment: file.environment,
    runner: params.runner,
    logger,
    onStdout: (chunk) => stdout.write(chunk),
    onStderr: (chunk) => stderr.write(chunk),
  });

  if (args.command === "run") {
    const sequencer = new RunSequencer({ launcher, logger });
    const result = await sequencer.run(file.sweep, file.failurePolicy, { signal: params.signal });
    const body = { ...result, validationErrors: serializeErrors(result.validationErrors) };
    stdout.write(args.json ? `${JSON.stringify(body, null, 2)}\n` : formatSweepResult(result));
    return exitCodeFor(result);
  }

  const errors = validateSweep(file.sweep);
  if (errors.length > 0) {
    for (const error of errors) {
      logger.error(`[gnn-sweep] ${error.message}`);
    }
    if (args.json) {
      writeInvalid(stdout, errors);
    }
    return EXIT_VALIDATION_FAILED;
  }

  const entries = file.sweep.experiments.map((config, idx) => {
    const topology = resolveExperimentTopology(config, idx);
    return {
      config,
      invocation: launcher.invocationFor(config, topology, artifactName(file.sweep.systemId, config)),
    };
  });

  if (args.command === "validate") {
    if (args.json) {
      const plan = entries.map(({ config, invocation }, idx) => ({
        index: idx,
        dataset: config.dataset,
        artifactName: invocation.artifactName,
        topology: invocation.topology,
      }));
      stdout.write(`${JSON.stringify({ valid: true, policy: file.failurePolicy, plan }, null, 2)}\n`);
    } else {
      const lines = entries.map(
        ({ invocation }, idx) =>
          `  [${idx}] ${invocation.artifactName} nodes=${invocation.topology.nodes} workersPerNode=${invocation.topology.workersPerNode} workers=${invocation.topology.totalWorkers}`,
      );
      stdout.write(`sweep ${file.sweep.systemId}: ${entries.length} entries valid\n${lines.join("\n")}\n`);
    }
    return EXIT_OK;
  }

  const script = renderSweepScript({
    systemId: file.sweep.systemId,
    policy: file.failurePolicy,
    entries,
  });
  if (args.out) {
    const outPath = path.resolve(params.cwd ?? process.cwd(), args.out);
    await fs.mkdir(path.dirname(outPath), { recursive: true });
    await fs.writeFile(outPath, script, { encoding: "utf8", mode: 0o755 });
    logger.info(`[gnn-sweep] wrote ${outPath}`);
  } else {
    stdout.write(script);
  }
  return EXIT_OK;
}
