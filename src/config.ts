import fs from "node:fs/promises";
import path from "node:path";
import type { TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { parse as parseYaml } from "yaml";
import { SweepConfigError, type ConfigIssue } from "./errors.js";
import { artifactFileNameProblem } from "./paths.js";
import { validateExperiments } from "./sequencer.js";
import { isValidEnvName } from "./shell.js";
import {
  ExperimentSchema,
  PartialExperimentSchema,
  SweepFileSchema,
  type ExperimentInput,
  type PartialExperimentInput,
} from "./schema.js";
import type {
  ExperimentConfig,
  FailurePolicy,
  IndexedExperiment,
  LaunchEnvironment,
  LauncherSettings,
  SweepFile,
} from "./types.js";

export const DEFAULT_LAUNCHER_COMMAND = "torchrun";
export const DEFAULT_RENDEZVOUS_BACKEND = "c10d";
export const DEFAULT_KILL_GRACE_MS = 10_000;
export const DEFAULT_FAILURE_POLICY: FailurePolicy = "abort";

export type SweepOverrides = {
  systemId?: string;
  failurePolicy?: FailurePolicy;
  timeoutMs?: number;
  logDir?: string;
};

function collectIssues(schema: TSchema, value: unknown, prefix = ""): ConfigIssue[] {
  return [...Value.Errors(schema, value)].map((error) => ({
    path: `${prefix}${error.path}`,
    message: error.message,
  }));
}

function readString(value: string | undefined): string | undefined {
  if (value == null) {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readStringArray(value: string[] | undefined): string[] {
  return (value ?? []).map((entry) => entry.trim()).filter((entry) => entry.length > 0);
}

export function parseFanouts(value: number[] | string): number[] {
  if (Array.isArray(value)) {
    return [...value];
  }
  return value.split(",").map((entry) => Number.parseInt(entry.trim(), 10));
}

function normalizeExperiment(
  input: ExperimentInput,
  pointer: string,
  issues: ConfigIssue[],
): ExperimentConfig | undefined {
  const issueCount = issues.length;
  const dataset = readString(input.dataset);
  const dataDir = readString(input.dataDir);
  if (!dataset) {
    issues.push({ path: `${pointer}/dataset`, message: "must not be blank" });
  }
  if (!dataDir) {
    issues.push({ path: `${pointer}/dataDir`, message: "must not be blank" });
  }
  const explicitName = readString(input.artifactName);
  if (input.artifactName != null && !explicitName) {
    issues.push({ path: `${pointer}/artifactName`, message: "must not be blank" });
  }
  const fanouts = parseFanouts(input.fanouts);
  if (fanouts.some((fanout) => !Number.isSafeInteger(fanout))) {
    issues.push({
      path: `${pointer}/fanouts`,
      message: `values must not exceed ${Number.MAX_SAFE_INTEGER}`,
    });
  }
  if (!dataset || !dataDir || issues.length > issueCount) {
    return undefined;
  }

  const config: ExperimentConfig = {
    dataset,
    fanouts: Object.freeze(fanouts),
    model: input.model,
    hiddenSize: input.hiddenSize,
    epochs: input.epochs,
    dataDir,
    hosts: input.hosts,
    acceleratorsPerHost: input.acceleratorsPerHost,
    artifactName: explicitName,
    numLayers: input.numLayers,
    batchSize: input.batchSize,
    sampleMode: input.sampleMode,
    lr: input.lr,
    weightDecay: input.weightDecay,
    dropout: input.dropout,
    numHead: input.numHead,
    numPartition: input.numPartition,
    evaluate: input.evaluate,
  };
  return Object.freeze(config);
}

function mergeExperiment(
  defaults: PartialExperimentInput | undefined,
  entry: PartialExperimentInput,
): PartialExperimentInput {
  return { ...defaults, ...entry };
}

/**
 * Validates a decoded sweep file and resolves it into an immutable sweep.
 * Every structural problem is reported at once through SweepConfigError,
 * together with the topology, fanout and naming violations of the entries
 * that did parse.
 */
export function parseSweepFile(
  value: unknown,
  options: { source?: string; baseDir?: string; overrides?: SweepOverrides } = {},
): SweepFile {
  const source = options.source ?? "sweep file";
  const overrides = options.overrides ?? {};

  if (!Value.Check(SweepFileSchema, value)) {
    throw new SweepConfigError(source, collectIssues(SweepFileSchema, value));
  }

  const issues: ConfigIssue[] = [];

  const systemId = readString(overrides.systemId) ?? readString(value.systemId);
  if (!systemId) {
    issues.push({ path: "/systemId", message: "is required (set it in the file or pass --system-id)" });
  } else {
    const problem = artifactFileNameProblem(systemId);
    if (problem) {
      issues.push({ path: "/systemId", message: problem });
    }
  }

  const parsed: IndexedExperiment[] = [];
  value.experiments.forEach((entry, idx) => {
    const pointer = `/experiments/${idx}`;
    if (!Value.Check(PartialExperimentSchema, entry)) {
      issues.push(...collectIssues(PartialExperimentSchema, entry, pointer));
      return;
    }
    const merged = mergeExperiment(value.defaults, entry);
    if (!Value.Check(ExperimentSchema, merged)) {
      issues.push(...collectIssues(ExperimentSchema, merged, pointer));
      return;
    }
    const config = normalizeExperiment(merged, pointer, issues);
    if (config) {
      parsed.push({ index: idx, config });
    }
  });

  for (const key of Object.keys(value.environment?.vars ?? {})) {
    if (!isValidEnvName(key)) {
      issues.push({ path: `/environment/vars/${key}`, message: "is not a valid environment variable name" });
    }
  }

  const launcherInput = value.launcher;
  const entryPoint = readString(launcherInput.entryPoint);
  if (!entryPoint) {
    issues.push({ path: "/launcher/entryPoint", message: "must not be blank" });
  }

  if (issues.length > 0 || !systemId || !entryPoint) {
    const namingId = systemId && !artifactFileNameProblem(systemId) ? systemId : undefined;
    throw new SweepConfigError(source, issues, validateExperiments(namingId, parsed));
  }

  const baseDir = path.resolve(options.baseDir ?? process.cwd());
  const timeoutMs =
    overrides.timeoutMs ??
    (launcherInput.timeoutMinutes != null ? Math.round(launcherInput.timeoutMinutes * 60_000) : 0);
  const rendezvous = launcherInput.rendezvous
    ? {
        backend: readString(launcherInput.rendezvous.backend) ?? DEFAULT_RENDEZVOUS_BACKEND,
        endpoint: launcherInput.rendezvous.endpoint.trim(),
      }
    : undefined;

  const launcher: LauncherSettings = {
    command: readString(launcherInput.command) ?? DEFAULT_LAUNCHER_COMMAND,
    launcherArgs: readStringArray(launcherInput.launcherArgs),
    entryPoint,
    workDir: path.resolve(baseDir, readString(launcherInput.workDir) ?? "."),
    logDir: readString(overrides.logDir) ?? readString(launcherInput.logDir),
    timeoutMs,
    killGraceMs:
      launcherInput.killGraceSeconds != null
        ? Math.round(launcherInput.killGraceSeconds * 1000)
        : DEFAULT_KILL_GRACE_MS,
    rendezvous,
  };

  const environment: LaunchEnvironment = {
    cudaAllocConf: readString(value.environment?.cudaAllocConf),
    distributedDebug: value.environment?.distributedDebug,
    vars: { ...(value.environment?.vars ?? {}) },
  };

  return {
    sweep: Object.freeze({
      systemId,
      experiments: Object.freeze(parsed.map(({ config }) => config)),
    }),
    failurePolicy: overrides.failurePolicy ?? value.failurePolicy ?? DEFAULT_FAILURE_POLICY,
    launcher,
    environment,
  };
}

export function decodeSweepText(text: string, filePath: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  try {
    return ext === ".yaml" || ext === ".yml" ? parseYaml(text) : JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new SweepConfigError(filePath, [{ path: "", message: `cannot be decoded: ${message}` }]);
  }
}

/** Reads a JSON or YAML sweep file; relative launcher paths resolve against its directory. */
export async function loadSweepFile(filePath: string, overrides?: SweepOverrides): Promise<SweepFile> {
  const resolved = path.resolve(filePath);
  const text = await fs.readFile(resolved, "utf8");
  return parseSweepFile(decodeSweepText(text, resolved), {
    source: filePath,
    baseDir: path.dirname(resolved),
    overrides,
  });
}
