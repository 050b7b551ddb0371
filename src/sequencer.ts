import {
  ConfigMismatchError,
  InvalidArtifactNameError,
  InvalidTopologyError,
  type SweepValidationError,
} from "./errors.js";
import type { JobLauncher } from "./launcher.js";
import { artifactName, assertArtifactFileName, findDuplicateArtifactNames } from "./naming.js";
import { checkFanoutSchedule, resolveExperimentTopology } from "./topology.js";
import type {
  FailurePolicy,
  IndexedExperiment,
  RunResult,
  SweepLogger,
  SweepOutcome,
  SweepResult,
  SweepSpecification,
  SweepState,
} from "./types.js";

function isValidationError(error: unknown): error is SweepValidationError {
  return (
    error instanceof InvalidTopologyError ||
    error instanceof ConfigMismatchError ||
    error instanceof InvalidArtifactNameError
  );
}

/**
 * Checks the given entries and returns all violations, in sweep order, followed
 * by the artifact-name collisions. Errors carry each entry's own index. Without
 * a system identifier the artifact names cannot be derived, so only topology
 * and fanouts are checked.
 */
export function validateExperiments(
  systemId: string | undefined,
  entries: readonly IndexedExperiment[],
): SweepValidationError[] {
  const errors: SweepValidationError[] = [];

  const attempt = (fn: () => void) => {
    try {
      fn();
    } catch (err) {
      if (!isValidationError(err)) {
        throw err;
      }
      errors.push(err);
    }
  };

  for (const { index, config } of entries) {
    attempt(() => resolveExperimentTopology(config, index));
    attempt(() => checkFanoutSchedule(config, index));
    if (systemId != null) {
      const name = artifactName(systemId, config);
      attempt(() => assertArtifactFileName(name, index));
    }
  }

  if (systemId != null) {
    errors.push(...findDuplicateArtifactNames(systemId, entries));
  }
  return errors;
}

/** Checks every entry before anything is launched. */
export function validateSweep(sweep: SweepSpecification): SweepValidationError[] {
  return validateExperiments(
    sweep.systemId,
    sweep.experiments.map((config, index) => ({ index, config })),
  );
}

function isFailure(result: RunResult): boolean {
  return result.status !== "success";
}

export type RunSequencerParams = {
  launcher: Pick<JobLauncher, "launch">;
  logger?: SweepLogger;
  now?: () => Date;
};

export type SequencerRunOptions = {
  signal?: AbortSignal;
};

export class RunSequencer {
  private readonly launcher: Pick<JobLauncher, "launch">;
  private readonly logger?: SweepLogger;
  private readonly now: () => Date;
  private currentState: SweepState = "idle";

  constructor(params: RunSequencerParams) {
    this.launcher = params.launcher;
    this.logger = params.logger;
    this.now = params.now ?? (() => new Date());
  }

  get state(): SweepState {
    return this.currentState;
  }

  async run(
    sweep: SweepSpecification,
    policy: FailurePolicy,
    options: SequencerRunOptions = {},
  ): Promise<SweepResult> {
    if (this.currentState === "validating" || this.currentState === "running") {
      throw new Error("RunSequencer is already running a sweep");
    }

    const started = this.now();
    const total = sweep.experiments.length;
    const results: RunResult[] = [];

    const summarize = (
      outcome: SweepOutcome,
      validationErrors: SweepValidationError[] = [],
    ): SweepResult => {
      const finished = this.now();
      const succeeded = results.filter((result) => !isFailure(result)).length;
      return {
        outcome,
        policy,
        systemId: sweep.systemId,
        total,
        attempted: results.length,
        succeeded,
        failed: results.length - succeeded,
        notAttempted: total - results.length,
        results: [...results],
        validationErrors,
        startedAt: started.toISOString(),
        finishedAt: finished.toISOString(),
        durationMs: Math.max(0, finished.getTime() - started.getTime()),
      };
    };

    this.currentState = "validating";
    let validationErrors: SweepValidationError[];
    try {
      validationErrors = validateSweep(sweep);
    } catch (err) {
      this.currentState = "idle";
      throw err;
    }
    if (validationErrors.length > 0) {
      this.currentState = "validation_failed";
      this.logger?.error(
        `[gnn-sweep] sweep rejected with ${validationErrors.length} problem${
          validationErrors.length === 1 ? "" : "s"
        }; nothing was launched`,
      );
      for (const error of validationErrors) {
        this.logger?.error(`[gnn-sweep]   ${error.message}`);
      }
      return summarize("validation_failed", validationErrors);
    }

    this.currentState = "running";
    let outcome: SweepOutcome = "completed";
    try {
      for (const [idx, config] of sweep.experiments.entries()) {
        if (options.signal?.aborted) {
          outcome = "cancelled";
          break;
        }

        const topology = resolveExperimentTopology(config, idx);
        const name = artifactName(sweep.systemId, config);
        this.logger?.info(
          `[gnn-sweep] [${idx + 1}/${total}] ${config.dataset} ${config.model} h${config.hiddenSize}: ${topology.nodes} node${
            topology.nodes === 1 ? "" : "s"
          } x ${topology.workersPerNode} worker${topology.workersPerNode === 1 ? "" : "s"} -> ${name}`,
        );

        const result = await this.launcher.launch(config, topology, {
          index: idx,
          artifactName: name,
          signal: options.signal,
        });
        results.push(result);

        if (result.status === "cancelled") {
          this.logger?.warn(`[gnn-sweep] [${idx + 1}/${total}] cancelled`);
          outcome = "cancelled";
          break;
        }
        if (isFailure(result)) {
          this.logger?.warn(
            `[gnn-sweep] [${idx + 1}/${total}] ${result.status}${result.error ? `: ${result.error}` : ""}`,
          );
          if (policy === "abort") {
            outcome = idx + 1 < total ? "partial" : "completed";
            break;
          }
          continue;
        }
        this.logger?.info(
          `[gnn-sweep] [${idx + 1}/${total}] finished in ${(result.durationMs / 1000).toFixed(1)}s`,
        );
      }
    } finally {
      this.currentState = "done";
    }

    const summary = summarize(outcome);
    this.logger?.info(
      `[gnn-sweep] ${summary.outcome}: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.notAttempted} not attempted`,
    );
    return summary;
  }
}
