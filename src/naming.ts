import { DuplicateArtifactNameError, InvalidArtifactNameError } from "./errors.js";
import { artifactFileNameProblem } from "./paths.js";
import type { ExperimentConfig, IndexedExperiment, SweepSpecification } from "./types.js";

export const ARTIFACT_EXTENSION = ".json";

export function deriveArtifactName(
  systemId: string,
  config: Pick<ExperimentConfig, "dataset" | "hiddenSize" | "hosts">,
): string {
  return `${systemId}-${config.dataset}-h${config.hiddenSize}-n${config.hosts}${ARTIFACT_EXTENSION}`;
}

export function artifactName(systemId: string, config: ExperimentConfig): string {
  return config.artifactName ?? deriveArtifactName(systemId, config);
}

export function assertArtifactFileName(name: string, index?: number): void {
  const problem = artifactFileNameProblem(name);
  if (problem) {
    throw new InvalidArtifactNameError(name, problem, index);
  }
}

export type UniquenessCheck =
  | { ok: true }
  | { ok: false; errors: DuplicateArtifactNameError[] };

export function findDuplicateArtifactNames(
  systemId: string,
  entries: readonly IndexedExperiment[],
): DuplicateArtifactNameError[] {
  const byName = new Map<string, number[]>();
  for (const { index, config } of entries) {
    const name = artifactName(systemId, config);
    const seen = byName.get(name);
    if (seen) {
      seen.push(index);
    } else {
      byName.set(name, [index]);
    }
  }

  return Array.from(byName.entries())
    .filter(([, indices]) => indices.length > 1)
    .map(([name, indices]) => new DuplicateArtifactNameError(name, indices));
}

export function validateUniqueness(sweep: SweepSpecification): UniquenessCheck {
  const errors = findDuplicateArtifactNames(
    sweep.systemId,
    sweep.experiments.map((config, index) => ({ index, config })),
  );
  return errors.length === 0 ? { ok: true } : { ok: false, errors };
}
