import { describe, expect, it } from "vitest";
import { DuplicateArtifactNameError, InvalidArtifactNameError } from "./errors.js";
import {
  artifactName,
  assertArtifactFileName,
  deriveArtifactName,
  findDuplicateArtifactNames,
  validateUniqueness,
} from "./naming.js";
import type { ExperimentConfig } from "./types.js";

function experiment(overrides: Partial<ExperimentConfig> = {}): ExperimentConfig {
  return {
    dataset: "orkut",
    fanouts: [10, 10, 10],
    model: "sage",
    hiddenSize: 512,
    epochs: 10,
    dataDir: "/mnt",
    hosts: 1,
    acceleratorsPerHost: 4,
    ...overrides,
  };
}

describe("artifact naming", () => {
  it("derives the log name from system, dataset, hidden size and hosts", () => {
    expect(artifactName("quiver-p2p", experiment())).toBe("quiver-p2p-orkut-h512-n1.json");
    expect(
      deriveArtifactName("quiver-p2p", { dataset: "ogbn-papers100M", hiddenSize: 128, hosts: 2 }),
    ).toBe("quiver-p2p-ogbn-papers100M-h128-n2.json");
  });

  it("is deterministic", () => {
    expect(artifactName("sys", experiment())).toBe(artifactName("sys", experiment()));
  });

  it("changes when any naming input changes", () => {
    const base = artifactName("sys", experiment());
    expect(artifactName("other", experiment())).not.toBe(base);
    expect(artifactName("sys", experiment({ dataset: "reddit" }))).not.toBe(base);
    expect(artifactName("sys", experiment({ hiddenSize: 256 }))).not.toBe(base);
    expect(artifactName("sys", experiment({ hosts: 2 }))).not.toBe(base);
  });

  it("ignores epochs, fanouts and accelerators", () => {
    const base = artifactName("sys", experiment());
    expect(artifactName("sys", experiment({ epochs: 3, fanouts: [5, 5, 5], acceleratorsPerHost: 8 }))).toBe(
      base,
    );
  });

  it("prefers an explicit artifact name", () => {
    expect(artifactName("sys", experiment({ artifactName: "sys-paper-h512-n1.json" }))).toBe(
      "sys-paper-h512-n1.json",
    );
  });

  it("rejects names that are not plain file names", () => {
    expect(() => assertArtifactFileName("../escape.json", 2)).toThrow(InvalidArtifactNameError);
    expect(() => assertArtifactFileName("logs/run.json")).toThrow(/plain file name/);
    expect(() => assertArtifactFileName("with space.json")).toThrow(InvalidArtifactNameError);
    expect(() => assertArtifactFileName("quiver-p2p-orkut-h512-n1.json")).not.toThrow();
  });
});

describe("artifact name uniqueness", () => {
  it("accepts a sweep with distinct names", () => {
    const result = validateUniqueness({
      systemId: "sys",
      experiments: [experiment(), experiment({ hiddenSize: 128 }), experiment({ dataset: "reddit" })],
    });
    expect(result).toEqual({ ok: true });
  });

  it("rejects entries differing only in epochs and fanouts", () => {
    const result = validateUniqueness({
      systemId: "sys",
      experiments: [
        experiment({ epochs: 10, fanouts: [10, 10, 10] }),
        experiment({ epochs: 20, fanouts: [15, 15, 15] }),
      ],
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toBeInstanceOf(DuplicateArtifactNameError);
      expect(result.errors[0]?.artifactName).toBe("sys-orkut-h512-n1.json");
      expect(result.errors[0]?.indices).toEqual([0, 1]);
      expect(result.errors[0]?.message).toBe(
        'artifact name "sys-orkut-h512-n1.json" is produced by experiments [0], [1]',
      );
    }
  });

  it("reports every collision group and every colliding pair", () => {
    const result = validateUniqueness({
      systemId: "sys",
      experiments: [
        experiment(),
        experiment({ dataset: "reddit" }),
        experiment({ epochs: 2 }),
        experiment({ epochs: 3 }),
        experiment({ dataset: "reddit", epochs: 5 }),
      ],
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors.map((error) => error.indices)).toEqual([
        [0, 2, 3],
        [1, 4],
      ]);
      expect(result.errors[0]?.pairs()).toEqual([
        [0, 2],
        [0, 3],
        [2, 3],
      ]);
    }
  });

  it("counts an explicit name colliding with a derived one", () => {
    const result = validateUniqueness({
      systemId: "sys",
      experiments: [experiment(), experiment({ dataset: "reddit", artifactName: "sys-orkut-h512-n1.json" })],
    });
    expect(result.ok).toBe(false);
  });

  it("keeps the caller's indices when checking a subset of entries", () => {
    const errors = findDuplicateArtifactNames("sys", [
      { index: 1, config: experiment() },
      { index: 4, config: experiment({ dataset: "reddit" }) },
      { index: 6, config: experiment({ epochs: 20 }) },
    ]);
    expect(errors).toHaveLength(1);
    expect(errors[0]?.indices).toEqual([1, 6]);
    expect(errors[0]?.pairs()).toEqual([[1, 6]]);
  });
});
