import { describe, expect, it } from "vitest";
import { buildLaunchInvocation } from "./launcher.js";
import { renderSweepScript, type ScriptEntry } from "./script.js";
import { resolveTopology } from "./topology.js";
import type { ExperimentConfig, LaunchEnvironment, LauncherSettings } from "./types.js";

const environment: LaunchEnvironment = {
  cudaAllocConf: "expandable_segments:False",
  distributedDebug: "DETAIL",
  vars: {},
};

function entry(
  config: Partial<ExperimentConfig>,
  artifactName: string,
  settings: Partial<LauncherSettings> = {},
): ScriptEntry {
  const full: ExperimentConfig = {
    dataset: "orkut",
    fanouts: [10, 10, 10],
    model: "sage",
    hiddenSize: 512,
    epochs: 10,
    dataDir: "/mnt",
    hosts: 1,
    acceleratorsPerHost: 4,
    ...config,
  };
  return {
    config: full,
    invocation: buildLaunchInvocation({
      config: full,
      topology: resolveTopology(full.hosts, full.acceleratorsPerHost),
      settings: {
        command: "torchrun",
        launcherArgs: [],
        entryPoint: "train_quiver_p2p.py",
        workDir: "/work",
        timeoutMs: 0,
        killGraceMs: 10_000,
        ...settings,
      },
      environment,
      artifactName,
    }),
  };
}

const ENV_PREFIX =
  "env PYTORCH_CUDA_ALLOC_CONF=expandable_segments:False TORCH_DISTRIBUTED_DEBUG=DETAIL GNN_SWEEP_TOTAL_WORKERS=4";

describe("sweep script rendering", () => {
  it("renders a fail-fast script under the abort policy", () => {
    const script = renderSweepScript({
      systemId: "quiver-p2p",
      policy: "abort",
      entries: [
        entry({}, "quiver-p2p-orkut-h512-n1.json"),
        entry(
          { dataset: "ogbn-papers100M", fanouts: [10, 10], numLayers: 2, hiddenSize: 128 },
          "quiver-p2p-ogbn-papers100M-h128-n1.json",
        ),
      ],
    });

    expect(script.split("\n")).toEqual([
      "#!/bin/bash",
      "# gnn-sweep: quiver-p2p (2 runs)",
      "set -euo pipefail",
      "",
      "# [1/2] orkut -> quiver-p2p-orkut-h512-n1.json",
      "cd /work",
      `${ENV_PREFIX} torchrun --nnodes 1 --nproc-per-node 4 train_quiver_p2p.py --num_host 1 --num_gpu_per_host 4 --data_dir /mnt --graph_name orkut --fanouts 10,10,10 --model sage --hid_size 512 --log_file quiver-p2p-orkut-h512-n1.json --num_epoch 10`,
      "",
      "# [2/2] ogbn-papers100M -> quiver-p2p-ogbn-papers100M-h128-n1.json",
      "cd /work",
      `${ENV_PREFIX} torchrun --nnodes 1 --nproc-per-node 4 train_quiver_p2p.py --num_host 1 --num_gpu_per_host 4 --data_dir /mnt --graph_name ogbn-papers100M --fanouts 10,10 --model sage --hid_size 128 --log_file quiver-p2p-ogbn-papers100M-h128-n1.json --num_epoch 10 --num_layers 2`,
      "",
    ]);
  });

  it("counts failures and exits non-zero under the continue policy", () => {
    const script = renderSweepScript({
      systemId: "quiver-p2p",
      policy: "continue",
      entries: [entry({}, "quiver-p2p-orkut-h512-n1.json")],
    });
    const lines = script.split("\n");

    expect(lines.slice(0, 5)).toEqual([
      "#!/bin/bash",
      "# gnn-sweep: quiver-p2p (1 run)",
      "set -uo pipefail",
      "",
      "failed=0",
    ]);
    expect(lines[8]).toMatch(/ --num_epoch 10 \|\| failed=\$\(\(failed \+ 1\)\)$/);
    expect(lines.slice(-6)).toEqual([
      "",
      'if [ "$failed" -gt 0 ]; then',
      '  echo "gnn-sweep: $failed run(s) failed" >&2',
      "  exit 1",
      "fi",
      "",
    ]);
  });

  it("creates the log directory and quotes unsafe paths", () => {
    const script = renderSweepScript({
      systemId: "sys",
      policy: "abort",
      entries: [entry({ dataDir: "/data/my graphs" }, "sys-orkut-h512-n1.json", { workDir: "/work dir", logDir: "logs" })],
    });
    const lines = script.split("\n");

    expect(lines[5]).toBe("cd '/work dir'");
    expect(lines[6]).toBe("mkdir -p '/work dir/logs'");
    expect(lines[7]).toContain(" --data_dir '/data/my graphs' ");
    expect(lines[7]).toContain(" --log_file logs/sys-orkut-h512-n1.json ");
  });

  it("refuses an empty sweep", () => {
    expect(() => renderSweepScript({ systemId: "sys", policy: "abort", entries: [] })).toThrow(
      "At least one entry is required to render a sweep script",
    );
  });
});
