import path from "node:path";
import { formatCommandLine, shellQuote } from "./shell.js";
import type { ExperimentConfig, FailurePolicy, LaunchInvocation } from "./types.js";

export type ScriptEntry = {
  config: ExperimentConfig;
  invocation: LaunchInvocation;
};

/**
 * Renders the sweep as a standalone bash script, one launch per entry, for
 * hosts where the orchestrator itself cannot run. Each launch carries its own
 * environment through `env`, so nothing is exported globally.
 */
export function renderSweepScript(params: {
  systemId: string;
  policy: FailurePolicy;
  entries: ScriptEntry[];
}): string {
  if (params.entries.length === 0) {
    throw new Error("At least one entry is required to render a sweep script");
  }

  const count = params.entries.length;
  const lines: string[] = [
    "#!/bin/bash",
    `# gnn-sweep: ${params.systemId} (${count} run${count === 1 ? "" : "s"})`,
  ];
  lines.push(params.policy === "abort" ? "set -euo pipefail" : "set -uo pipefail", "");

  if (params.policy === "continue") {
    lines.push("failed=0", "");
  }

  params.entries.forEach(({ config, invocation }, idx) => {
    lines.push(`# [${idx + 1}/${count}] ${config.dataset} -> ${invocation.artifactName}`);
    lines.push(`cd ${shellQuote(invocation.cwd)}`);
    const logDir = path.dirname(invocation.artifactPath);
    if (logDir !== invocation.cwd) {
      lines.push(`mkdir -p ${shellQuote(logDir)}`);
    }
    const command = formatCommandLine(invocation.command, invocation.args, invocation.env);
    lines.push(params.policy === "continue" ? `${command} || failed=$((failed + 1))` : command);
    lines.push("");
  });

  if (params.policy === "continue") {
    lines.push(
      'if [ "$failed" -gt 0 ]; then',
      '  echo "gnn-sweep: $failed run(s) failed" >&2',
      "  exit 1",
      "fi",
    );
  }

  return `${lines.join("\n").trimEnd()}\n`;
}
