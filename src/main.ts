#!/usr/bin/env node
import { EXIT_INTERNAL, runCli } from "./cli.js";
import { toErrorText } from "./errors.js";

const controller = new AbortController();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    process.stderr.write(`gnn-sweep: ${signal} received, stopping the current run\n`);
    controller.abort();
  });
}

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`gnn-sweep: ${toErrorText(error)}\n`);
    process.exitCode = EXIT_INTERNAL;
  });
