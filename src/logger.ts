import type { SweepLogger } from "./types.js";

export type TextSink = {
  write: (chunk: string) => unknown;
};

export function createStreamLogger(
  sink: TextSink,
  options: { quiet?: boolean; verbose?: boolean } = {},
): SweepLogger {
  const line = (level: string, message: string) => {
    sink.write(`${level} ${message}\n`);
  };
  return {
    info: (message) => {
      if (!options.quiet) {
        line("info ", message);
      }
    },
    warn: (message) => line("warn ", message),
    error: (message) => line("error", message),
    debug: options.verbose ? (message) => line("debug", message) : undefined,
  };
}
