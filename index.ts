export {
  DEFAULT_FAILURE_POLICY,
  DEFAULT_LAUNCHER_COMMAND,
  loadSweepFile,
  parseSweepFile,
  type SweepOverrides,
} from "./src/config.js";
export {
  ConfigMismatchError,
  DuplicateArtifactNameError,
  InvalidArtifactNameError,
  InvalidTopologyError,
  SweepConfigError,
  SweepError,
  type SweepValidationError,
} from "./src/errors.js";
export { defaultCommandRunner } from "./src/exec.js";
export { JobLauncher, buildLaunchInvocation, type JobLauncherParams } from "./src/launcher.js";
export { createStreamLogger } from "./src/logger.js";
export {
  artifactName,
  deriveArtifactName,
  findDuplicateArtifactNames,
  validateUniqueness,
} from "./src/naming.js";
export { renderSweepScript } from "./src/script.js";
export {
  RunSequencer,
  validateExperiments,
  validateSweep,
  type RunSequencerParams,
} from "./src/sequencer.js";
export { checkFanoutSchedule, expectedHops, resolveTopology } from "./src/topology.js";
export { runCli, exitCodeFor } from "./src/cli.js";
export type * from "./src/types.js";
