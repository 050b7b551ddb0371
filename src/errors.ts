export class SweepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

function entryLabel(index: number | undefined): string {
  return index == null ? "" : `experiments[${index}]: `;
}

export class InvalidTopologyError extends SweepError {
  readonly hosts: number;
  readonly acceleratorsPerHost: number;
  readonly index?: number;

  constructor(hosts: number, acceleratorsPerHost: number, index?: number) {
    super(
      `${entryLabel(index)}hosts and acceleratorsPerHost must be positive integers (got hosts=${hosts}, acceleratorsPerHost=${acceleratorsPerHost})`,
    );
    this.hosts = hosts;
    this.acceleratorsPerHost = acceleratorsPerHost;
    this.index = index;
  }
}

export class ConfigMismatchError extends SweepError {
  readonly model: string;
  readonly expectedHops: number;
  readonly actualHops: number;
  readonly index?: number;

  constructor(params: { model: string; expectedHops: number; actualHops: number; index?: number }) {
    super(
      `${entryLabel(params.index)}model "${params.model}" expects ${params.expectedHops} fanout hop${
        params.expectedHops === 1 ? "" : "s"
      }, fanout schedule has ${params.actualHops}`,
    );
    this.model = params.model;
    this.expectedHops = params.expectedHops;
    this.actualHops = params.actualHops;
    this.index = params.index;
  }
}

export class InvalidArtifactNameError extends SweepError {
  readonly artifactName: string;
  readonly index?: number;

  constructor(artifactName: string, reason: string, index?: number) {
    super(`${entryLabel(index)}artifact name "${artifactName}" ${reason}`);
    this.artifactName = artifactName;
    this.index = index;
  }
}

export class DuplicateArtifactNameError extends SweepError {
  readonly artifactName: string;
  readonly indices: number[];

  constructor(artifactName: string, indices: number[]) {
    super(
      `artifact name "${artifactName}" is produced by experiments ${indices
        .map((idx) => `[${idx}]`)
        .join(", ")}`,
    );
    this.artifactName = artifactName;
    this.indices = [...indices];
  }

  /** Every colliding pair of indices, in sweep order. */
  pairs(): Array<[number, number]> {
    const out: Array<[number, number]> = [];
    for (let i = 0; i < this.indices.length; i += 1) {
      for (let j = i + 1; j < this.indices.length; j += 1) {
        const left = this.indices[i];
        const right = this.indices[j];
        if (left != null && right != null) {
          out.push([left, right]);
        }
      }
    }
    return out;
  }
}

export type ConfigIssue = {
  path: string;
  message: string;
};

/**
 * A sweep file that cannot be turned into a sweep. Besides the structural
 * issues it carries the violations found in the entries that did parse, so a
 * single pass reports everything.
 */
export class SweepConfigError extends SweepError {
  readonly issues: ConfigIssue[];
  readonly validationErrors: SweepValidationError[];

  constructor(
    source: string,
    issues: ConfigIssue[],
    validationErrors: SweepValidationError[] = [],
  ) {
    super(
      `${source} is invalid:\n${[
        ...issues.map((issue) => `  ${issue.path || "/"}: ${issue.message}`),
        ...validationErrors.map((error) => `  ${error.message}`),
      ].join("\n")}`,
    );
    this.issues = issues;
    this.validationErrors = validationErrors;
  }
}

export type SweepValidationError =
  | InvalidTopologyError
  | ConfigMismatchError
  | InvalidArtifactNameError
  | DuplicateArtifactNameError;

export function toErrorText(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
