import { Type, type Static } from "@sinclair/typebox";

const ModelFamilySchema = Type.Union(
  [Type.Literal("sage"), Type.Literal("gcn"), Type.Literal("gat")],
  { description: "Model family" },
);

const SampleModeSchema = Type.Union([Type.Literal("gpu"), Type.Literal("uva"), Type.Literal("cpu")]);

const DistributedDebugSchema = Type.Union([
  Type.Literal("OFF"),
  Type.Literal("INFO"),
  Type.Literal("DETAIL"),
]);

export const FailurePolicySchema = Type.Union([Type.Literal("abort"), Type.Literal("continue")]);

const FANOUT_LIST_PATTERN = "^\\s*[1-9]\\d*(\\s*,\\s*[1-9]\\d*)*\\s*$";

export const ExperimentSchema = Type.Object(
  {
    dataset: Type.String({ minLength: 1, description: "Graph dataset identifier" }),
    fanouts: Type.Union([
      Type.Array(Type.Integer({ minimum: 1 }), { minItems: 1 }),
      Type.String({ pattern: FANOUT_LIST_PATTERN }),
    ]),
    model: ModelFamilySchema,
    hiddenSize: Type.Integer({ minimum: 1 }),
    epochs: Type.Integer({ minimum: 1 }),
    dataDir: Type.String({ minLength: 1 }),
    // Range is checked by the topology resolver so it can be batch-reported.
    hosts: Type.Integer(),
    acceleratorsPerHost: Type.Integer(),
    artifactName: Type.Optional(Type.String({ minLength: 1 })),
    numLayers: Type.Optional(Type.Integer({ minimum: 1 })),
    batchSize: Type.Optional(Type.Integer({ minimum: 1 })),
    sampleMode: Type.Optional(SampleModeSchema),
    lr: Type.Optional(Type.Number({ exclusiveMinimum: 0 })),
    weightDecay: Type.Optional(Type.Number({ minimum: 0 })),
    dropout: Type.Optional(Type.Number({ minimum: 0, exclusiveMaximum: 1 })),
    numHead: Type.Optional(Type.Integer({ minimum: 1 })),
    numPartition: Type.Optional(Type.Integer({ minimum: 1 })),
    evaluate: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false },
);

export const PartialExperimentSchema = Type.Partial(ExperimentSchema);

export const LauncherSchema = Type.Object(
  {
    command: Type.Optional(Type.String({ minLength: 1 })),
    entryPoint: Type.String({ minLength: 1, description: "Training script handed to the launcher" }),
    launcherArgs: Type.Optional(Type.Array(Type.String())),
    workDir: Type.Optional(Type.String({ minLength: 1 })),
    logDir: Type.Optional(Type.String({ minLength: 1 })),
    timeoutMinutes: Type.Optional(Type.Number({ minimum: 0 })),
    killGraceSeconds: Type.Optional(Type.Number({ minimum: 0 })),
    rendezvous: Type.Optional(
      Type.Object(
        {
          backend: Type.Optional(Type.String({ minLength: 1 })),
          endpoint: Type.String({ minLength: 1 }),
        },
        { additionalProperties: false },
      ),
    ),
  },
  { additionalProperties: false },
);

export const EnvironmentSchema = Type.Object(
  {
    cudaAllocConf: Type.Optional(Type.String()),
    distributedDebug: Type.Optional(DistributedDebugSchema),
    vars: Type.Optional(Type.Record(Type.String(), Type.String())),
  },
  { additionalProperties: false },
);

export const SweepFileSchema = Type.Object(
  {
    systemId: Type.Optional(Type.String()),
    failurePolicy: Type.Optional(FailurePolicySchema),
    launcher: LauncherSchema,
    environment: Type.Optional(EnvironmentSchema),
    defaults: Type.Optional(PartialExperimentSchema),
    // Entries are checked one by one so a bad entry does not hide the others.
    experiments: Type.Array(Type.Unknown(), { minItems: 1 }),
  },
  { additionalProperties: false },
);

export type ExperimentInput = Static<typeof ExperimentSchema>;
export type PartialExperimentInput = Static<typeof PartialExperimentSchema>;
