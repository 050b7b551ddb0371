import { ConfigMismatchError, InvalidTopologyError } from "./errors.js";
import type { ClusterTopology, ExperimentConfig, ModelFamily } from "./types.js";

// Hop count each family samples when the entry point runs with its default `--num_layers`.
const DEFAULT_MODEL_HOPS: Record<ModelFamily, number> = {
  sage: 3,
  gcn: 3,
  gat: 3,
};

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 1;
}

export function resolveTopology(hosts: number, acceleratorsPerHost: number): ClusterTopology {
  if (!isPositiveInteger(hosts) || !isPositiveInteger(acceleratorsPerHost)) {
    throw new InvalidTopologyError(hosts, acceleratorsPerHost);
  }
  return {
    nodes: hosts,
    workersPerNode: acceleratorsPerHost,
    totalWorkers: hosts * acceleratorsPerHost,
  };
}

/** An explicit layer count on the experiment wins over the family default. */
export function expectedHops(model: ModelFamily, numLayers?: number): number {
  return numLayers ?? DEFAULT_MODEL_HOPS[model];
}

export function checkFanoutSchedule(
  config: Pick<ExperimentConfig, "model" | "fanouts" | "numLayers">,
  index?: number,
): void {
  const expected = expectedHops(config.model, config.numLayers);
  if (config.fanouts.length !== expected) {
    throw new ConfigMismatchError({
      model: config.model,
      expectedHops: expected,
      actualHops: config.fanouts.length,
      index,
    });
  }
}

export function resolveExperimentTopology(config: ExperimentConfig, index?: number): ClusterTopology {
  try {
    return resolveTopology(config.hosts, config.acceleratorsPerHost);
  } catch (error) {
    if (error instanceof InvalidTopologyError && index != null) {
      throw new InvalidTopologyError(error.hosts, error.acceleratorsPerHost, index);
    }
    throw error;
  }
}
