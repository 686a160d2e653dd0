/**
 * Solver configuration: defaults and validation
 */

import { ConfigError } from './Errors.js';
import type { Activation } from './nn/Mlp.js';
import type { LineSearch } from './optim/LBFGS.js';
import type { NeumannMode } from './pinn/HeatProblem.js';

export interface HeatPinnConfig {
  /** End of the time interval */
  tMax?: number;
  nCollocation?: number;
  nInitial?: number;
  nBoundary?: number;

  hiddenWidth?: number;
  hiddenLayers?: number;
  activation?: Activation;
  biasInit?: number;

  /** Seed for initialization and uniform sampling */
  seed?: number;

  /** Neumann formulation (see pinn/HeatProblem.ts) */
  neumann?: NeumannMode;

  maxIterations?: number;
  /** 0 means 1.25 x maxIterations */
  maxEvaluations?: number;
  historySize?: number;
  toleranceGrad?: number;
  toleranceChange?: number;
  lineSearch?: LineSearch;
  lr?: number;

  logEvery?: number;
  /** 0 disables the wall-clock ceiling */
  maxDurationMs?: number;
  /** 0 disables checkpoints */
  checkpointEvery?: number;
}

export const DEFAULT_CONFIG: Required<HeatPinnConfig> = {
  tMax: 1,
  nCollocation: 2000,
  nInitial: 100,
  nBoundary: 100,
  hiddenWidth: 100,
  hiddenLayers: 5,
  activation: 'tanh',
  biasInit: 0.01,
  seed: 42,
  neumann: 'curve',
  maxIterations: 500,
  maxEvaluations: 0,
  historySize: 50,
  toleranceGrad: 1e-7,
  toleranceChange: 1e-9,
  lineSearch: 'strong-wolfe',
  lr: 1,
  logEvery: 50,
  maxDurationMs: 0,
  checkpointEvery: 0
};

const POSITIVE_INTEGERS = [
  'nCollocation',
  'nInitial',
  'nBoundary',
  'hiddenWidth',
  'hiddenLayers',
  'maxIterations',
  'historySize'
] as const;

const NON_NEGATIVE_INTEGERS = [
  'maxEvaluations',
  'logEvery',
  'maxDurationMs',
  'checkpointEvery'
] as const;

const POSITIVE_NUMBERS = ['tMax', 'toleranceGrad', 'toleranceChange', 'lr'] as const;

function requireChoice<T extends string>(key: string, value: string, choices: readonly T[]): void {
  if (!choices.some(choice => choice === value)) {
    throw new ConfigError(`must be one of ${choices.join(', ')}`, key, value);
  }
}

/**
 * Merge overrides onto the defaults and validate the result
 */
export function resolveConfig(overrides: HeatPinnConfig = {}): Required<HeatPinnConfig> {
  const config: Required<HeatPinnConfig> = { ...DEFAULT_CONFIG };
  for (const [key, value] of Object.entries(overrides)) {
    if (!(key in DEFAULT_CONFIG)) {
      throw new ConfigError('unknown option', key);
    }
    if (value === undefined) continue;
    Object.assign(config, { [key]: value });
  }

  for (const key of POSITIVE_INTEGERS) {
    const value = config[key];
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError('must be a positive integer', key, value);
    }
  }
  for (const key of NON_NEGATIVE_INTEGERS) {
    const value = config[key];
    if (!Number.isInteger(value) || value < 0) {
      throw new ConfigError('must be a non-negative integer', key, value);
    }
  }
  for (const key of POSITIVE_NUMBERS) {
    const value = config[key];
    if (!Number.isFinite(value) || value <= 0) {
      throw new ConfigError('must be a positive number', key, value);
    }
  }
  if (!Number.isFinite(config.biasInit)) {
    throw new ConfigError('must be a finite number', 'biasInit', config.biasInit);
  }
  if (!Number.isInteger(config.seed)) {
    throw new ConfigError('must be an integer', 'seed', config.seed);
  }

  requireChoice('activation', config.activation, ['tanh', 'sin']);
  requireChoice('neumann', config.neumann, ['curve', 'fixed']);
  requireChoice('lineSearch', config.lineSearch, ['strong-wolfe', 'none']);

  return config;
}
