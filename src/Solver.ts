/**
 * Wiring of sampler, approximator, loss and trainer from one configuration
 */

import { resolveConfig } from './Config.js';
import type { HeatPinnConfig } from './Config.js';
import { initializeMlp } from './nn/Initializer.js';
import { Mlp } from './nn/Mlp.js';
import { Random } from './nn/Random.js';
import { prepareBatch } from './pinn/HeatProblem.js';
import type { HeatBatch, HeatTrainingData } from './pinn/HeatProblem.js';
import { HeatLoss } from './pinn/Loss.js';
import type { LossWeights } from './pinn/Loss.js';
import { sampleHeatData } from './pinn/Sampling.js';
import { Trainer } from './optim/Trainer.js';
import type { TrainerOptions } from './optim/Trainer.js';

export interface HeatSolver {
  config: Required<HeatPinnConfig>;
  data: HeatTrainingData;
  batch: HeatBatch;
  net: Mlp;
  trainer: Trainer;
}

export interface SolverHooks {
  /** Training points; sampled from the configuration when omitted */
  data?: HeatTrainingData;
  weights?: LossWeights;
  verbose?: boolean;
  onProgress?: TrainerOptions['onProgress'];
  onCheckpoint?: TrainerOptions['onCheckpoint'];
}

export function createHeatSolver(overrides: HeatPinnConfig = {}, hooks: SolverHooks = {}): HeatSolver {
  const config = resolveConfig(overrides);
  // one stream for sampling, an independent one for weights
  const samplingRandom = new Random(config.seed);
  const initRandom = new Random(config.seed + 1);

  const data = hooks.data ?? sampleHeatData({
    tMax: config.tMax,
    nCollocation: config.nCollocation,
    nInitial: config.nInitial,
    nBoundary: config.nBoundary,
    random: samplingRandom
  });
  const batch = prepareBatch(data, config.neumann);

  const net = new Mlp({
    hiddenWidth: config.hiddenWidth,
    hiddenLayers: config.hiddenLayers,
    activation: config.activation
  });
  initializeMlp(net, { random: initRandom, biasValue: config.biasInit });

  const trainer = new Trainer(net, batch, new HeatLoss(hooks.weights), {
    maxIterations: config.maxIterations,
    maxEvaluations: config.maxEvaluations > 0 ? config.maxEvaluations : undefined,
    toleranceGrad: config.toleranceGrad,
    toleranceChange: config.toleranceChange,
    historySize: config.historySize,
    lineSearch: config.lineSearch,
    lr: config.lr,
    logEvery: config.logEvery,
    maxDurationMs: config.maxDurationMs,
    checkpointEvery: config.checkpointEvery,
    verbose: hooks.verbose,
    onProgress: hooks.onProgress,
    onCheckpoint: hooks.onCheckpoint
  });

  return { config, data, batch, net, trainer };
}
