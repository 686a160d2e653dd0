/**
 * heat-pinn - Physics-informed network solver for the 1-D heat equation
 *
 * A small reverse-mode autodiff engine with higher-order derivatives, a
 * fully-connected approximator, the composite PDE/initial/boundary loss,
 * and an L-BFGS training driver.
 */

// Autodiff
export { Tensor, noGrad, withGradMode, isGradEnabled } from './autograd/Tensor.js';
export type { Shape, GradNode, BackwardFn } from './autograd/Tensor.js';
export * as ops from './autograd/Ops.js';
export { grad, backward } from './autograd/Backward.js';
export type { GradOptions, BackwardOptions } from './autograd/Backward.js';
export { derivative } from './autograd/Derivative.js';
export { GradientChecker, formatGradCheckResult } from './autograd/GradientChecker.js';
export type { GradCheckResult, GradCheckError, ScalarFunction } from './autograd/GradientChecker.js';

// Approximator
export { Mlp, Linear } from './nn/Mlp.js';
export type { Approximator, Activation, MlpOptions } from './nn/Mlp.js';
export { initializeMlp, xavierNormal, xavierStd, fillConstant } from './nn/Initializer.js';
export type { InitializerOptions } from './nn/Initializer.js';
export { Random } from './nn/Random.js';
export { exportParameters, loadParameters, restoreMlp } from './nn/Serialization.js';
export type { SerializedNetwork, SerializedTensor } from './nn/Serialization.js';

// Heat equation
export {
  prepareBatch,
  initialCondition,
  neumannCurve,
  TWO_PI
} from './pinn/HeatProblem.js';
export type { HeatBatch, HeatTrainingData, NeumannMode } from './pinn/HeatProblem.js';
export { heatResidual, evaluateAt } from './pinn/Residual.js';
export { HeatLoss, summarizeLoss } from './pinn/Loss.js';
export type { LossTerms, LossBreakdown, LossWeights, BoundaryLoss } from './pinn/Loss.js';
export { sampleHeatData, halton2d, radicalInverse, uniformSamples } from './pinn/Sampling.js';
export type { SamplingOptions } from './pinn/Sampling.js';

// Optimization
export { minimizeLbfgs, cubicInterpolate } from './optim/LBFGS.js';
export type {
  Objective,
  Evaluation,
  LbfgsOptions,
  LbfgsResult,
  LbfgsStatus,
  LbfgsReason,
  LineSearch
} from './optim/LBFGS.js';
export { Trainer } from './optim/Trainer.js';
export type {
  TrainerOptions,
  TrainerState,
  TrainingResult,
  ProgressRecord,
  CheckpointRecord
} from './optim/Trainer.js';
export { flattenParameters, writeParameters, gatherGradients } from './optim/Parameters.js';

// Configuration and wiring
export { DEFAULT_CONFIG, resolveConfig } from './Config.js';
export type { HeatPinnConfig } from './Config.js';
export { createHeatSolver } from './Solver.js';
export type { HeatSolver, SolverHooks } from './Solver.js';

// Errors
export {
  GraphViolationError,
  ShapeMismatchError,
  NumericalInstabilityError,
  ConfigError,
  TrainingAbortedError,
  formatTrainingError
} from './Errors.js';
