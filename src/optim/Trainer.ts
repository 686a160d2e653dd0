/**
 * Training driver: runs L-BFGS over the approximator's parameters
 *
 * Each call to evaluate() writes the requested point into the parameters,
 * builds a fresh graph for the combined loss, back-propagates it (releasing
 * the graph) and returns loss and flat gradient. Parameters are written
 * nowhere else, so every parameter state the optimizer moves through has its
 * gradient computed in the same evaluation.
 */

import { NumericalInstabilityError, TrainingAbortedError } from '../Errors.js';
import { backward } from '../autograd/Backward.js';
import type { Approximator } from '../nn/Mlp.js';
import type { HeatBatch } from '../pinn/HeatProblem.js';
import { HeatLoss, summarizeLoss } from '../pinn/Loss.js';
import type { LossBreakdown } from '../pinn/Loss.js';
import { minimizeLbfgs } from './LBFGS.js';
import type { Evaluation, LbfgsIterate, LbfgsReason, LineSearch, Objective } from './LBFGS.js';
import { flattenParameters, gatherGradients, writeParameters } from './Parameters.js';

export type TrainerState = 'idle' | 'evaluating' | 'converged' | 'budget-exhausted' | 'failed';

export interface ProgressRecord {
  evaluation: number;
  loss: number;
}

export interface CheckpointRecord {
  evaluation: number;
  loss: number;
  parameters: Float64Array;
}

export interface TrainerOptions {
  /** L-BFGS iterations (default: 500) */
  maxIterations?: number;

  /** Loss evaluations, line search included (default: 1.25 x maxIterations) */
  maxEvaluations?: number;

  /** Gradient max-norm tolerance (default: 1e-7) */
  toleranceGrad?: number;

  /** Loss/step change tolerance (default: 1e-9) */
  toleranceChange?: number;

  /** L-BFGS history size (default: 50) */
  historySize?: number;

  /** Line search (default: 'strong-wolfe') */
  lineSearch?: LineSearch;

  /** L-BFGS step length (default: 1) */
  lr?: number;

  /** Report every N evaluations (default: 50) */
  logEvery?: number;

  /** Wall-clock ceiling in milliseconds; 0 disables it (default: 0) */
  maxDurationMs?: number;

  /** Hand a parameter snapshot to onCheckpoint every N evaluations; 0 disables it (default: 0) */
  checkpointEvery?: number;

  /** Print progress and warnings to the console */
  verbose?: boolean;

  onProgress?: (record: ProgressRecord) => void;
  onCheckpoint?: (record: CheckpointRecord) => void;
}

export interface TrainingResult {
  status: 'converged' | 'budget-exhausted';
  reason: LbfgsReason;
  iterations: number;
  evaluations: number;
  loss: number;
  breakdown: LossBreakdown;
  history: ProgressRecord[];
  nonFiniteEvaluations: number;
  durationMs: number;
}

interface AcceptedPoint {
  x: Float64Array;
  loss: number;
}

function allFinite(values: Float64Array): boolean {
  for (let i = 0; i < values.length; i++) {
    if (!Number.isFinite(values[i])) return false;
  }
  return true;
}

export class Trainer implements Objective {
  private readonly options: TrainerOptions;
  private currentState: TrainerState = 'idle';
  private evaluationCount = 0;
  private nonFiniteCount = 0;
  private accepted: AcceptedPoint | null = null;
  private readonly reported: ProgressRecord[] = [];

  constructor(
    readonly net: Approximator,
    readonly batch: HeatBatch,
    readonly lossFn: HeatLoss = new HeatLoss(),
    options: TrainerOptions = {}
  ) {
    this.options = options;
  }

  get state(): TrainerState {
    return this.currentState;
  }

  /** Evaluations performed by this trainer since it was created */
  get evaluations(): number {
    return this.evaluationCount;
  }

  get history(): readonly ProgressRecord[] {
    return this.reported;
  }

  /**
   * Loss and gradient at x. Non-finite results are counted and reported and
   * handed to the line search; before any point has been accepted (the
   * starting point of a run) they are fatal.
   */
  evaluate(x: Float64Array): Evaluation {
    const params = this.net.parameters();
    writeParameters(params, x);
    for (const p of params) p.zeroGrad();

    const terms = this.lossFn.evaluate(this.net, this.batch);
    backward(terms.total, { inputs: params });
    const gradient = gatherGradients(params);
    const loss = terms.total.item();

    this.evaluationCount++;
    const evaluation = this.evaluationCount;

    if (!Number.isFinite(loss) || !allFinite(gradient)) {
      this.nonFiniteCount++;
      if (this.accepted === null) {
        throw new NumericalInstabilityError('loss or gradient is not finite at the starting point', 'loss', loss);
      }
      if (this.options.verbose) {
        console.warn(`[trainer] Non-finite loss or gradient at evaluation ${evaluation} (loss=${loss}); the line search will reject this step`);
      }
    }

    const logEvery = this.options.logEvery ?? 50;
    if (logEvery > 0 && evaluation % logEvery === 0) {
      const record = { evaluation, loss };
      this.reported.push(record);
      this.options.onProgress?.(record);
      if (this.options.verbose) {
        console.log(`[trainer] eval ${evaluation}: loss=${loss.toExponential(6)}`);
      }
    }

    const checkpointEvery = this.options.checkpointEvery ?? 0;
    if (checkpointEvery > 0 && evaluation % checkpointEvery === 0 && this.options.onCheckpoint && this.accepted) {
      this.options.onCheckpoint({ evaluation, loss: this.accepted.loss, parameters: this.accepted.x.slice() });
    }

    return { loss, gradient };
  }

  /**
   * Run the optimizer to convergence or budget exhaustion. Errors abort the
   * run with TrainingAbortedError, leaving the parameters at the last point
   * the optimizer accepted (the starting point if it accepted none).
   */
  train(): TrainingResult {
    if (this.currentState === 'evaluating') {
      throw new Error('Trainer is already running');
    }

    const params = this.net.parameters();
    const started = Date.now();
    const maxIterations = this.options.maxIterations ?? 500;
    const maxDurationMs = this.options.maxDurationMs ?? 0;
    const startEvaluations = this.evaluationCount;
    const start = flattenParameters(params);
    this.resetAccepted();
    this.currentState = 'evaluating';

    if (this.options.verbose) {
      console.log(`[trainer] Training ${flattenParameters(params).length} parameters for up to ${maxIterations} iterations`);
    }

    try {
      const result = minimizeLbfgs(this, start, {
        lr: this.options.lr,
        maxIterations,
        maxEvaluations: this.options.maxEvaluations,
        toleranceGrad: this.options.toleranceGrad,
        toleranceChange: this.options.toleranceChange,
        historySize: this.options.historySize ?? 50,
        lineSearch: this.options.lineSearch,
        shouldStop: maxDurationMs > 0 ? () => Date.now() - started >= maxDurationMs : undefined,
        onIterate: iterate => this.accept(iterate)
      });

      if (!Number.isFinite(result.loss) || !allFinite(result.x)) {
        throw new NumericalInstabilityError('optimizer ended on a non-finite point', 'loss', result.loss);
      }

      writeParameters(params, result.x);
      this.currentState = result.status;

      const trainingResult: TrainingResult = {
        status: result.status,
        reason: result.reason,
        iterations: result.iterations,
        evaluations: this.evaluationCount - startEvaluations,
        loss: result.loss,
        breakdown: this.lossBreakdown(),
        history: [...this.reported],
        nonFiniteEvaluations: this.nonFiniteCount,
        durationMs: Date.now() - started
      };

      if (this.options.verbose) {
        console.log(`[trainer] ${result.status} (${result.reason}) after ${result.iterations} iterations, ${trainingResult.evaluations} evaluations: loss=${result.loss.toExponential(6)}`);
      }
      return trainingResult;
    } catch (err) {
      this.currentState = 'failed';
      writeParameters(params, this.accepted?.x ?? start);
      const message = err instanceof Error ? err.message : String(err);
      throw new TrainingAbortedError(message, this.evaluationCount, this.accepted?.loss ?? null, err);
    }
  }

  private resetAccepted(): void {
    this.accepted = null;
  }

  private accept(iterate: LbfgsIterate): void {
    if (Number.isFinite(iterate.loss) && allFinite(iterate.gradient)) {
      this.accepted = { x: iterate.x.slice(), loss: iterate.loss };
    }
  }

  /**
   * Loss terms at the current parameters. Builds and discards its own graph
   * and does not count as an evaluation.
   */
  lossBreakdown(): LossBreakdown {
    return summarizeLoss(this.lossFn.evaluate(this.net, this.batch));
  }
}
