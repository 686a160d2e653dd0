/**
 * Composite training objective for the heat equation
 */

import { derivative } from '../autograd/Derivative.js';
import { add, mean, scale, square, sub } from '../autograd/Ops.js';
import { Tensor } from '../autograd/Tensor.js';
import type { Approximator } from '../nn/Mlp.js';
import type { HeatBatch } from './HeatProblem.js';
import { evaluateAt, heatResidual } from './Residual.js';

export interface LossWeights {
  residual?: number;
  initial?: number;
  boundary?: number;
}

export interface BoundaryLoss {
  dirichlet: Tensor;
  neumann: Tensor;
  total: Tensor;
}

/**
 * Every term of one evaluation; all are 1x1 tensors sharing one graph
 */
export interface LossTerms {
  total: Tensor;
  residual: Tensor;
  initial: Tensor;
  boundary: BoundaryLoss;
}

/**
 * Plain-number view of LossTerms for reporting
 */
export interface LossBreakdown {
  total: number;
  residual: number;
  initial: number;
  dirichlet: number;
  neumann: number;
  boundary: number;
}

function meanSquare(t: Tensor): Tensor {
  return mean(square(t));
}

function meanSquaredError(prediction: Tensor, target: Tensor): Tensor {
  return meanSquare(sub(prediction, target));
}

export class HeatLoss {
  private readonly weights: Required<LossWeights>;

  constructor(weights: LossWeights = {}) {
    this.weights = {
      residual: weights.residual ?? 1,
      initial: weights.initial ?? 1,
      boundary: weights.boundary ?? 1
    };
  }

  /**
   * mean((u_t - u_xx)^2) over the collocation points
   */
  residualLoss(net: Approximator, batch: HeatBatch): Tensor {
    return meanSquare(heatResidual(net, batch.xCollocation, batch.tCollocation));
  }

  /**
   * mean((u(x0, 0) - u0)^2)
   */
  initialLoss(net: Approximator, batch: HeatBatch): Tensor {
    const u = evaluateAt(net, batch.xInitial, batch.tInitial);
    return meanSquaredError(u, batch.uInitial);
  }

  /**
   * Dirichlet term mean(u(0, tb)^2) plus the Neumann term of the batch's mode
   */
  boundaryLoss(net: Approximator, batch: HeatBatch): BoundaryLoss {
    const dirichlet = meanSquare(evaluateAt(net, batch.xDirichlet, batch.tBoundary));

    const u = evaluateAt(net, batch.xNeumann, batch.tBoundary);
    const ux = derivative(u, batch.xNeumann, 1);
    const neumann = batch.neumannTarget
      ? meanSquaredError(ux, batch.neumannTarget)
      : meanSquaredError(u, ux);

    return { dirichlet, neumann, total: add(dirichlet, neumann) };
  }

  /**
   * Combined objective: residual + initial + boundary (each optionally weighted)
   */
  evaluate(net: Approximator, batch: HeatBatch): LossTerms {
    const residual = this.weighted(this.residualLoss(net, batch), this.weights.residual);
    const initial = this.weighted(this.initialLoss(net, batch), this.weights.initial);
    const boundaryTerms = this.boundaryLoss(net, batch);
    const boundary = this.weighted(boundaryTerms.total, this.weights.boundary);

    return {
      total: add(add(residual, initial), boundary),
      residual,
      initial,
      boundary: { ...boundaryTerms, total: boundary }
    };
  }

  private weighted(term: Tensor, weight: number): Tensor {
    return weight === 1 ? term : scale(term, weight);
  }
}

export function summarizeLoss(terms: LossTerms): LossBreakdown {
  return {
    total: terms.total.item(),
    residual: terms.residual.item(),
    initial: terms.initial.item(),
    dirichlet: terms.boundary.dirichlet.item(),
    neumann: terms.boundary.neumann.item(),
    boundary: terms.boundary.total.item()
  };
}
