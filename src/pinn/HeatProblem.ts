/**
 * The heat equation problem u_t - u_xx = 0 on x in [0, 1], t in [0, T]
 *
 * Initial condition: u(x, 0) = sin(2 pi x)
 * Dirichlet edge:    u(0, t) = 0
 * Neumann edge:      u_x(t, 1) = 2 pi e^{-t}, in one of two formulations:
 *   - 'curve': value and slope matched along x = 2 pi e^{-t},
 *              mean((u - u_x)^2) at (2 pi e^{-t}, t)
 *   - 'fixed': slope matched at the right edge,
 *              mean((u_x(1, t) - 2 pi e^{-t})^2)
 */

import { NumericalInstabilityError, ShapeMismatchError } from '../Errors.js';
import { Tensor } from '../autograd/Tensor.js';

export type NeumannMode = 'curve' | 'fixed';

export const TWO_PI = 2 * Math.PI;

export function initialCondition(x: number): number {
  return Math.sin(TWO_PI * x);
}

/**
 * 2 pi e^{-t}: the Neumann slope, and the location of the 'curve' formulation
 */
export function neumannCurve(t: number): number {
  return TWO_PI * Math.exp(-t);
}

/**
 * Plain coordinate arrays produced by a sampler
 */
export interface HeatTrainingData {
  xCollocation: ArrayLike<number>;
  tCollocation: ArrayLike<number>;
  xInitial: ArrayLike<number>;
  uInitial: ArrayLike<number>;
  tBoundary: ArrayLike<number>;
}

/**
 * Coordinate tensors for one training run. Tensors a derivative is taken
 * against are leaves flagged as differentiation variables.
 */
export interface HeatBatch {
  readonly neumann: NeumannMode;
  readonly xCollocation: Tensor;
  readonly tCollocation: Tensor;
  readonly xInitial: Tensor;
  readonly tInitial: Tensor;
  readonly uInitial: Tensor;
  readonly tBoundary: Tensor;
  readonly xDirichlet: Tensor;
  readonly xNeumann: Tensor;
  /** Slope target for the 'fixed' formulation; null for 'curve' */
  readonly neumannTarget: Tensor | null;
}

function column(values: ArrayLike<number>, name: string): Tensor {
  const t = Tensor.from(values);
  t.name = name;
  return t;
}

/**
 * Wrap sampler output as tensors.
 *
 * The Neumann coordinate is computed from the raw boundary times and rebuilt
 * as a fresh leaf before it is flagged; a tensor derived from another
 * differentiation variable could not be flagged itself.
 */
export function prepareBatch(data: HeatTrainingData, neumann: NeumannMode = 'curve'): HeatBatch {
  if (data.xCollocation.length !== data.tCollocation.length) {
    throw new ShapeMismatchError(
      'collocation x and t have different lengths',
      'prepareBatch',
      [data.xCollocation.length, 1],
      [data.tCollocation.length, 1]
    );
  }
  if (data.xInitial.length !== data.uInitial.length) {
    throw new ShapeMismatchError(
      'initial x and u have different lengths',
      'prepareBatch',
      [data.xInitial.length, 1],
      [data.uInitial.length, 1]
    );
  }
  const sizes: Array<[string, number]> = [
    ['xCollocation', data.xCollocation.length],
    ['xInitial', data.xInitial.length],
    ['tBoundary', data.tBoundary.length]
  ];
  for (const [name, size] of sizes) {
    if (size === 0) {
      throw new ShapeMismatchError(`${name} is empty`, 'prepareBatch');
    }
  }

  const nBoundary = data.tBoundary.length;
  const curveX = Float64Array.from(data.tBoundary, neumannCurve);
  for (let i = 0; i < nBoundary; i++) {
    if (!Number.isFinite(curveX[i])) {
      throw new NumericalInstabilityError(
        `2*pi*exp(-t) overflows at t=${data.tBoundary[i]}`,
        'Neumann boundary coordinate',
        curveX[i]
      );
    }
  }

  const xNeumann = neumann === 'curve'
    ? Tensor.leafFrom(column(curveX, 'xNeumann'))
    : Tensor.full(nBoundary, 1, 1).requiresGrad_();
  xNeumann.name = 'xNeumann';

  return {
    neumann,
    xCollocation: column(data.xCollocation, 'xCollocation').requiresGrad_(),
    tCollocation: column(data.tCollocation, 'tCollocation').requiresGrad_(),
    xInitial: column(data.xInitial, 'xInitial'),
    tInitial: Tensor.zeros(data.xInitial.length, 1),
    uInitial: column(data.uInitial, 'uInitial'),
    tBoundary: column(data.tBoundary, 'tBoundary'),
    xDirichlet: Tensor.zeros(nBoundary, 1),
    xNeumann,
    neumannTarget: neumann === 'fixed' ? column(curveX, 'neumannTarget') : null
  };
}
