/**
 * Pointwise residual of the heat equation
 */

import { ShapeMismatchError } from '../Errors.js';
import { derivative } from '../autograd/Derivative.js';
import { concatCols, sub } from '../autograd/Ops.js';
import { Tensor } from '../autograd/Tensor.js';
import type { Approximator } from '../nn/Mlp.js';

/**
 * Evaluate the approximator at stacked (x, t) column vectors
 */
export function evaluateAt(net: Approximator, x: Tensor, t: Tensor): Tensor {
  if (x.cols !== 1 || t.cols !== 1) {
    throw new ShapeMismatchError(
      'coordinates must be column vectors',
      'evaluateAt',
      [x.rows, 1],
      x.cols !== 1 ? x.shape : t.shape
    );
  }
  return net.forward(concatCols([x, t]));
}

/**
 * u_t - u_xx at the collocation points. Both coordinates must be flagged
 * differentiation variables; the result stays differentiable with respect
 * to the approximator's parameters.
 */
export function heatResidual(net: Approximator, xf: Tensor, tf: Tensor): Tensor {
  if (xf.rows !== tf.rows) {
    throw new ShapeMismatchError(
      'collocation x and t have different lengths',
      'heatResidual',
      xf.shape,
      tf.shape
    );
  }

  const u = evaluateAt(net, xf, tf);
  const ut = derivative(u, tf, 1);
  const uxx = derivative(u, xf, 2);
  return sub(ut, uxx);
}
