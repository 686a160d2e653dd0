/**
 * Partial derivatives of batched outputs with respect to coordinate inputs
 */

import { GraphViolationError } from '../Errors.js';
import { grad } from './Backward.js';
import { onesLike } from './Ops.js';
import { Tensor } from './Tensor.js';

/**
 * k-th partial derivative of y with respect to x.
 *
 * Each pass differentiates the sum of the batch (gradient of ones). Batch
 * elements never interact inside the approximator, so row i of the result is
 * exactly d^k y_i / d x_i^k. Every pass records its own graph, keeping the
 * result differentiable with respect to the parameters and to x.
 *
 * Once an intermediate derivative stops depending on x, every higher
 * derivative is zero and zeros shaped like x are returned.
 */
export function derivative(y: Tensor, x: Tensor, order: number = 1): Tensor {
  if (!Number.isInteger(order) || order < 1) {
    throw new RangeError(`Derivative order must be a positive integer, got ${order}`);
  }
  if (!x.requiresGrad) {
    throw new GraphViolationError(
      'cannot differentiate with respect to a tensor that is not a differentiation variable',
      'derivative',
      'flag the coordinate with requiresGrad_() before evaluating the approximator'
    );
  }

  let current = y;
  for (let k = 1; k <= order; k++) {
    if (k > 1 && !current.requiresGrad) {
      return Tensor.zeros(x.rows, x.cols);
    }
    const [d] = grad([current], [x], {
      gradOutputs: [onesLike(current)],
      createGraph: true,
      allowUnused: k > 1
    });
    if (!d) {
      return Tensor.zeros(x.rows, x.cols);
    }
    current = d;
  }
  return current;
}
