/**
 * Test helper utilities shared across test files
 */

import { GradientChecker } from '../src/autograd/GradientChecker.js';
import type { GradCheckResult, ScalarFunction } from '../src/autograd/GradientChecker.js';
import { sliceCols } from '../src/autograd/Ops.js';
import { Tensor } from '../src/autograd/Tensor.js';
import type { Approximator } from '../src/nn/Mlp.js';

/**
 * Column vector flagged as a differentiation variable
 */
export function variable(values: number[]): Tensor {
  return Tensor.from(values).requiresGrad_();
}

/**
 * Approximator defined by a closed-form expression of the x and t columns
 *
 * @example
 * const net = analytic((x, t) => ops.mul(x, t));
 */
export function analytic(fn: (x: Tensor, t: Tensor) => Tensor, params: Tensor[] = []): Approximator {
  return {
    forward: (input: Tensor) => fn(sliceCols(input, 0, 1), sliceCols(input, 1, 2)),
    parameters: () => params
  };
}

/**
 * Check engine gradients of a scalar function against finite differences
 *
 * @example
 * const result = checkGradient(([a]) => ops.sum(ops.tanh(a)), [Tensor.from([0.1, 0.2])]);
 * expect(result.passed).toBe(true);
 */
export function checkGradient(fn: ScalarFunction, inputs: Tensor[]): GradCheckResult {
  return new GradientChecker().check(fn, inputs);
}

export function expectCloseArray(actual: ArrayLike<number>, expected: number[], digits: number = 10): void {
  if (actual.length !== expected.length) {
    throw new Error(`Expected ${expected.length} values, got ${actual.length}`);
  }
  for (let i = 0; i < expected.length; i++) {
    const tolerance = Math.pow(10, -digits) / 2;
    if (!(Math.abs(actual[i] - expected[i]) < tolerance)) {
      throw new Error(`Value ${i}: expected ${expected[i]}, got ${actual[i]}`);
    }
  }
}
