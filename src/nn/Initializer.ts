/**
 * Parameter initialization: normal Xavier weights, constant biases
 */

import { Tensor } from '../autograd/Tensor.js';
import { Mlp } from './Mlp.js';
import { Random } from './Random.js';

export interface InitializerOptions {
  /** Xavier gain (default: 1) */
  gain?: number;

  /** Value written to every bias (default: 0.01) */
  biasValue?: number;

  /** Source of randomness (default: seed 42) */
  random?: Random;
}

/**
 * Standard deviation of the normal Xavier rule for a fanIn x fanOut matrix
 */
export function xavierStd(fanIn: number, fanOut: number, gain: number = 1): number {
  return gain * Math.sqrt(2.0 / (fanIn + fanOut));
}

/**
 * Fill a weight matrix (stored fanIn x fanOut) in place with N(0, xavierStd^2)
 */
export function xavierNormal(weight: Tensor, random: Random, gain: number = 1): void {
  const std = xavierStd(weight.rows, weight.cols, gain);
  for (let i = 0; i < weight.size; i++) {
    weight.data[i] = random.normal(0, std);
  }
}

export function fillConstant(tensor: Tensor, value: number): void {
  tensor.data.fill(value);
}

/**
 * Initialize every layer of the network; discards any learned values
 */
export function initializeMlp(net: Mlp, options: InitializerOptions = {}): void {
  const random = options.random ?? new Random(42);
  const gain = options.gain ?? 1;
  const biasValue = options.biasValue ?? 0.01;

  for (const layer of net.layers) {
    xavierNormal(layer.weight, random, gain);
    fillConstant(layer.bias, biasValue);
    layer.weight.zeroGrad();
    layer.bias.zeroGrad();
  }
}
