/**
 * Conversions between parameter tensors and flat vectors
 */

import { ShapeMismatchError } from '../Errors.js';
import { Tensor } from '../autograd/Tensor.js';

export function parameterCount(params: readonly Tensor[]): number {
  return params.reduce((total, p) => total + p.size, 0);
}

export function flattenParameters(params: readonly Tensor[]): Float64Array {
  const flat = new Float64Array(parameterCount(params));
  let offset = 0;
  for (const p of params) {
    flat.set(p.data, offset);
    offset += p.size;
  }
  return flat;
}

/**
 * Copy a flat vector back into the parameter tensors, in order
 */
export function writeParameters(params: readonly Tensor[], flat: Float64Array): void {
  const expected = parameterCount(params);
  if (flat.length !== expected) {
    throw new ShapeMismatchError('flat vector does not match the parameters', 'writeParameters', [expected, 1], [flat.length, 1]);
  }
  let offset = 0;
  for (const p of params) {
    p.data.set(flat.subarray(offset, offset + p.size));
    offset += p.size;
  }
}

/**
 * Accumulated gradients as one fresh vector; parameters without a gradient contribute zeros
 */
export function gatherGradients(params: readonly Tensor[]): Float64Array {
  const flat = new Float64Array(parameterCount(params));
  let offset = 0;
  for (const p of params) {
    if (p.grad) flat.set(p.grad.data, offset);
    offset += p.size;
  }
  return flat;
}
