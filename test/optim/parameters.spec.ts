import { describe, it, expect } from 'vitest';
import { ShapeMismatchError } from '../../src/Errors.js';
import { Tensor } from '../../src/autograd/Tensor.js';
import { flattenParameters, gatherGradients, parameterCount, writeParameters } from '../../src/optim/Parameters.js';

describe('Flat parameter vectors', () => {
  const params = () => [Tensor.fromRows([[1, 2], [3, 4]]), Tensor.fromRows([[5, 6]])];

  it('should flatten tensors in order', () => {
    expect(parameterCount(params())).toBe(6);
    expect(Array.from(flattenParameters(params()))).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('should write a flat vector back into the tensors', () => {
    const p = params();
    writeParameters(p, Float64Array.of(6, 5, 4, 3, 2, 1));
    expect(p[0].toArray()).toEqual([6, 5, 4, 3]);
    expect(p[1].toArray()).toEqual([2, 1]);
  });

  it('should reject vectors of the wrong length', () => {
    expect(() => writeParameters(params(), new Float64Array(5))).toThrow(ShapeMismatchError);
  });

  it('should gather gradients with zeros for missing ones', () => {
    const p = params();
    p[1].grad = Tensor.fromRows([[0.5, -0.5]]);
    expect(Array.from(gatherGradients(p))).toEqual([0, 0, 0, 0, 0.5, -0.5]);
  });

  it('should return a fresh gradient vector', () => {
    const p = params();
    p[1].grad = Tensor.fromRows([[1, 1]]);
    const gathered = gatherGradients(p);
    gathered[4] = 9;
    expect(p[1].grad?.toArray()).toEqual([1, 1]);
  });
});
