import { describe, it, expect } from 'vitest';
import { GraphViolationError, ShapeMismatchError } from '../../src/Errors.js';
import { backward, grad } from '../../src/autograd/Backward.js';
import { add, mul, sum, scale } from '../../src/autograd/Ops.js';
import { Tensor } from '../../src/autograd/Tensor.js';
import { variable } from '../helpers.js';

describe('Reverse-mode engine', () => {
  describe('grad', () => {
    it('should compute the gradient of a scalar output', () => {
      const x = variable([1, 2, 3]);
      const [g] = grad([sum(mul(x, x))], [x]);
      expect(g?.toArray()).toEqual([2, 4, 6]);
    });

    it('should accumulate over shared subexpressions', () => {
      const x = variable([2]);
      const y = mul(x, x);
      const z = add(y, mul(y, x));
      // z = x^2 + x^3, dz/dx = 2x + 3x^2
      const [g] = grad([z], [x]);
      expect(g?.item()).toBe(16);
    });

    it('should weight non-scalar outputs with gradOutputs', () => {
      const x = variable([1, 2]);
      const y = mul(x, x);
      const [g] = grad([y], [x], { gradOutputs: [Tensor.from([1, 10])] });
      expect(g?.toArray()).toEqual([2, 40]);
    });

    it('should require gradOutputs for non-scalar outputs', () => {
      const x = variable([1, 2]);
      expect(() => grad([mul(x, x)], [x])).toThrow(ShapeMismatchError);
    });

    it('should reject inputs that are not differentiation variables', () => {
      const x = variable([1]);
      const c = Tensor.from([2]);
      expect(() => grad([mul(x, c)], [c])).toThrow(GraphViolationError);
    });

    it('should reject outputs computed without differentiation variables', () => {
      const x = variable([1]);
      expect(() => grad([scale(Tensor.from([1]), 2)], [x]))
        .toThrow('output is not part of any computation graph');
    });

    it('should reject inputs the output does not depend on', () => {
      const x = variable([1]);
      const unused = variable([5]);
      expect(() => grad([mul(x, x)], [unused])).toThrow('input is not part of the output graph');
    });

    it('should return null for unused inputs when allowed', () => {
      const x = variable([1]);
      const unused = variable([5]);
      const [gx, gu] = grad([mul(x, x)], [x, unused], { allowUnused: true });
      expect(gx?.item()).toBe(2);
      expect(gu).toBeNull();
    });

    it('should release the graph after a pass unless retained', () => {
      const x = variable([3]);
      const y = mul(x, x);
      grad([y], [x]);
      expect(() => grad([y], [x])).toThrow('the graph has already been released');
    });

    it('should keep the graph when retainGraph is set', () => {
      const x = variable([3]);
      const y = mul(x, x);
      grad([y], [x], { retainGraph: true });
      const [g] = grad([y], [x]);
      expect(g?.item()).toBe(6);
    });

    it('should return a differentiable gradient with createGraph', () => {
      const x = variable([3]);
      const y = mul(mul(x, x), x);
      const [dy] = grad([y], [x], { createGraph: true });
      expect(dy?.requiresGrad).toBe(true);
      expect(dy?.item()).toBe(27);
      if (!dy) throw new Error('missing gradient');
      const [d2y] = grad([dy], [x]);
      expect(d2y?.item()).toBe(18);
    });

    it('should not record a graph without createGraph', () => {
      const x = variable([3]);
      const [g] = grad([mul(x, x)], [x]);
      expect(g?.requiresGrad).toBe(false);
    });
  });

  describe('backward', () => {
    it('should accumulate into leaf gradients', () => {
      const w = variable([1, 2]);
      const loss = sum(mul(w, w));
      backward(loss);
      expect(w.grad?.toArray()).toEqual([2, 4]);
    });

    it('should add to existing gradients across passes', () => {
      const w = variable([1, 2]);
      backward(sum(mul(w, w)));
      backward(sum(scale(w, 3)));
      expect(w.grad?.toArray()).toEqual([5, 7]);
    });

    it('should only fill the requested inputs', () => {
      const w = variable([2]);
      const x = variable([5]);
      backward(mul(w, x), { inputs: [w] });
      expect(w.grad?.item()).toBe(5);
      expect(x.grad).toBeNull();
    });

    it('should store gradients that carry no graph', () => {
      const w = variable([2]);
      backward(mul(w, w));
      expect(w.grad?.node).toBeNull();
    });

    it('should release the graph', () => {
      const w = variable([2]);
      const loss = mul(w, w);
      backward(loss);
      expect(() => backward(loss)).toThrow(GraphViolationError);
    });

    it('should reject a root with no graph', () => {
      expect(() => backward(Tensor.scalar(1))).toThrow(GraphViolationError);
    });
  });
});
