import { describe, it, expect } from 'vitest';
import { GraphViolationError, ShapeMismatchError } from '../../src/Errors.js';
import { add, mul } from '../../src/autograd/Ops.js';
import { Tensor, isGradEnabled, noGrad, withGradMode } from '../../src/autograd/Tensor.js';

describe('Tensor', () => {
  it('should build column vectors by default', () => {
    const t = Tensor.from([1, 2, 3]);
    expect(t.shape).toEqual([3, 1]);
    expect(t.toArray()).toEqual([1, 2, 3]);
  });

  it('should build matrices from rows', () => {
    const t = Tensor.fromRows([[1, 2], [3, 4], [5, 6]]);
    expect(t.shape).toEqual([3, 2]);
    expect(t.get(1, 0)).toBe(3);
    expect(t.get(2, 1)).toBe(6);
  });

  it('should reject ragged rows', () => {
    expect(() => Tensor.fromRows([[1, 2], [3]])).toThrow(ShapeMismatchError);
  });

  it('should reject data that does not fill the shape', () => {
    expect(() => Tensor.from([1, 2, 3], 2, 2)).toThrow(ShapeMismatchError);
  });

  it('should throw on out-of-bounds access', () => {
    const t = Tensor.zeros(2, 2);
    expect(() => t.get(2, 0)).toThrow(RangeError);
    expect(() => t.get(0, -1)).toThrow(RangeError);
  });

  it('should only give item() of a single value', () => {
    expect(Tensor.scalar(4.5).item()).toBe(4.5);
    expect(() => Tensor.ones(2, 1).item()).toThrow(ShapeMismatchError);
  });

  it('should copy values on detach', () => {
    const t = Tensor.from([1, 2]).requiresGrad_();
    const d = t.detach();
    d.data[0] = 10;
    expect(t.get(0)).toBe(1);
    expect(d.requiresGrad).toBe(false);
  });

  it('should report non-finite values', () => {
    expect(Tensor.from([1, 2]).isFinite()).toBe(true);
    expect(Tensor.from([1, NaN]).isFinite()).toBe(false);
    expect(Tensor.from([Infinity]).isFinite()).toBe(false);
  });

  describe('differentiation variables', () => {
    it('should flag leaves', () => {
      const t = Tensor.from([1]).requiresGrad_();
      expect(t.isLeaf).toBe(true);
      expect(t.requiresGrad).toBe(true);
      t.requiresGrad_(false);
      expect(t.requiresGrad).toBe(false);
    });

    it('should refuse to flag a computed tensor', () => {
      const x = Tensor.from([1, 2]).requiresGrad_();
      const y = mul(x, x);
      expect(y.isLeaf).toBe(false);
      expect(() => y.requiresGrad_()).toThrow(GraphViolationError);
    });

    it('should rebuild a computed tensor as a fresh flagged leaf', () => {
      const x = Tensor.from([1, 2]).requiresGrad_();
      const y = mul(x, x);
      const leaf = Tensor.leafFrom(y);
      expect(leaf.isLeaf).toBe(true);
      expect(leaf.requiresGrad).toBe(true);
      expect(leaf.toArray()).toEqual([1, 4]);
    });
  });

  describe('grad mode', () => {
    it('should not record operations under noGrad', () => {
      const x = Tensor.from([1, 2]).requiresGrad_();
      const y = noGrad(() => add(x, x));
      expect(y.node).toBeNull();
      expect(y.requiresGrad).toBe(false);
    });

    it('should restore the previous mode after the callback', () => {
      expect(isGradEnabled()).toBe(true);
      withGradMode(false, () => {
        expect(isGradEnabled()).toBe(false);
        withGradMode(true, () => expect(isGradEnabled()).toBe(true));
        expect(isGradEnabled()).toBe(false);
      });
      expect(isGradEnabled()).toBe(true);
    });

    it('should restore the mode when the callback throws', () => {
      expect(() => noGrad(() => {
        throw new Error('boom');
      })).toThrow('boom');
      expect(isGradEnabled()).toBe(true);
    });
  });
});
