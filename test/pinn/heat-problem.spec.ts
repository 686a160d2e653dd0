import { describe, it, expect } from 'vitest';
import { NumericalInstabilityError, ShapeMismatchError } from '../../src/Errors.js';
import { TWO_PI, initialCondition, neumannCurve, prepareBatch } from '../../src/pinn/HeatProblem.js';
import type { HeatTrainingData } from '../../src/pinn/HeatProblem.js';

const data: HeatTrainingData = {
  xCollocation: [0.1, 0.4, 0.6, 0.9],
  tCollocation: [0.2, 0.5, 0.7, 0.3],
  xInitial: [0, 0.25, 0.5],
  uInitial: [0, 1, 0],
  tBoundary: [0, 1]
};

describe('Heat problem data', () => {
  it('should define the initial condition and Neumann curve', () => {
    expect(initialCondition(0.25)).toBe(1);
    expect(initialCondition(0)).toBe(0);
    expect(neumannCurve(0)).toBe(TWO_PI);
    expect(neumannCurve(1)).toBeCloseTo(2 * Math.PI / Math.E, 12);
  });

  describe('prepareBatch', () => {
    it('should flag only the coordinates derivatives are taken against', () => {
      const batch = prepareBatch(data);
      expect(batch.xCollocation.requiresGrad).toBe(true);
      expect(batch.tCollocation.requiresGrad).toBe(true);
      expect(batch.xNeumann.requiresGrad).toBe(true);
      expect(batch.xNeumann.isLeaf).toBe(true);
      expect(batch.xInitial.requiresGrad).toBe(false);
      expect(batch.tBoundary.requiresGrad).toBe(false);
      expect(batch.xDirichlet.requiresGrad).toBe(false);
    });

    it('should place the curve formulation at 2 pi e^-t', () => {
      const batch = prepareBatch(data, 'curve');
      expect(batch.neumann).toBe('curve');
      expect(batch.xNeumann.toArray()).toEqual([TWO_PI, TWO_PI * Math.exp(-1)]);
      expect(batch.neumannTarget).toBeNull();
    });

    it('should place the fixed formulation at x = 1 with a slope target', () => {
      const batch = prepareBatch(data, 'fixed');
      expect(batch.xNeumann.toArray()).toEqual([1, 1]);
      expect(batch.neumannTarget?.toArray()).toEqual([TWO_PI, TWO_PI * Math.exp(-1)]);
    });

    it('should pair every coordinate with the right companion', () => {
      const batch = prepareBatch(data);
      expect(batch.tInitial.toArray()).toEqual([0, 0, 0]);
      expect(batch.xDirichlet.toArray()).toEqual([0, 0]);
      expect(batch.xCollocation.shape).toEqual([4, 1]);
    });

    it('should reject collocation arrays of different lengths', () => {
      expect(() => prepareBatch({ ...data, tCollocation: [0.1] })).toThrow(ShapeMismatchError);
    });

    it('should reject initial arrays of different lengths', () => {
      expect(() => prepareBatch({ ...data, uInitial: [0] })).toThrow('initial x and u have different lengths');
    });

    it('should reject empty point sets', () => {
      expect(() => prepareBatch({ ...data, tBoundary: [] })).toThrow('tBoundary is empty');
    });

    it('should reject times where the Neumann curve overflows', () => {
      expect(() => prepareBatch({ ...data, tBoundary: [0, -1000] })).toThrow(NumericalInstabilityError);
    });
  });
});
