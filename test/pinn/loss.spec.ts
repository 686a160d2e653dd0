import { describe, it, expect } from 'vitest';
import { GraphViolationError } from '../../src/Errors.js';
import { backward } from '../../src/autograd/Backward.js';
import { exp, mul, neg, pow, scale, sin } from '../../src/autograd/Ops.js';
import { Tensor } from '../../src/autograd/Tensor.js';
import { Mlp } from '../../src/nn/Mlp.js';
import { initializeMlp } from '../../src/nn/Initializer.js';
import { Random } from '../../src/nn/Random.js';
import { TWO_PI, initialCondition, prepareBatch } from '../../src/pinn/HeatProblem.js';
import type { HeatTrainingData } from '../../src/pinn/HeatProblem.js';
import { HeatLoss, summarizeLoss } from '../../src/pinn/Loss.js';
import { analytic } from '../helpers.js';

const xInitial = [0.1, 0.3, 0.7];
const tBoundary = [0, 0.4, 1];

const data: HeatTrainingData = {
  xCollocation: [0.1, 0.4, 0.6, 0.9],
  tCollocation: [0.2, 0.5, 0.7, 0.3],
  xInitial,
  uInitial: xInitial.map(initialCondition),
  tBoundary
};

describe('HeatLoss', () => {
  const loss = new HeatLoss();

  describe('residual term', () => {
    it('should be the mean squared residual', () => {
      // u = x^2 gives a residual of -2 everywhere
      const value = loss.residualLoss(analytic(x => pow(x, 2)), prepareBatch(data)).item();
      expect(value).toBe(4);
    });
  });

  describe('initial term', () => {
    it('should vanish when u(x, 0) matches sin(2 pi x)', () => {
      const u = analytic((x, t) => mul(sin(scale(x, TWO_PI)), exp(neg(t))));
      expect(loss.initialLoss(u, prepareBatch(data)).item()).toBe(0);
    });

    it('should be the mean squared error against the samples', () => {
      // u = 0 everywhere
      const u = analytic(x => scale(x, 0));
      const expected = xInitial.reduce((total, x) => total + initialCondition(x) ** 2, 0) / 3;
      expect(loss.initialLoss(u, prepareBatch(data)).item()).toBeCloseTo(expected, 12);
    });
  });

  describe('boundary term', () => {
    it('should measure u(0, t) for the Dirichlet edge', () => {
      // u = x e^t vanishes at x = 0
      const u = analytic((x, t) => mul(x, exp(t)));
      const terms = loss.boundaryLoss(u, prepareBatch(data));
      expect(terms.dirichlet.item()).toBe(0);

      // u = e^(x t) is 1 at x = 0
      const shifted = analytic((x, t) => exp(mul(x, t)));
      expect(loss.boundaryLoss(shifted, prepareBatch(data)).dirichlet.item()).toBeCloseTo(1, 12);
    });

    it('should match value and slope along the curve x = 2 pi e^-t', () => {
      // u = e^x has u = u_x everywhere
      const u = analytic(x => exp(x));
      const terms = loss.boundaryLoss(u, prepareBatch(data, 'curve'));
      expect(terms.neumann.item()).toBe(0);
    });

    it('should compare the curve residual u - u_x', () => {
      // u = x: u - u_x = 2 pi e^-t - 1 at the curve
      const u = analytic(x => scale(x, 1));
      const terms = loss.boundaryLoss(u, prepareBatch(data, 'curve'));
      const expected = tBoundary.reduce((total, t) => total + (TWO_PI * Math.exp(-t) - 1) ** 2, 0) / 3;
      expect(terms.neumann.item()).toBeCloseTo(expected, 10);
    });

    it('should match the slope at x = 1 in the fixed formulation', () => {
      // u = 2 pi x e^-t has u_x(1, t) = 2 pi e^-t and u(0, t) = 0
      const u = analytic((x, t) => mul(x, scale(exp(neg(t)), TWO_PI)));
      const terms = loss.boundaryLoss(u, prepareBatch(data, 'fixed'));
      expect(terms.neumann.item()).toBe(0);
      expect(terms.dirichlet.item()).toBe(0);
      expect(terms.total.item()).toBe(0);
    });

    it('should add the Dirichlet and Neumann terms', () => {
      const u = analytic((x, t) => exp(mul(x, t)));
      const terms = loss.boundaryLoss(u, prepareBatch(data));
      expect(terms.total.item()).toBe(terms.dirichlet.item() + terms.neumann.item());
    });
  });

  describe('evaluate', () => {
    const net = () => {
      const mlp = new Mlp({ hiddenWidth: 4, hiddenLayers: 2 });
      initializeMlp(mlp, { random: new Random(13) });
      return mlp;
    };

    it('should sum the residual, initial and boundary terms', () => {
      const terms = loss.evaluate(net(), prepareBatch(data));
      const b = summarizeLoss(terms);
      expect(b.total).toBe((b.residual + b.initial) + b.boundary);
      expect(b.boundary).toBe(b.dirichlet + b.neumann);
      expect(b.total).toBeGreaterThan(0);
    });

    it('should scale weighted terms', () => {
      const mlp = net();
      const batch = prepareBatch(data);
      const plain = summarizeLoss(loss.evaluate(mlp, batch));
      const weighted = summarizeLoss(new HeatLoss({ residual: 2, boundary: 0 }).evaluate(mlp, batch));

      expect(weighted.residual).toBe(plain.residual * 2);
      expect(weighted.initial).toBe(plain.initial);
      expect(weighted.boundary).toBe(0);
      // the unweighted boundary parts stay visible
      expect(weighted.dirichlet).toBe(plain.dirichlet);
    });

    it('should give gradients that flow through the derivative terms', () => {
      const a = Tensor.scalar(0.5).requiresGrad_();
      // residual loss = mean((-2a)^2) = 4a^2
      const u = analytic(x => mul(a, pow(x, 2)), [a]);
      const residual = loss.residualLoss(u, prepareBatch(data));
      backward(residual, { inputs: [a] });
      expect(residual.item()).toBeCloseTo(1, 12);
      expect(a.grad?.item()).toBeCloseTo(4, 12);
    });

    it('should release the graph after back-propagation', () => {
      const mlp = net();
      const terms = loss.evaluate(mlp, prepareBatch(data));
      backward(terms.total, { inputs: mlp.parameters() });
      expect(() => backward(terms.total)).toThrow(GraphViolationError);
    });

    it('should leave coordinate tensors without gradients', () => {
      const mlp = net();
      const batch = prepareBatch(data);
      backward(loss.evaluate(mlp, batch).total, { inputs: mlp.parameters() });
      expect(batch.xCollocation.grad).toBeNull();
      expect(batch.xNeumann.grad).toBeNull();
      expect(mlp.parameters().every(p => p.grad !== null)).toBe(true);
    });
  });
});
