/**
 * Training point generation
 * Collocation points come from a Halton sequence over [0, 1] x [0, T];
 * initial and boundary points are seeded uniform draws.
 */

import { Random } from '../nn/Random.js';
import { initialCondition } from './HeatProblem.js';
import type { HeatTrainingData } from './HeatProblem.js';

export interface SamplingOptions {
  /** End of the time interval (default: 1) */
  tMax?: number;

  /** Interior points where the PDE is enforced (default: 2000) */
  nCollocation?: number;

  /** Points on the t = 0 slice (default: 100) */
  nInitial?: number;

  /** Boundary times, shared by both edges (default: 100) */
  nBoundary?: number;

  /** Halton indices to skip before the first collocation point (default: 1, skipping the origin) */
  haltonSkip?: number;

  random?: Random;
}

/**
 * Radical inverse of index in the given base: the index's digits mirrored
 * about the radix point
 */
export function radicalInverse(index: number, base: number): number {
  let result = 0;
  let fraction = 1 / base;
  let n = index;
  while (n > 0) {
    result += (n % base) * fraction;
    n = Math.floor(n / base);
    fraction /= base;
  }
  return result;
}

/**
 * First `count` points of the 2-D Halton sequence (bases 2 and 3), starting at `skip`
 */
export function halton2d(count: number, skip: number = 1): [Float64Array, Float64Array] {
  const first = new Float64Array(count);
  const second = new Float64Array(count);
  for (let i = 0; i < count; i++) {
    first[i] = radicalInverse(i + skip, 2);
    second[i] = radicalInverse(i + skip, 3);
  }
  return [first, second];
}

export function uniformSamples(count: number, min: number, max: number, random: Random): Float64Array {
  const values = new Float64Array(count);
  for (let i = 0; i < count; i++) {
    values[i] = random.uniform(min, max);
  }
  return values;
}

export function sampleHeatData(options: SamplingOptions = {}): HeatTrainingData {
  const tMax = options.tMax ?? 1;
  const nCollocation = options.nCollocation ?? 2000;
  const nInitial = options.nInitial ?? 100;
  const nBoundary = options.nBoundary ?? 100;
  const random = options.random ?? new Random(42);

  const [xCollocation, unitT] = halton2d(nCollocation, options.haltonSkip ?? 1);
  const tCollocation = unitT.map(t => t * tMax);

  const xInitial = uniformSamples(nInitial, 0, 1, random);
  const uInitial = xInitial.map(initialCondition);
  const tBoundary = uniformSamples(nBoundary, 0, tMax, random);

  return { xCollocation, tCollocation, xInitial, uInitial, tBoundary };
}
