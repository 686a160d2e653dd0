/**
 * Limited-memory BFGS with an optional strong-Wolfe line search
 *
 * Works on flat parameter vectors through the Objective interface: every
 * evaluation returns the loss and its gradient at the requested point. The
 * line search may evaluate several trial points per iteration.
 */

export interface Evaluation {
  loss: number;
  gradient: Float64Array;
}

export interface Objective {
  evaluate(x: Float64Array): Evaluation;
}

export type LineSearch = 'strong-wolfe' | 'none';

export interface LbfgsOptions {
  /** Step length (default: 1) */
  lr?: number;

  /** Maximum iterations (default: 20) */
  maxIterations?: number;

  /** Maximum objective evaluations (default: 1.25 x maxIterations) */
  maxEvaluations?: number;

  /** Stop when max |gradient| falls to this (default: 1e-7) */
  toleranceGrad?: number;

  /** Stop when loss, step or directional derivative changes less than this (default: 1e-9) */
  toleranceChange?: number;

  /** Curvature pairs kept (default: 100) */
  historySize?: number;

  /** Line search (default: 'strong-wolfe') */
  lineSearch?: LineSearch;

  /** Polled once per iteration; returning true ends the run as budget-exhausted */
  shouldStop?: () => boolean;

  /** Called with the starting point (iteration 0) and every accepted step */
  onIterate?: (iterate: LbfgsIterate) => void;
}

export interface LbfgsIterate {
  iteration: number;
  x: Float64Array;
  loss: number;
  gradient: Float64Array;
}

export type LbfgsStatus = 'converged' | 'budget-exhausted';

export type LbfgsReason =
  | 'gradient-tolerance'
  | 'loss-change'
  | 'step-size'
  | 'no-descent'
  | 'max-iterations'
  | 'max-evaluations'
  | 'stopped';

export interface LbfgsResult {
  x: Float64Array;
  loss: number;
  gradient: Float64Array;
  iterations: number;
  evaluations: number;
  status: LbfgsStatus;
  reason: LbfgsReason;
}

function dot(a: Float64Array, b: Float64Array): number {
  let total = 0;
  for (let i = 0; i < a.length; i++) {
    total += a[i] * b[i];
  }
  return total;
}

function maxAbs(a: Float64Array): number {
  let m = 0;
  for (let i = 0; i < a.length; i++) {
    const v = Math.abs(a[i]);
    if (v > m || Number.isNaN(v)) m = v;
  }
  return m;
}

function sumAbs(a: Float64Array): number {
  let total = 0;
  for (let i = 0; i < a.length; i++) {
    total += Math.abs(a[i]);
  }
  return total;
}

/** x + t * d */
function step(x: Float64Array, t: number, d: Float64Array): Float64Array {
  const out = new Float64Array(x.length);
  for (let i = 0; i < x.length; i++) {
    out[i] = x[i] + t * d[i];
  }
  return out;
}

/**
 * Minimizer of the cubic through (x1, f1, g1) and (x2, f2, g2), clamped to bounds
 */
export function cubicInterpolate(
  x1: number,
  f1: number,
  g1: number,
  x2: number,
  f2: number,
  g2: number,
  bounds?: [number, number]
): number {
  const [xminBound, xmaxBound] = bounds ?? (x1 <= x2 ? [x1, x2] : [x2, x1]);

  const d1 = g1 + g2 - 3 * (f1 - f2) / (x1 - x2);
  const d2Square = d1 * d1 - g1 * g2;
  if (d2Square >= 0) {
    const d2 = Math.sqrt(d2Square);
    const minPos = x1 <= x2
      ? x2 - (x2 - x1) * ((g2 + d2 - d1) / (g2 - g1 + 2 * d2))
      : x1 - (x1 - x2) * ((g1 + d2 - d1) / (g1 - g2 + 2 * d2));
    if (Number.isFinite(minPos)) {
      return Math.min(Math.max(minPos, xminBound), xmaxBound);
    }
  }
  return (xminBound + xmaxBound) / 2;
}

interface LineSearchResult {
  loss: number;
  gradient: Float64Array;
  t: number;
  evaluations: number;
}

interface LineSearchPoint {
  t: number;
  f: number;
  g: Float64Array;
  gtd: number;
}

/**
 * Find t satisfying the strong Wolfe conditions along d from x:
 * bracketing phase followed by a zoom phase with cubic interpolation.
 * Non-finite trial losses count as insufficient decrease.
 */
function strongWolfe(
  evaluateAt: (t: number) => Evaluation,
  d: Float64Array,
  t0: number,
  f: number,
  g: Float64Array,
  gtd: number,
  toleranceChange: number,
  c1: number = 1e-4,
  c2: number = 0.9,
  maxLineSearch: number = 25
): LineSearchResult {
  const dNorm = maxAbs(d);
  let t = t0;
  let trial = evaluateAt(t);
  let evaluations = 1;
  let fNew = trial.loss;
  let gNew = trial.gradient;
  let gtdNew = dot(gNew, d);

  let prev: LineSearchPoint = { t: 0, f, g, gtd };
  let bracket: LineSearchPoint[] = [];
  let done = false;
  let lsIter = 0;

  const insufficientDecrease = (value: number, at: number, reference: number) =>
    !Number.isFinite(value) || value > f + c1 * at * gtd || value >= reference;

  while (lsIter < maxLineSearch) {
    if (insufficientDecrease(fNew, t, lsIter > 1 ? prev.f : Infinity)) {
      bracket = [prev, { t, f: fNew, g: gNew, gtd: gtdNew }];
      break;
    }
    if (Math.abs(gtdNew) <= -c2 * gtd) {
      bracket = [{ t, f: fNew, g: gNew, gtd: gtdNew }];
      done = true;
      break;
    }
    if (gtdNew >= 0) {
      bracket = [prev, { t, f: fNew, g: gNew, gtd: gtdNew }];
      break;
    }

    // extrapolate
    const minStep = t + 0.01 * (t - prev.t);
    const maxStep = t * 10;
    const current: LineSearchPoint = { t, f: fNew, g: gNew, gtd: gtdNew };
    t = cubicInterpolate(prev.t, prev.f, prev.gtd, t, fNew, gtdNew, [minStep, maxStep]);
    prev = current;

    trial = evaluateAt(t);
    evaluations++;
    fNew = trial.loss;
    gNew = trial.gradient;
    gtdNew = dot(gNew, d);
    lsIter++;
  }

  if (lsIter === maxLineSearch) {
    bracket = [{ t: 0, f, g, gtd }, { t, f: fNew, g: gNew, gtd: gtdNew }];
  }

  // zoom; non-finite losses rank above everything
  const rank = (value: number) => (Number.isFinite(value) ? value : Infinity);
  let insufficientProgress = false;
  let [lowPos, highPos] = bracket.length > 1 && rank(bracket[0].f) > rank(bracket[1].f) ? [1, 0] : [0, 1];

  while (!done && lsIter < maxLineSearch && bracket.length > 1) {
    const lo = Math.min(bracket[0].t, bracket[1].t);
    const hi = Math.max(bracket[0].t, bracket[1].t);
    if ((hi - lo) * dNorm < toleranceChange) break;

    t = cubicInterpolate(
      bracket[0].t, Number.isFinite(bracket[0].f) ? bracket[0].f : Number.MAX_VALUE, bracket[0].gtd,
      bracket[1].t, Number.isFinite(bracket[1].f) ? bracket[1].f : Number.MAX_VALUE, bracket[1].gtd
    );

    // keep the trial away from the bracket ends
    const eps = 0.1 * (hi - lo);
    if (Math.min(hi - t, t - lo) < eps) {
      if (insufficientProgress || t >= hi || t <= lo) {
        t = Math.abs(t - hi) < Math.abs(t - lo) ? hi - eps : lo + eps;
        insufficientProgress = false;
      } else {
        insufficientProgress = true;
      }
    } else {
      insufficientProgress = false;
    }

    trial = evaluateAt(t);
    evaluations++;
    fNew = trial.loss;
    gNew = trial.gradient;
    gtdNew = dot(gNew, d);
    lsIter++;

    const point: LineSearchPoint = { t, f: fNew, g: gNew, gtd: gtdNew };
    if (insufficientDecrease(fNew, t, bracket[lowPos].f)) {
      bracket[highPos] = point;
    } else {
      if (Math.abs(gtdNew) <= -c2 * gtd) {
        done = true;
      } else if (gtdNew * (bracket[highPos].t - bracket[lowPos].t) >= 0) {
        bracket[highPos] = bracket[lowPos];
      }
      bracket[lowPos] = point;
    }
    [lowPos, highPos] = rank(bracket[0].f) <= rank(bracket[1].f) ? [0, 1] : [1, 0];
  }

  const best = bracket[lowPos] ?? bracket[0];
  return { loss: best.f, gradient: best.g, t: best.t, evaluations };
}

/**
 * Minimize the objective starting from x0 (x0 itself is not modified)
 */
export function minimizeLbfgs(objective: Objective, x0: Float64Array, options: LbfgsOptions = {}): LbfgsResult {
  const lr = options.lr ?? 1;
  const maxIterations = options.maxIterations ?? 20;
  const maxEvaluations = options.maxEvaluations ?? Math.floor(maxIterations * 1.25);
  const toleranceGrad = options.toleranceGrad ?? 1e-7;
  const toleranceChange = options.toleranceChange ?? 1e-9;
  const historySize = options.historySize ?? 100;
  const lineSearch = options.lineSearch ?? 'strong-wolfe';

  let x: Float64Array = x0.slice();
  let { loss, gradient } = objective.evaluate(x);
  let evaluations = 1;
  options.onIterate?.({ iteration: 0, x, loss, gradient });

  const finish = (status: LbfgsStatus, reason: LbfgsReason, iterations: number): LbfgsResult => ({
    x, loss, gradient, iterations, evaluations, status, reason
  });

  if (maxAbs(gradient) <= toleranceGrad) {
    return finish('converged', 'gradient-tolerance', 0);
  }

  const oldDirs: Float64Array[] = [];
  const oldSteps: Float64Array[] = [];
  const ro: number[] = [];
  let hDiag = 1;
  let d: Float64Array = new Float64Array(x.length);
  let t = lr;
  let prevGradient = gradient;
  let iteration = 0;

  while (iteration < maxIterations) {
    iteration++;

    if (iteration === 1) {
      d = gradient.map(v => -v);
    } else {
      // curvature pair from the last step
      const y = new Float64Array(x.length);
      const s = new Float64Array(x.length);
      for (let i = 0; i < x.length; i++) {
        y[i] = gradient[i] - prevGradient[i];
        s[i] = d[i] * t;
      }
      const ys = dot(y, s);
      if (ys > 1e-10) {
        if (oldDirs.length === historySize) {
          oldDirs.shift();
          oldSteps.shift();
          ro.shift();
        }
        oldDirs.push(y);
        oldSteps.push(s);
        ro.push(1 / ys);
        hDiag = ys / dot(y, y);
      }

      // two-loop recursion for -H g
      const alpha = new Array<number>(oldDirs.length).fill(0);
      const q = gradient.map(v => -v);
      for (let i = oldDirs.length - 1; i >= 0; i--) {
        alpha[i] = dot(oldSteps[i], q) * ro[i];
        const dir = oldDirs[i];
        for (let j = 0; j < q.length; j++) q[j] -= alpha[i] * dir[j];
      }
      for (let j = 0; j < q.length; j++) q[j] *= hDiag;
      for (let i = 0; i < oldDirs.length; i++) {
        const beta = dot(oldDirs[i], q) * ro[i];
        const stp = oldSteps[i];
        for (let j = 0; j < q.length; j++) q[j] += stp[j] * (alpha[i] - beta);
      }
      d = q;
    }

    prevGradient = gradient;
    const prevLoss = loss;

    t = iteration === 1 ? Math.min(1, 1 / sumAbs(gradient)) * lr : lr;

    const gtd = dot(gradient, d);
    if (gtd > -toleranceChange) {
      return finish('converged', 'no-descent', iteration);
    }

    let lsEvaluations: number;
    if (lineSearch === 'strong-wolfe') {
      const origin = x;
      const result = strongWolfe(
        tt => objective.evaluate(step(origin, tt, d)),
        d, t, loss, gradient, gtd, toleranceChange
      );
      t = result.t;
      x = step(origin, t, d);
      loss = result.loss;
      gradient = result.gradient;
      lsEvaluations = result.evaluations;
    } else {
      x = step(x, t, d);
      const evaluation = objective.evaluate(x);
      loss = evaluation.loss;
      gradient = evaluation.gradient;
      lsEvaluations = 1;
    }
    evaluations += lsEvaluations;
    options.onIterate?.({ iteration, x, loss, gradient });

    if (maxAbs(gradient) <= toleranceGrad) {
      return finish('converged', 'gradient-tolerance', iteration);
    }
    if (maxAbs(d) * Math.abs(t) <= toleranceChange) {
      return finish('converged', 'step-size', iteration);
    }
    if (Math.abs(loss - prevLoss) < toleranceChange) {
      return finish('converged', 'loss-change', iteration);
    }
    if (evaluations >= maxEvaluations) {
      return finish('budget-exhausted', 'max-evaluations', iteration);
    }
    if (options.shouldStop?.()) {
      return finish('budget-exhausted', 'stopped', iteration);
    }
  }

  return finish('budget-exhausted', 'max-iterations', iteration);
}
