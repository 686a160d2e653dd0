/**
 * Numerical gradient checking for the tensor engine
 * Validates reverse-mode gradients against central finite differences
 */

import { ShapeMismatchError } from '../Errors.js';
import { grad } from './Backward.js';
import { Tensor, noGrad } from './Tensor.js';

/**
 * Scalar-valued function of one or more tensors
 */
export type ScalarFunction = (inputs: Tensor[]) => Tensor;

/**
 * Gradient checking result
 */
export interface GradCheckResult {
  passed: boolean;
  errors: GradCheckError[];
  maxError: number;
  meanError: number;
  totalChecks: number;
}

export interface GradCheckError {
  parameter: string;
  component?: number;
  analytical: number;
  numerical: number;
  error: number;
  relativeError: number;
}

/**
 * Format gradient check results as a human-readable string
 */
export function formatGradCheckResult(result: GradCheckResult, funcName: string): string {
  if (result.passed) {
    return `✓ ${funcName}: ${result.totalChecks} gradients verified (max error: ${result.maxError.toExponential(2)})`;
  }

  const lines: string[] = [
    `✗ ${funcName}: ${result.errors.length}/${result.totalChecks} gradients FAILED`
  ];

  const byParam = new Map<string, GradCheckError[]>();
  for (const err of result.errors) {
    const errs = byParam.get(err.parameter) ?? [];
    errs.push(err);
    byParam.set(err.parameter, errs);
  }

  for (const [param, errs] of byParam) {
    if (errs.length === 1) {
      const e = errs[0];
      const at = e.component !== undefined ? `[${e.component}]` : '';
      lines.push(`  ${param}${at}: analytical=${e.analytical.toFixed(6)}, numerical=${e.numerical.toFixed(6)}, error=${e.error.toExponential(2)}`);
    } else {
      const components = errs.map(e => `${e.component}:${e.error.toExponential(1)}`).join(', ');
      lines.push(`  ${param}: {${components}}`);
    }
  }

  return lines.join('\n');
}

/**
 * Gradient checker
 */
export class GradientChecker {
  private epsilon: number;
  private tolerance: number;

  constructor(epsilon: number = 1e-5, tolerance: number = 1e-4) {
    this.epsilon = epsilon;
    this.tolerance = tolerance;
  }

  /**
   * Check d fn / d input for every component of every input. Inputs are
   * flagged as differentiation variables if they are not already.
   */
  check(fn: ScalarFunction, inputs: Tensor[], names?: string[]): GradCheckResult {
    for (const input of inputs) {
      if (!input.requiresGrad) input.requiresGrad_();
    }

    const output = fn(inputs);
    if (output.size !== 1) {
      throw new ShapeMismatchError('gradient checking needs a scalar function', 'GradientChecker.check', [1, 1], output.shape);
    }

    const analytical = grad([output], inputs, { allowUnused: true });
    const errors: GradCheckError[] = [];
    const checked: number[] = [];

    inputs.forEach((input, index) => {
      const parameter = names?.[index] ?? `input${index}`;
      const analyticalGrad = analytical[index];

      for (let i = 0; i < input.size; i++) {
        const a = analyticalGrad ? analyticalGrad.data[i] : 0;
        const numerical = this.numericalGradient(fn, inputs, input, i);

        const error = Math.abs(a - numerical);
        const relativeError = Math.abs(error / (numerical + 1e-10));
        checked.push(error);

        if (error > this.tolerance && relativeError > this.tolerance) {
          errors.push({
            parameter,
            component: input.size > 1 ? i : undefined,
            analytical: a,
            numerical,
            error,
            relativeError
          });
        }
      }
    });

    const maxError = checked.length > 0 ? Math.max(...checked) : 0;
    const meanError = checked.length > 0
      ? checked.reduce((total, e) => total + e, 0) / checked.length
      : 0;

    return {
      passed: errors.length === 0,
      errors,
      maxError,
      meanError,
      totalChecks: checked.length
    };
  }

  /**
   * Central difference: (f(x+h) - f(x-h)) / (2h)
   */
  private numericalGradient(fn: ScalarFunction, inputs: Tensor[], input: Tensor, index: number): number {
    const original = input.data[index];

    return noGrad(() => {
      input.data[index] = original + this.epsilon;
      const fPlus = fn(inputs).item();

      input.data[index] = original - this.epsilon;
      const fMinus = fn(inputs).item();

      input.data[index] = original;
      return (fPlus - fMinus) / (2 * this.epsilon);
    });
  }
}
