import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  GraphViolationError,
  NumericalInstabilityError,
  ShapeMismatchError,
  TrainingAbortedError,
  formatTrainingError
} from '../src/Errors.js';

describe('Errors', () => {
  it('should describe graph violations', () => {
    const error = new GraphViolationError('input is not a differentiation variable', 'grad', 'flag it first');
    expect(error.name).toBe('GraphViolationError');
    expect(error.message).toBe("Graph violation in 'grad': input is not a differentiation variable - flag it first");
    expect(error.operation).toBe('grad');
  });

  it('should include both shapes in shape mismatches', () => {
    const error = new ShapeMismatchError('inner dimensions differ', 'matmul', [3, 1], [2, 1]);
    expect(error.message).toBe("Shape mismatch in 'matmul': inner dimensions differ (expected [3, 1], got [2, 1])");
    expect(new ShapeMismatchError('empty', 'mean').message).toBe("Shape mismatch in 'mean': empty");
  });

  it('should carry the offending value in numerical errors', () => {
    const error = new NumericalInstabilityError('loss is not finite', 'loss', NaN);
    expect(error.message).toBe('Numerical instability in loss (NaN): loss is not finite');
    expect(error.value).toBeNaN();
  });

  it('should report progress in aborted training', () => {
    const cause = new Error('boom');
    const error = new TrainingAbortedError('boom', 12, 0.5, cause);
    expect(error.message).toBe('Training aborted after 12 evaluations (last loss: 5.000000e-1): boom');
    expect(error.cause).toBe(cause);
    expect(new TrainingAbortedError('boom', 1, null).message).toContain('(last loss: n/a)');
  });

  describe('formatTrainingError', () => {
    it('should add guidance for configuration errors', () => {
      const text = formatTrainingError(new ConfigError('unknown option', '--epochs'));
      expect(text.startsWith("Error: Invalid option '--epochs': unknown option\n")).toBe(true);
      expect(text).toContain('Run with --help');
    });

    it('should take guidance from the cause of an aborted run', () => {
      const cause = new NumericalInstabilityError('loss is not finite', 'loss', Infinity);
      const text = formatTrainingError(new TrainingAbortedError(cause.message, 3, 1, cause));
      expect(text).toContain('Tip: reduce --t-max');
    });

    it('should only show the stack trace when verbose', () => {
      const error = new GraphViolationError('released', 'backward');
      expect(formatTrainingError(error)).not.toContain('Stack trace:');
      expect(formatTrainingError(error, true)).toContain('Stack trace:');
    });

    it('should format non-error values', () => {
      expect(formatTrainingError('plain failure')).toBe('Error: plain failure');
    });
  });
});
