export type ShapeLike = readonly [number, number];

function formatShape(shape: ShapeLike): string {
  return `[${shape[0]}, ${shape[1]}]`;
}

/**
 * A derivative was requested against a tensor that is not a differentiation
 * variable, is not part of the output's graph, or whose graph was released.
 */
export class GraphViolationError extends Error {
  constructor(
    message: string,
    public operation: string,
    public reason?: string
  ) {
    const reasonInfo = reason ? ` - ${reason}` : '';
    super(`Graph violation in '${operation}': ${message}${reasonInfo}`);
    this.name = 'GraphViolationError';
  }
}

export class ShapeMismatchError extends Error {
  constructor(
    message: string,
    public operation: string,
    public expected?: ShapeLike,
    public actual?: ShapeLike
  ) {
    const shapeInfo = expected && actual
      ? ` (expected ${formatShape(expected)}, got ${formatShape(actual)})`
      : '';
    super(`Shape mismatch in '${operation}': ${message}${shapeInfo}`);
    this.name = 'ShapeMismatchError';
  }
}

export class NumericalInstabilityError extends Error {
  constructor(
    message: string,
    public quantity: string,
    public value: number
  ) {
    super(`Numerical instability in ${quantity} (${value}): ${message}`);
    this.name = 'NumericalInstabilityError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public key: string,
    public value?: unknown
  ) {
    const valueInfo = value !== undefined ? ` (got ${JSON.stringify(value)})` : '';
    super(`Invalid option '${key}': ${message}${valueInfo}`);
    this.name = 'ConfigError';
  }
}

/**
 * Fatal end of a training run. Parameters are left at the last point whose
 * loss and gradient were computed successfully.
 */
export class TrainingAbortedError extends Error {
  constructor(
    message: string,
    public evaluations: number,
    public lastLoss: number | null,
    public cause?: unknown
  ) {
    const lossInfo = lastLoss !== null ? lastLoss.toExponential(6) : 'n/a';
    super(`Training aborted after ${evaluations} evaluations (last loss: ${lossInfo}): ${message}`);
    this.name = 'TrainingAbortedError';
  }
}

/**
 * Format a user-friendly message for errors raised while training
 */
export function formatTrainingError(error: unknown, verbose: boolean = false): string {
  if (!(error instanceof Error)) {
    return `Error: ${String(error)}`;
  }

  let output = `Error: ${error.message}\n`;
  output += formatErrorGuidance(error instanceof TrainingAbortedError && error.cause instanceof Error ? error.cause : error);

  if (verbose && error.stack) {
    output += '\n\nStack trace:\n' + error.stack;
  }

  return output;
}

/**
 * Provide contextual guidance based on the error kind
 */
function formatErrorGuidance(error: Error): string {
  if (error instanceof GraphViolationError) {
    return `
Derivatives can only be taken with respect to leaf tensors flagged with
requiresGrad_(). A coordinate computed from another flagged tensor must be
rebuilt as a fresh leaf (Tensor.leafFrom) before it is flagged.
`;
  }

  if (error instanceof ShapeMismatchError) {
    return `
Coordinate batches stacked into (x, t) pairs must have the same length,
and every coordinate batch must be a column (n x 1).
`;
  }

  if (error instanceof NumericalInstabilityError) {
    return `
Tip: reduce --t-max or the step size (--lr), or use --line-search strong-wolfe.
`;
  }

  if (error instanceof ConfigError) {
    return `
Run with --help to list the accepted options.
`;
  }

  return '';
}
