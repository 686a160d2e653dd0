/**
 * Dense 2-D tensors with reverse-mode autodiff bookkeeping
 * Coordinates travel as column vectors (n x 1); stacked (x, t) pairs as n x 2
 */

import { GraphViolationError, ShapeMismatchError } from '../Errors.js';

export type Shape = readonly [rows: number, cols: number];

/**
 * Backward rule of a recorded operation: maps the gradient of the output to
 * one gradient (or null) per input. Rules are written with tensor operations,
 * so running them in grad mode records a differentiable backward graph.
 */
export type BackwardFn = (gradOutput: Tensor) => Array<Tensor | null>;

/**
 * Graph node attached to every tensor produced by a recorded operation
 */
export interface GradNode {
  readonly op: string;
  readonly inputs: readonly Tensor[];
  // null once the graph has been released
  backward: BackwardFn | null;
}

let gradEnabled = true;

export function isGradEnabled(): boolean {
  return gradEnabled;
}

/**
 * Run fn with operation recording switched on or off, restoring the previous
 * mode afterwards
 */
export function withGradMode<T>(enabled: boolean, fn: () => T): T {
  const previous = gradEnabled;
  gradEnabled = enabled;
  try {
    return fn();
  } finally {
    gradEnabled = previous;
  }
}

export function noGrad<T>(fn: () => T): T {
  return withGradMode(false, fn);
}

let nextId = 0;

export class Tensor {
  readonly id: number;
  readonly data: Float64Array;
  readonly rows: number;
  readonly cols: number;
  readonly node: GradNode | null;
  grad: Tensor | null = null;
  name?: string;
  private flagged: boolean;

  constructor(data: Float64Array, rows: number, cols: number, node: GradNode | null = null) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 0 || cols < 0) {
      throw new ShapeMismatchError(`invalid dimensions ${rows}x${cols}`, 'Tensor');
    }
    if (data.length !== rows * cols) {
      throw new ShapeMismatchError(
        `${data.length} values cannot fill ${rows}x${cols}`,
        'Tensor'
      );
    }
    this.id = nextId++;
    this.data = data;
    this.rows = rows;
    this.cols = cols;
    this.node = node;
    this.flagged = node !== null;
  }

  /**
   * Build a tensor from plain values; a column vector unless a shape is given
   */
  static from(values: ArrayLike<number>, rows: number = values.length, cols: number = 1): Tensor {
    return new Tensor(Float64Array.from(values), rows, cols);
  }

  static fromRows(rows: readonly (readonly number[])[]): Tensor {
    const cols = rows.length > 0 ? rows[0].length : 0;
    const data = new Float64Array(rows.length * cols);
    rows.forEach((row, r) => {
      if (row.length !== cols) {
        throw new ShapeMismatchError('ragged rows', 'Tensor.fromRows', [rows.length, cols], [rows.length, row.length]);
      }
      data.set(row, r * cols);
    });
    return new Tensor(data, rows.length, cols);
  }

  static full(rows: number, cols: number, value: number): Tensor {
    return new Tensor(new Float64Array(rows * cols).fill(value), rows, cols);
  }

  static zeros(rows: number, cols: number): Tensor {
    return new Tensor(new Float64Array(rows * cols), rows, cols);
  }

  static ones(rows: number, cols: number): Tensor {
    return Tensor.full(rows, cols, 1);
  }

  static scalar(value: number): Tensor {
    return Tensor.full(1, 1, value);
  }

  /**
   * Fresh leaf carrying a copy of source's values, flagged as a
   * differentiation variable. Use this for coordinates computed from other
   * tensors: a computed tensor cannot be flagged itself.
   */
  static leafFrom(source: Tensor): Tensor {
    return source.detach().requiresGrad_();
  }

  get shape(): Shape {
    return [this.rows, this.cols];
  }

  get size(): number {
    return this.data.length;
  }

  get isLeaf(): boolean {
    return this.node === null;
  }

  get requiresGrad(): boolean {
    return this.flagged;
  }

  /**
   * Mark this leaf as an independent differentiation variable
   */
  requiresGrad_(flag: boolean = true): this {
    if (this.node !== null) {
      throw new GraphViolationError(
        'only leaf tensors can be flagged as differentiation variables',
        'requiresGrad_',
        `tensor was produced by '${this.node.op}'; rebuild it with Tensor.leafFrom()`
      );
    }
    this.flagged = flag;
    return this;
  }

  get(row: number, col: number = 0): number {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.cols) {
      throw new RangeError(`Index (${row}, ${col}) out of bounds for ${this.rows}x${this.cols}`);
    }
    return this.data[row * this.cols + col];
  }

  item(): number {
    if (this.data.length !== 1) {
      throw new ShapeMismatchError('item() needs a single value', 'item', [1, 1], this.shape);
    }
    return this.data[0];
  }

  toArray(): number[] {
    return Array.from(this.data);
  }

  /**
   * Same values, no graph
   */
  detach(): Tensor {
    return new Tensor(this.data.slice(), this.rows, this.cols);
  }

  zeroGrad(): void {
    this.grad = null;
  }

  isFinite(): boolean {
    for (let i = 0; i < this.data.length; i++) {
      if (!Number.isFinite(this.data[i])) return false;
    }
    return true;
  }

  toString(): string {
    const label = this.name ? `${this.name} ` : '';
    return `Tensor ${label}${this.rows}x${this.cols}${this.node ? ` <${this.node.op}>` : ''}`;
  }
}

export function sameShape(a: Tensor, b: Tensor): boolean {
  return a.rows === b.rows && a.cols === b.cols;
}
