/**
 * Differentiable tensor operations
 * Each backward rule is expressed with these same operations, so gradients
 * computed in grad mode can be differentiated again.
 */

import { ShapeMismatchError } from '../Errors.js';
import { Tensor, isGradEnabled, sameShape } from './Tensor.js';
import type { BackwardFn } from './Tensor.js';

/**
 * Wrap computed values as an operation result, recording a graph node when
 * grad mode is on and some input requires grad
 */
function record(
  op: string,
  data: Float64Array,
  rows: number,
  cols: number,
  inputs: Tensor[],
  backward: BackwardFn
): Tensor {
  if (isGradEnabled() && inputs.some(input => input.requiresGrad)) {
    return new Tensor(data, rows, cols, { op, inputs, backward });
  }
  return new Tensor(data, rows, cols);
}

function broadcastDim(a: number, b: number): number | null {
  if (a === b) return a;
  if (a === 1) return b;
  if (b === 1) return a;
  return null;
}

function broadcastShape(a: Tensor, b: Tensor, op: string): [number, number] {
  const rows = broadcastDim(a.rows, b.rows);
  const cols = broadcastDim(a.cols, b.cols);
  if (rows === null || cols === null) {
    throw new ShapeMismatchError('operands cannot be broadcast together', op, a.shape, b.shape);
  }
  return [rows, cols];
}

function elementwise(
  a: Tensor,
  b: Tensor,
  op: string,
  fn: (x: number, y: number) => number
): [Float64Array, number, number] {
  const [rows, cols] = broadcastShape(a, b, op);
  const out = new Float64Array(rows * cols);

  if (sameShape(a, b)) {
    for (let i = 0; i < out.length; i++) {
      out[i] = fn(a.data[i], b.data[i]);
    }
    return [out, rows, cols];
  }

  const aRowStride = a.rows === 1 ? 0 : a.cols;
  const bRowStride = b.rows === 1 ? 0 : b.cols;
  const aColStride = a.cols === 1 ? 0 : 1;
  const bColStride = b.cols === 1 ? 0 : 1;
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      out[r * cols + c] = fn(
        a.data[r * aRowStride + c * aColStride],
        b.data[r * bRowStride + c * bColStride]
      );
    }
  }
  return [out, rows, cols];
}

function unary(a: Tensor, fn: (x: number) => number): Float64Array {
  const out = new Float64Array(a.size);
  for (let i = 0; i < out.length; i++) {
    out[i] = fn(a.data[i]);
  }
  return out;
}

/**
 * Reduce a broadcast gradient back to the shape of the input it flows to
 */
function unbroadcast(grad: Tensor, target: Tensor): Tensor | null {
  if (!target.requiresGrad) return null;
  if (sameShape(grad, target)) return grad;
  return sumTo(grad, target.rows, target.cols);
}

export function add(a: Tensor, b: Tensor): Tensor {
  const [data, rows, cols] = elementwise(a, b, 'add', (x, y) => x + y);
  return record('add', data, rows, cols, [a, b], g => [unbroadcast(g, a), unbroadcast(g, b)]);
}

export function sub(a: Tensor, b: Tensor): Tensor {
  const [data, rows, cols] = elementwise(a, b, 'sub', (x, y) => x - y);
  return record('sub', data, rows, cols, [a, b], g => [
    unbroadcast(g, a),
    b.requiresGrad ? unbroadcast(neg(g), b) : null
  ]);
}

export function mul(a: Tensor, b: Tensor): Tensor {
  const [data, rows, cols] = elementwise(a, b, 'mul', (x, y) => x * y);
  return record('mul', data, rows, cols, [a, b], g => [
    a.requiresGrad ? unbroadcast(mul(g, b), a) : null,
    b.requiresGrad ? unbroadcast(mul(g, a), b) : null
  ]);
}

export function neg(a: Tensor): Tensor {
  return record('neg', unary(a, x => -x), a.rows, a.cols, [a], g => [neg(g)]);
}

export function scale(a: Tensor, factor: number): Tensor {
  return record('scale', unary(a, x => x * factor), a.rows, a.cols, [a], g => [scale(g, factor)]);
}

export function addScalar(a: Tensor, value: number): Tensor {
  return record('addScalar', unary(a, x => x + value), a.rows, a.cols, [a], g => [g]);
}

export function square(a: Tensor): Tensor {
  return mul(a, a);
}

/**
 * Elementwise power with a constant exponent
 */
export function pow(a: Tensor, exponent: number): Tensor {
  return record('pow', unary(a, x => Math.pow(x, exponent)), a.rows, a.cols, [a], g => [
    exponent === 0 ? null : mul(g, scale(pow(a, exponent - 1), exponent))
  ]);
}

export function tanh(a: Tensor): Tensor {
  // d tanh = 1 - tanh^2, read off the output
  const out: Tensor = record('tanh', unary(a, Math.tanh), a.rows, a.cols, [a], g => [
    mul(g, addScalar(neg(square(out)), 1))
  ]);
  return out;
}

export function sin(a: Tensor): Tensor {
  return record('sin', unary(a, Math.sin), a.rows, a.cols, [a], g => [mul(g, cos(a))]);
}

export function cos(a: Tensor): Tensor {
  return record('cos', unary(a, Math.cos), a.rows, a.cols, [a], g => [neg(mul(g, sin(a)))]);
}

export function exp(a: Tensor): Tensor {
  const out: Tensor = record('exp', unary(a, Math.exp), a.rows, a.cols, [a], g => [mul(g, out)]);
  return out;
}

export function transpose(a: Tensor): Tensor {
  const out = new Float64Array(a.size);
  for (let r = 0; r < a.rows; r++) {
    for (let c = 0; c < a.cols; c++) {
      out[c * a.rows + r] = a.data[r * a.cols + c];
    }
  }
  return record('transpose', out, a.cols, a.rows, [a], g => [transpose(g)]);
}

export function matmul(a: Tensor, b: Tensor): Tensor {
  if (a.cols !== b.rows) {
    throw new ShapeMismatchError(
      `inner dimensions differ (${a.cols} vs ${b.rows})`,
      'matmul',
      [a.cols, b.cols],
      b.shape
    );
  }
  const n = a.rows;
  const k = a.cols;
  const m = b.cols;
  const out = new Float64Array(n * m);
  const ad = a.data;
  const bd = b.data;
  for (let i = 0; i < n; i++) {
    const rowOffset = i * m;
    for (let p = 0; p < k; p++) {
      const av = ad[i * k + p];
      const bOffset = p * m;
      for (let j = 0; j < m; j++) {
        out[rowOffset + j] += av * bd[bOffset + j];
      }
    }
  }
  return record('matmul', out, n, m, [a, b], g => [
    a.requiresGrad ? matmul(g, transpose(b)) : null,
    b.requiresGrad ? matmul(transpose(a), g) : null
  ]);
}

export function sum(a: Tensor): Tensor {
  let total = 0;
  for (let i = 0; i < a.size; i++) {
    total += a.data[i];
  }
  return record('sum', Float64Array.of(total), 1, 1, [a], g => [broadcastTo(g, a.rows, a.cols)]);
}

export function mean(a: Tensor): Tensor {
  if (a.size === 0) {
    throw new ShapeMismatchError('mean of an empty tensor', 'mean');
  }
  return scale(sum(a), 1 / a.size);
}

/**
 * Sum over the dimensions where the target size is 1
 */
export function sumTo(a: Tensor, rows: number, cols: number): Tensor {
  if ((rows !== a.rows && rows !== 1) || (cols !== a.cols && cols !== 1)) {
    throw new ShapeMismatchError('cannot reduce to the requested shape', 'sumTo', [rows, cols], a.shape);
  }
  const out = new Float64Array(rows * cols);
  for (let r = 0; r < a.rows; r++) {
    const outRow = rows === 1 ? 0 : r;
    for (let c = 0; c < a.cols; c++) {
      const outCol = cols === 1 ? 0 : c;
      out[outRow * cols + outCol] += a.data[r * a.cols + c];
    }
  }
  return record('sumTo', out, rows, cols, [a], g => [broadcastTo(g, a.rows, a.cols)]);
}

export function broadcastTo(a: Tensor, rows: number, cols: number): Tensor {
  if ((a.rows !== rows && a.rows !== 1) || (a.cols !== cols && a.cols !== 1)) {
    throw new ShapeMismatchError('cannot broadcast to the requested shape', 'broadcastTo', [rows, cols], a.shape);
  }
  const [data] = elementwise(a, Tensor.zeros(rows, cols), 'broadcastTo', x => x);
  return record('broadcastTo', data, rows, cols, [a], g => [sumTo(g, a.rows, a.cols)]);
}

/**
 * Stack tensors side by side; all must have the same number of rows
 */
export function concatCols(tensors: readonly Tensor[]): Tensor {
  if (tensors.length === 0) {
    throw new ShapeMismatchError('nothing to concatenate', 'concatCols');
  }
  const rows = tensors[0].rows;
  for (const t of tensors) {
    if (t.rows !== rows) {
      throw new ShapeMismatchError(
        'coordinate batches have different lengths',
        'concatCols',
        [rows, t.cols],
        t.shape
      );
    }
  }

  const cols = tensors.reduce((total, t) => total + t.cols, 0);
  const out = new Float64Array(rows * cols);
  let offset = 0;
  for (const t of tensors) {
    for (let r = 0; r < rows; r++) {
      for (let c = 0; c < t.cols; c++) {
        out[r * cols + offset + c] = t.data[r * t.cols + c];
      }
    }
    offset += t.cols;
  }

  const inputs = [...tensors];
  return record('concatCols', out, rows, cols, inputs, g => {
    let start = 0;
    return inputs.map(t => {
      const slice = t.requiresGrad ? sliceCols(g, start, start + t.cols) : null;
      start += t.cols;
      return slice;
    });
  });
}

/**
 * Columns [start, end)
 */
export function sliceCols(a: Tensor, start: number, end: number): Tensor {
  if (start < 0 || end > a.cols || start > end) {
    throw new ShapeMismatchError(`column range [${start}, ${end}) out of bounds`, 'sliceCols', [a.rows, end - start], a.shape);
  }
  const cols = end - start;
  const out = new Float64Array(a.rows * cols);
  for (let r = 0; r < a.rows; r++) {
    for (let c = 0; c < cols; c++) {
      out[r * cols + c] = a.data[r * a.cols + start + c];
    }
  }
  return record('sliceCols', out, a.rows, cols, [a], g => [padCols(g, start, a.cols)]);
}

/**
 * Place a at columns [start, start + a.cols) of a zero tensor with totalCols columns
 */
export function padCols(a: Tensor, start: number, totalCols: number): Tensor {
  if (start < 0 || start + a.cols > totalCols) {
    throw new ShapeMismatchError('padding does not fit', 'padCols', [a.rows, totalCols], a.shape);
  }
  const out = new Float64Array(a.rows * totalCols);
  for (let r = 0; r < a.rows; r++) {
    for (let c = 0; c < a.cols; c++) {
      out[r * totalCols + start + c] = a.data[r * a.cols + c];
    }
  }
  return record('padCols', out, a.rows, totalCols, [a], g => [sliceCols(g, start, start + a.cols)]);
}

export function onesLike(a: Tensor): Tensor {
  return Tensor.ones(a.rows, a.cols);
}

export function zerosLike(a: Tensor): Tensor {
  return Tensor.zeros(a.rows, a.cols);
}
