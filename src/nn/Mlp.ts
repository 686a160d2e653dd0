/**
 * Fully-connected approximator u(x, t)
 */

import { ShapeMismatchError } from '../Errors.js';
import { add, concatCols, matmul, sin, tanh } from '../autograd/Ops.js';
import { Tensor, noGrad } from '../autograd/Tensor.js';

/**
 * Anything that maps an n x 2 batch of (x, t) pairs to n x 1 predictions.
 * Analytic functions implement this in tests to stand in for the network.
 */
export interface Approximator {
  forward(input: Tensor): Tensor;
  parameters(): Tensor[];
}

export type Activation = 'tanh' | 'sin';

const ACTIVATIONS: Record<Activation, (x: Tensor) => Tensor> = {
  tanh,
  sin
};

export interface MlpOptions {
  /** Input features (default: 2, the (x, t) pair) */
  inputSize?: number;

  /** Width of every hidden layer (default: 100) */
  hiddenWidth?: number;

  /** Number of hidden activations (default: 5) */
  hiddenLayers?: number;

  /** Output features (default: 1) */
  outputSize?: number;

  /** Smooth nonlinearity applied after every hidden layer (default: 'tanh') */
  activation?: Activation;
}

const DEFAULT_OPTIONS: Required<MlpOptions> = {
  inputSize: 2,
  hiddenWidth: 100,
  hiddenLayers: 5,
  outputSize: 1,
  activation: 'tanh'
};

/**
 * Affine layer y = x W + b, with W stored as inputSize x outputSize
 */
export class Linear {
  readonly weight: Tensor;
  readonly bias: Tensor;

  constructor(readonly inputSize: number, readonly outputSize: number, name: string) {
    this.weight = Tensor.zeros(inputSize, outputSize).requiresGrad_();
    this.bias = Tensor.zeros(1, outputSize).requiresGrad_();
    this.weight.name = `${name}.weight`;
    this.bias.name = `${name}.bias`;
  }

  forward(input: Tensor): Tensor {
    return add(matmul(input, this.weight), this.bias);
  }
}

/**
 * Layers: inputSize -> W, (hiddenLayers - 1) x (W -> W), W -> outputSize,
 * with the activation after each of the first hiddenLayers layers.
 * No normalization, dropout or skip connections.
 */
export class Mlp implements Approximator {
  readonly options: Readonly<Required<MlpOptions>>;
  readonly layers: Linear[];
  private readonly activate: (x: Tensor) => Tensor;

  constructor(options: MlpOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const { inputSize, hiddenWidth, hiddenLayers, outputSize, activation } = this.options;

    if (hiddenLayers < 1 || hiddenWidth < 1) {
      throw new RangeError(`Mlp needs at least one hidden layer of width >= 1 (got ${hiddenLayers} x ${hiddenWidth})`);
    }

    const sizes = [inputSize, ...new Array<number>(hiddenLayers).fill(hiddenWidth), outputSize];
    this.layers = [];
    for (let i = 0; i < sizes.length - 1; i++) {
      this.layers.push(new Linear(sizes[i], sizes[i + 1], `layers.${i}`));
    }
    this.activate = ACTIVATIONS[activation];
  }

  forward(input: Tensor): Tensor {
    if (input.cols !== this.options.inputSize) {
      throw new ShapeMismatchError(
        'approximator input has the wrong number of features',
        'Mlp.forward',
        [input.rows, this.options.inputSize],
        input.shape
      );
    }

    let h = input;
    const last = this.layers.length - 1;
    this.layers.forEach((layer, i) => {
      h = layer.forward(h);
      if (i < last) h = this.activate(h);
    });
    return h;
  }

  /**
   * Evaluate at (x, t) pairs without recording a graph
   */
  predict(x: ArrayLike<number>, t: ArrayLike<number>): Float64Array {
    return noGrad(() => this.forward(concatCols([Tensor.from(x), Tensor.from(t)])).data);
  }

  parameters(): Tensor[] {
    return this.layers.flatMap(layer => [layer.weight, layer.bias]);
  }

  get parameterCount(): number {
    return this.parameters().reduce((total, p) => total + p.size, 0);
  }
}
