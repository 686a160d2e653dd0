/**
 * Reverse-mode differentiation engine
 * Walks recorded graph nodes from the outputs back to the requested inputs
 */

import { GraphViolationError, ShapeMismatchError } from '../Errors.js';
import { add, onesLike } from './Ops.js';
import { Tensor, noGrad, sameShape, withGradMode } from './Tensor.js';

export interface GradOptions {
  /** Weights for each output (required unless the output is 1x1) */
  gradOutputs?: readonly Tensor[];

  /** Record the backward pass so the result can be differentiated again */
  createGraph?: boolean;

  /** Keep the graph usable after this pass (default: createGraph) */
  retainGraph?: boolean;

  /** Return null for inputs the outputs do not depend on instead of throwing */
  allowUnused?: boolean;
}

export interface BackwardOptions {
  gradOutput?: Tensor;
  retainGraph?: boolean;

  /** Only accumulate into these leaves (default: every reachable leaf) */
  inputs?: readonly Tensor[];
}

/**
 * Tensors reachable from roots through nodes that require grad, ordered so
 * every tensor comes after all tensors computed from it
 */
function topologicalOrder(roots: readonly Tensor[]): Tensor[] {
  const visited = new Set<number>();
  const postOrder: Tensor[] = [];
  const stack: Array<{ tensor: Tensor; expanded: boolean }> = [];

  for (const root of roots) {
    stack.push({ tensor: root, expanded: false });
  }

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { tensor, expanded } = frame;

    if (expanded) {
      postOrder.push(tensor);
      continue;
    }
    if (visited.has(tensor.id)) continue;
    visited.add(tensor.id);

    stack.push({ tensor, expanded: true });
    if (tensor.node) {
      for (const input of tensor.node.inputs) {
        if (input.requiresGrad && !visited.has(input.id)) {
          stack.push({ tensor: input, expanded: false });
        }
      }
    }
  }

  return postOrder.reverse();
}

function seedGradients(outputs: readonly Tensor[], gradOutputs: readonly Tensor[] | undefined, operation: string): Tensor[] {
  if (gradOutputs && gradOutputs.length !== outputs.length) {
    throw new ShapeMismatchError(
      `${gradOutputs.length} gradient outputs for ${outputs.length} outputs`,
      operation
    );
  }

  return outputs.map((output, i) => {
    const seed = gradOutputs?.[i];
    if (seed) {
      if (!sameShape(seed, output)) {
        throw new ShapeMismatchError('gradient output must match its output', operation, output.shape, seed.shape);
      }
      return seed;
    }
    if (output.size !== 1) {
      throw new ShapeMismatchError(
        'gradients can only be seeded implicitly for 1x1 outputs; pass gradOutputs',
        operation,
        [1, 1],
        output.shape
      );
    }
    return onesLike(output);
  });
}

/**
 * Propagate seeds through the graph; returns the gradient of every visited tensor
 */
function propagate(
  outputs: readonly Tensor[],
  seeds: readonly Tensor[],
  createGraph: boolean,
  retainGraph: boolean,
  operation: string
): Map<Tensor, Tensor> {
  const order = topologicalOrder(outputs);
  const grads = new Map<Tensor, Tensor>();

  const accumulate = (tensor: Tensor, grad: Tensor) => {
    const existing = grads.get(tensor);
    grads.set(tensor, existing ? add(existing, grad) : grad);
  };

  withGradMode(createGraph, () => {
    outputs.forEach((output, i) => accumulate(output, seeds[i]));

    for (const tensor of order) {
      const node = tensor.node;
      const gradOutput = grads.get(tensor);
      if (!node || !gradOutput) continue;

      if (!node.backward) {
        throw new GraphViolationError(
          'the graph has already been released',
          operation,
          `node '${node.op}' was freed by an earlier pass; pass retainGraph to differentiate twice`
        );
      }

      const inputGrads = node.backward(gradOutput);
      node.inputs.forEach((input, i) => {
        const inputGrad = inputGrads[i];
        if (inputGrad && input.requiresGrad) {
          accumulate(input, inputGrad);
        }
      });
    }
  });

  if (!retainGraph) {
    for (const tensor of order) {
      if (tensor.node) tensor.node.backward = null;
    }
  }

  return grads;
}

/**
 * Gradients of sum(gradOutputs * outputs) with respect to each input
 */
export function grad(
  outputs: readonly Tensor[],
  inputs: readonly Tensor[],
  options: GradOptions = {}
): Array<Tensor | null> {
  const createGraph = options.createGraph ?? false;
  const retainGraph = options.retainGraph ?? createGraph;

  for (const input of inputs) {
    if (!input.requiresGrad) {
      throw new GraphViolationError(
        'input is not a differentiation variable',
        'grad',
        `flag ${input.toString()} with requiresGrad_() before computing with it`
      );
    }
  }
  for (const output of outputs) {
    if (!output.requiresGrad) {
      throw new GraphViolationError(
        'output is not part of any computation graph',
        'grad',
        `${output.toString()} was not computed from a differentiation variable`
      );
    }
  }

  const seeds = seedGradients(outputs, options.gradOutputs, 'grad');
  const grads = propagate(outputs, seeds, createGraph, retainGraph, 'grad');

  return inputs.map(input => {
    const result = grads.get(input);
    if (result) return result;
    if (options.allowUnused) return null;
    throw new GraphViolationError(
      'input is not part of the output graph',
      'grad',
      `${input.toString()} does not reach the outputs; pass allowUnused to get null instead`
    );
  });
}

/**
 * Accumulate d(root)/d(leaf) into leaf.grad for every reachable leaf that
 * requires grad. The graph is released afterwards unless retainGraph is set.
 */
export function backward(root: Tensor, options: BackwardOptions = {}): void {
  if (!root.requiresGrad) {
    throw new GraphViolationError(
      'tensor is not part of any computation graph',
      'backward',
      `${root.toString()} was not computed from a differentiation variable`
    );
  }

  const seeds = seedGradients([root], options.gradOutput ? [options.gradOutput] : undefined, 'backward');
  const grads = propagate([root], seeds, false, options.retainGraph ?? false, 'backward');

  const targets = options.inputs ? new Set(options.inputs) : null;
  noGrad(() => {
    for (const [tensor, g] of grads) {
      if (!tensor.isLeaf || (targets && !targets.has(tensor))) continue;
      tensor.grad = tensor.grad ? add(tensor.grad, g) : g;
    }
  });
}
