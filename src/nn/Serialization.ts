/**
 * JSON snapshots of network parameters
 */

import { ShapeMismatchError } from '../Errors.js';
import { Mlp } from './Mlp.js';
import type { MlpOptions } from './Mlp.js';

export interface SerializedTensor {
  name: string;
  shape: [number, number];
  values: number[];
}

export interface SerializedNetwork {
  format: 'heat-pinn/mlp';
  version: 1;
  options: Required<MlpOptions>;
  evaluations?: number;
  parameters: SerializedTensor[];
}

export function exportParameters(net: Mlp, evaluations?: number): SerializedNetwork {
  return {
    format: 'heat-pinn/mlp',
    version: 1,
    options: { ...net.options },
    evaluations,
    parameters: net.parameters().map((p, i) => ({
      name: p.name ?? `param${i}`,
      shape: [p.rows, p.cols],
      values: p.toArray()
    }))
  };
}

/**
 * Copy snapshot values into an existing network of the same architecture
 */
export function loadParameters(net: Mlp, snapshot: SerializedNetwork): void {
  const params = net.parameters();
  if (snapshot.parameters.length !== params.length) {
    throw new ShapeMismatchError(
      `snapshot has ${snapshot.parameters.length} tensors, network has ${params.length}`,
      'loadParameters'
    );
  }

  snapshot.parameters.forEach((entry, i) => {
    const target = params[i];
    const [rows, cols] = entry.shape;
    if (rows !== target.rows || cols !== target.cols || entry.values.length !== target.size) {
      throw new ShapeMismatchError(`tensor '${entry.name}' does not fit`, 'loadParameters', target.shape, entry.shape);
    }
    target.data.set(entry.values);
    target.zeroGrad();
  });
}

/**
 * Rebuild a network from a snapshot
 */
export function restoreMlp(snapshot: SerializedNetwork): Mlp {
  if (snapshot.format !== 'heat-pinn/mlp' || snapshot.version !== 1) {
    throw new Error(`Unsupported snapshot format: ${String(snapshot.format)} v${String(snapshot.version)}`);
  }
  const net = new Mlp(snapshot.options);
  loadParameters(net, snapshot);
  return net;
}
