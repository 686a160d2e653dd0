#!/usr/bin/env node

import { writeFileSync } from 'fs';
import { parseArgs } from './CliArgs.js';
import type { CliOptions } from './CliArgs.js';
import { formatTrainingError } from './Errors.js';
import type { Mlp } from './nn/Mlp.js';
import { exportParameters } from './nn/Serialization.js';
import { createHeatSolver } from './Solver.js';
import type { HeatSolver } from './Solver.js';

function printUsage() {
  console.log(`
heat-pinn - Physics-informed network for the 1-D heat equation

Solves u_t - u_xx = 0 on x in [0, 1], t in [0, T] with
u(x, 0) = sin(2 pi x), u(0, t) = 0 and a Neumann condition at the right edge.

Usage:
  heat-pinn [options]

Problem:
  --t-max <number>            End of the time interval (default: 1)
  --neumann <curve|fixed>     Neumann formulation (default: curve)
  --collocation <n>           Interior collocation points (default: 2000)
  --initial <n>               Initial-condition points (default: 100)
  --boundary <n>              Boundary times (default: 100)

Network:
  --width <n>                 Hidden layer width (default: 100)
  --depth <n>                 Hidden layers (default: 5)
  --activation <tanh|sin>     Hidden nonlinearity (default: tanh)
  --bias-init <number>        Initial bias value (default: 0.01)
  --seed <n>                  Random seed (default: 42)

Optimizer:
  --iterations <n>            L-BFGS iterations (default: 500)
  --evaluations <n>           Loss evaluations, 0 for 1.25 x iterations (default: 0)
  --history <n>               L-BFGS history size (default: 50)
  --tolerance-grad <number>   Gradient tolerance (default: 1e-7)
  --tolerance-change <number> Loss change tolerance (default: 1e-9)
  --line-search <strong-wolfe|none>  (default: strong-wolfe)
  --lr <number>               Step length (default: 1)
  --time-limit <ms>           Wall-clock ceiling, 0 for none (default: 0)

Output:
  --log-every <n>             Report every n evaluations (default: 50)
  --save <file.json>          Write the trained parameters
  --checkpoint-every <n>      Also write them every n evaluations
  --quiet                     Only print the summary
  --verbose                   Show stack traces on failure
  --help, -h                  Show this help message

Examples:
  heat-pinn --iterations 200 --collocation 500
  heat-pinn --neumann fixed --save weights.json
  `.trim());
}

function main() {
  const args = process.argv.slice(2);

  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  let cli: CliOptions;
  try {
    cli = parseArgs(args);
  } catch (err) {
    console.error(formatTrainingError(err));
    process.exit(1);
  }

  const savePath = cli.savePath;
  let solver: HeatSolver;
  try {
    solver = createHeatSolver(cli.config, {
      verbose: !cli.quiet,
      onCheckpoint: savePath
        ? record => writeSnapshot(savePath, solver.net, record.parameters, record.evaluation)
        : undefined
    });
  } catch (err) {
    console.error(formatTrainingError(err, cli.verbose));
    process.exit(1);
  }

  try {
    const result = solver.trainer.train();
    const b = result.breakdown;

    console.log(`Status: ${result.status} (${result.reason})`);
    console.log(`Iterations: ${result.iterations}, evaluations: ${result.evaluations}, time: ${(result.durationMs / 1000).toFixed(1)}s`);
    console.log(`Loss: ${b.total.toExponential(4)} = residual ${b.residual.toExponential(4)} + initial ${b.initial.toExponential(4)} + boundary ${b.boundary.toExponential(4)}`);
    console.log(`  boundary: dirichlet ${b.dirichlet.toExponential(4)}, neumann (${solver.config.neumann}) ${b.neumann.toExponential(4)}`);
    if (result.nonFiniteEvaluations > 0) {
      console.log(`Non-finite evaluations rejected: ${result.nonFiniteEvaluations}`);
    }

    const x0 = [0, 0.25, 0.5];
    const predicted = solver.net.predict(x0, [0, 0, 0]);
    console.log('\nPredictions at t = 0:');
    x0.forEach((x, i) => {
      console.log(`  u(${x.toFixed(2)}, 0) = ${predicted[i].toFixed(6)}   (exact ${Math.sin(2 * Math.PI * x).toFixed(6)})`);
    });

    if (savePath) {
      writeFileSync(savePath, JSON.stringify(exportParameters(solver.net, solver.trainer.evaluations)));
      console.log(`\nSaved parameters to ${savePath}`);
    }
  } catch (err) {
    console.error(formatTrainingError(err, cli.verbose));
    process.exit(1);
  }
}

/**
 * Write a checkpoint without touching the live parameters
 */
function writeSnapshot(path: string, net: Mlp, parameters: Float64Array, evaluation: number): void {
  const snapshot = exportParameters(net, evaluation);
  let offset = 0;
  for (const entry of snapshot.parameters) {
    entry.values = Array.from(parameters.subarray(offset, offset + entry.values.length));
    offset += entry.values.length;
  }
  writeFileSync(path, JSON.stringify(snapshot));
}

main();
