/**
 * Command-line flag parsing
 */

import type { HeatPinnConfig } from './Config.js';
import { ConfigError } from './Errors.js';

type NumericFlag = {
  [K in keyof HeatPinnConfig]-?: Required<HeatPinnConfig>[K] extends number ? K : never
}[keyof HeatPinnConfig];

const NUMERIC_FLAGS: Record<string, NumericFlag> = {
  '--t-max': 'tMax',
  '--collocation': 'nCollocation',
  '--initial': 'nInitial',
  '--boundary': 'nBoundary',
  '--width': 'hiddenWidth',
  '--depth': 'hiddenLayers',
  '--bias-init': 'biasInit',
  '--seed': 'seed',
  '--iterations': 'maxIterations',
  '--evaluations': 'maxEvaluations',
  '--history': 'historySize',
  '--tolerance-grad': 'toleranceGrad',
  '--tolerance-change': 'toleranceChange',
  '--lr': 'lr',
  '--time-limit': 'maxDurationMs',
  '--log-every': 'logEvery',
  '--checkpoint-every': 'checkpointEvery'
};

export interface CliOptions {
  config: HeatPinnConfig;
  savePath?: string;
  quiet: boolean;
  verbose: boolean;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { config: {}, quiet: false, verbose: false };

  const takeValue = (flag: string, i: number): string => {
    if (i >= args.length) {
      throw new ConfigError('missing value', flag);
    }
    return args[i];
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const numericKey = NUMERIC_FLAGS[arg];

    if (numericKey) {
      const raw = takeValue(arg, ++i);
      const value = Number(raw);
      if (raw.trim() === '' || Number.isNaN(value)) {
        throw new ConfigError('expected a number', arg, raw);
      }
      options.config[numericKey] = value;
    } else if (arg === '--neumann') {
      const value = takeValue(arg, ++i);
      if (value !== 'curve' && value !== 'fixed') {
        throw new ConfigError('must be curve or fixed', arg, value);
      }
      options.config.neumann = value;
    } else if (arg === '--activation') {
      const value = takeValue(arg, ++i);
      if (value !== 'tanh' && value !== 'sin') {
        throw new ConfigError('must be tanh or sin', arg, value);
      }
      options.config.activation = value;
    } else if (arg === '--line-search') {
      const value = takeValue(arg, ++i);
      if (value !== 'strong-wolfe' && value !== 'none') {
        throw new ConfigError('must be strong-wolfe or none', arg, value);
      }
      options.config.lineSearch = value;
    } else if (arg === '--save') {
      const value = takeValue(arg, ++i);
      if (!value.endsWith('.json')) {
        throw new ConfigError('output file must have .json extension', arg, value);
      }
      options.savePath = value;
    } else if (arg === '--quiet') {
      options.quiet = true;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else {
      throw new ConfigError('unknown option', arg);
    }
  }

  return options;
}
