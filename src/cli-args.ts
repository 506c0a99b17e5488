import type { BatchQuery } from './batch/run-batch.js';
import { ConfigurationError } from './errors/index.js';

export interface CliOptions {
  queries: BatchQuery[];
  /** Target selection: 'all', comma-separated fragments, or a '*' glob */
  targets?: string;
  output?: string;
  json: boolean;
  config?: string;
  env?: string;
  verbose: boolean;
  help: boolean;
}

const VALUE_FLAGS = new Set(['--query', '--name', '--targets', '--output', '--config', '--env']);

/**
 * Parse command-line arguments.
 * `--name` names the `--query` before it; with several queries, unnamed ones
 * are numbered so their output files do not collide.
 */
export function parseCliArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { queries: [], json: false, verbose: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      options.help = true;
      continue;
    }
    if (arg === '--json') {
      options.json = true;
      continue;
    }
    if (arg === '--verbose') {
      options.verbose = true;
      continue;
    }
    if (!VALUE_FLAGS.has(arg)) {
      throw new ConfigurationError(`Unknown option ${arg}`);
    }

    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ConfigurationError(`Missing value for ${arg}`);
    }
    i += 1;

    switch (arg) {
      case '--query':
        options.queries.push({ query: value });
        break;
      case '--name': {
        const last = options.queries[options.queries.length - 1];
        if (!last) {
          throw new ConfigurationError('--name must follow the --query it names');
        }
        last.name = value;
        break;
      }
      case '--targets':
        options.targets = value;
        break;
      case '--output':
        options.output = value;
        break;
      case '--config':
        options.config = value;
        break;
      case '--env':
        options.env = value;
        break;
    }
  }

  if (options.queries.length > 1) {
    options.queries = options.queries.map((planned, index) =>
      planned.name === undefined ? { ...planned, name: `query-${index + 1}` } : planned
    );
  }

  return options;
}
