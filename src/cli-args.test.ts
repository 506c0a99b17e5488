import { describe, it, expect } from 'vitest';
import { parseCliArgs } from './cli-args.js';
import { ConfigurationError } from './errors/index.js';

describe('parseCliArgs', () => {
  it('reads every option', () => {
    const options = parseCliArgs([
      '--query',
      'Events | take 10',
      '--name',
      'Recent Events',
      '--targets',
      'prod-*',
      '--output',
      './exports',
      '--config',
      'fleetquery.json',
      '--env',
      '.env.test',
      '--json',
      '--verbose',
    ]);

    expect(options).toEqual({
      queries: [{ query: 'Events | take 10', name: 'Recent Events' }],
      targets: 'prod-*',
      output: './exports',
      config: 'fleetquery.json',
      env: '.env.test',
      json: true,
      verbose: true,
      help: false,
    });
  });

  it('leaves a single unnamed query to the configured job name', () => {
    expect(parseCliArgs(['--query', 'Events']).queries).toEqual([{ query: 'Events' }]);
  });

  it('numbers unnamed queries when there are several', () => {
    const { queries } = parseCliArgs(['--query', 'A', '--query', 'B', '--name', 'second', '--query', 'C']);

    expect(queries).toEqual([
      { query: 'A', name: 'query-1' },
      { query: 'B', name: 'second' },
      { query: 'C', name: 'query-3' },
    ]);
  });

  it('rejects bad input', () => {
    expect(() => parseCliArgs(['--name', 'x'])).toThrow('--name must follow the --query it names');
    expect(() => parseCliArgs(['--query'])).toThrow('Missing value for --query');
    expect(() => parseCliArgs(['--targets', '--json'])).toThrow('Missing value for --targets');
    expect(() => parseCliArgs(['--dry-run'])).toThrow(ConfigurationError);
  });

  it('flags help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
  });
});
