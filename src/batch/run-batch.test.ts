import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runBatch, selectTargets, formatSummary, toJsonReport } from './run-batch.js';
import type { QueryResponse, RemoteQueryService, Target } from '../client/types.js';
import { DEFAULT_SETTINGS, type Settings } from '../config/settings.js';
import { AuthenticationError, ConfigurationError, RemoteApiError } from '../errors/index.js';

const alpha: Target = { id: 'ws-a1', name: 'prod-alpha', group: 'Prod' };
const beta: Target = { id: 'ws-b2', name: 'prod-beta', group: 'Prod' };
const gamma: Target = { id: 'ws-c3', name: 'dev-gamma', group: 'Dev' };

const RUN = '2024-01-02_03-04-05';

const twoRows: QueryResponse = {
  tables: [
    {
      name: 'PrimaryResult',
      columns: [
        { name: 'n', type: 'int' },
        { name: 'label', type: 'string' },
      ],
      rows: [
        [1, 'a'],
        [2, 'b'],
      ],
    },
  ],
};

function fakeService(overrides: Partial<RemoteQueryService> = {}): RemoteQueryService {
  return {
    forceValidateAuth: vi.fn(async () => {}),
    validateAuth: vi.fn(async () => {}),
    listTargets: vi.fn(async () => ({
      targets: [alpha, beta, gamma],
      warnings: ["No targets found in group 'Sandbox' (sub-9)"],
    })),
    query: vi.fn(async (targetId: string) => {
      if (targetId === beta.id) throw new RemoteApiError(500, 'Internal server error');
      return twoRows;
    }),
    queryNextPage: vi.fn(async (link: string) => Promise.reject(new Error(`unexpected link ${link}`))),
    ...overrides,
  };
}

describe('selectTargets', () => {
  const all = [alpha, beta, gamma];

  it('selects everything for all', () => {
    expect(selectTargets(all, 'all')).toEqual(all);
    expect(selectTargets(all, '')).toEqual(all);
  });

  it('matches fragments of ids or names', () => {
    expect(selectTargets(all, 'ws-a1, beta')).toEqual([alpha, beta]);
    expect(selectTargets(all, 'nothing')).toEqual([]);
  });

  it('matches globs against whole names', () => {
    expect(selectTargets(all, 'prod-*')).toEqual([alpha, beta]);
    expect(selectTargets(all, '*gamma')).toEqual([gamma]);
    expect(selectTargets(all, 'prod*a')).toEqual([alpha, beta]);
    expect(selectTargets(all, 'alpha*')).toEqual([]);
  });
});

describe('runBatch', () => {
  let dir: string;
  let settings: Settings;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fleetquery-batch-'));
    settings = { ...DEFAULT_SETTINGS, output_folder: dir };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reports exit code 0 when some jobs fail', async () => {
    const warnings: string[] = [];
    const finished: string[] = [];

    const result = await runBatch({
      service: fakeService(),
      queries: [{ name: 'Recent Events', query: 'Events | take 2' }],
      selection: 'prod-*',
      settings,
      now: () => new Date(2024, 0, 2, 3, 4, 5),
      callbacks: {
        onWarning: (message) => warnings.push(message),
        onJobFinished: (job) => finished.push(`${job.target.name}:${job.status}`),
      },
    });

    expect(result.exitCode).toBe(0);
    expect(result).toMatchObject({ total: 2, succeeded: 1, failed: 1 });
    expect(result.results.map((job) => [job.id, job.target.name, job.status])).toEqual([
      [1, 'prod-alpha', 'completed'],
      [2, 'prod-beta', 'failed'],
    ]);
    expect(warnings).toEqual(["No targets found in group 'Sandbox' (sub-9)"]);
    expect(finished.sort()).toEqual(['prod-alpha:completed', 'prod-beta:failed']);

    const csv = await readFile(join(dir, 'prod', 'prod-alpha', RUN, 'recent-events.csv'), 'utf-8');
    expect(csv).toBe('n,label\n1,a\n2,b\n');

    expect(formatSummary(result)).toBe(
      [
        '--- Summary ---',
        'Total executions: 2',
        'Succeeded: 1',
        'Failed: 1',
        '',
        'Failed executions:',
        '  - prod-beta [recent-events]: Internal server error',
      ].join('\n')
    );

    expect(toJsonReport(result.results)).toEqual([
      {
        target: 'prod-alpha',
        target_id: 'ws-a1',
        query: 'recent-events',
        success: true,
        elapsed_ms: 0,
        data: {
          row_count: 2,
          page_count: 1,
          output_path: join(dir, 'prod', 'prod-alpha', RUN, 'recent-events.csv'),
          file_size: 16,
        },
        error: null,
      },
      {
        target: 'prod-beta',
        target_id: 'ws-b2',
        query: 'recent-events',
        success: false,
        elapsed_ms: 0,
        data: null,
        error: 'Internal server error',
      },
    ]);
  });

  it('stops before listing targets when credentials are rejected', async () => {
    const service = fakeService({
      forceValidateAuth: vi.fn(async () => Promise.reject(new AuthenticationError('Authentication validation failed: expired'))),
    });

    await expect(
      runBatch({ service, queries: [{ name: 'q', query: 'Events' }], settings })
    ).rejects.toThrow(AuthenticationError);
    expect(service.listTargets).not.toHaveBeenCalled();
  });

  it('refuses a selection that matches nothing', async () => {
    const service = fakeService();

    await expect(
      runBatch({ service, queries: [{ name: 'q', query: 'Events' }], selection: 'zzz', settings })
    ).rejects.toThrow("No targets selected for execution\n  - 'zzz' matched none of 3 targets");
    expect(service.query).not.toHaveBeenCalled();
  });

  it('requires at least one query', async () => {
    await expect(runBatch({ service: fakeService(), queries: [], settings })).rejects.toThrow(ConfigurationError);
  });
});
