import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpQueryService, extractResourceGroup } from './http-service.js';
import type { TokenProvider } from '../auth/types.js';
import {
  AuthenticationError,
  NetworkError,
  OtherError,
  QuerySyntaxError,
  RateLimitExceededError,
  RemoteApiError,
} from '../errors/index.js';
import { BufferOutput, createStructuredLogger } from '../observability/logger.js';

const QUERY_SCOPE = 'https://api.loganalytics.io/.default';
const MANAGEMENT_SCOPE = 'https://management.azure.com/.default';

function fakeTokens() {
  const getToken = vi.fn(async (scope: string) => `test-token:${scope}`);
  const tokens: TokenProvider = { getToken };
  return { tokens, getToken };
}

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init });
}

const onePage = {
  tables: [
    {
      name: 'PrimaryResult',
      columns: [
        { name: 'Computer', type: 'string' },
        { name: 'Count', type: 'long' },
      ],
      rows: [['web-01', 3]],
    },
  ],
};

describe('HttpQueryService', () => {
  let originalFetch: typeof globalThis.fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  describe('query', () => {
    it('posts the query with a bearer token for the query scope', async () => {
      const { tokens } = fakeTokens();
      const service = new HttpQueryService({ tokens });
      let capturedUrl = '';
      let capturedInit: RequestInit | undefined;

      globalThis.fetch = vi.fn(async (url: string | URL | Request, init?: RequestInit) => {
        capturedUrl = url.toString();
        capturedInit = init;
        return jsonResponse({ ...onePage, nextLink: 'https://api.loganalytics.io/next?page=2' });
      });

      const response = await service.query('ws-1', 'Heartbeat | count', { timespan: 'P1D' });

      expect(capturedUrl).toBe('https://api.loganalytics.io/v1/workspaces/ws-1/query');
      expect(capturedInit?.method).toBe('POST');
      expect(capturedInit?.body).toBe(JSON.stringify({ query: 'Heartbeat | count', timespan: 'P1D' }));
      expect(capturedInit?.headers).toEqual({
        Authorization: `Bearer test-token:${QUERY_SCOPE}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      });
      expect(response.tables[0].rows).toEqual([['web-01', 3]]);
      expect(response.nextLink).toBe('https://api.loganalytics.io/next?page=2');
    });

    it('leaves nextLink out when the server sends null', async () => {
      const service = new HttpQueryService({ tokens: fakeTokens().tokens });
      globalThis.fetch = vi.fn(async () => jsonResponse({ ...onePage, nextLink: null }));

      const response = await service.query('ws-1', 'T');

      expect(response).toEqual(onePage);
      expect('nextLink' in response).toBe(false);
    });

    it('raises a rate limit error with Retry-After seconds on 429', async () => {
      const service = new HttpQueryService({ tokens: fakeTokens().tokens });
      globalThis.fetch = vi.fn(async () => new Response('slow down', { status: 429, headers: { 'Retry-After': '17' } }));

      const error = await service.query('ws-1', 'T').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitExceededError);
      expect(error instanceof RateLimitExceededError && error.retryAfterSeconds).toBe(17);
    });

    it('defaults Retry-After to 60 seconds', async () => {
      const service = new HttpQueryService({ tokens: fakeTokens().tokens });
      globalThis.fetch = vi.fn(async () => new Response('', { status: 429 }));

      const error = await service.query('ws-1', 'T').catch((e: unknown) => e);

      expect(error instanceof RateLimitExceededError && error.retryAfterSeconds).toBe(60);
    });

    it('classifies server errors with the target in the message', async () => {
      const service = new HttpQueryService({ tokens: fakeTokens().tokens });
      globalThis.fetch = vi.fn(async () => jsonResponse({ error: { message: 'Internal' } }, { status: 500 }));

      const error = await service.query('ws-1', 'T').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RemoteApiError);
      expect(error instanceof RemoteApiError && error.status).toBe(500);
      expect(error instanceof Error && error.message).toBe('Query failed for target ws-1: Internal');
    });

    it('classifies bad requests as query syntax errors', async () => {
      const service = new HttpQueryService({ tokens: fakeTokens().tokens });
      globalThis.fetch = vi.fn(async () => jsonResponse({ error: { message: 'Bad query' } }, { status: 400 }));

      await expect(service.query('ws-1', 'T |')).rejects.toThrow(QuerySyntaxError);
    });

    it('wraps transport failures as network errors', async () => {
      const service = new HttpQueryService({ tokens: fakeTokens().tokens });
      globalThis.fetch = vi.fn(async () => {
        throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED') });
      });

      const error = await service.query('ws-1', 'T').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NetworkError);
      expect(error instanceof Error && error.message).toBe('HTTP request failed: fetch failed (connect ECONNREFUSED)');
    });

    it('rejects bodies that are not query responses', async () => {
      const service = new HttpQueryService({ tokens: fakeTokens().tokens });
      globalThis.fetch = vi.fn(async () => jsonResponse({ tables: 'nope' }));

      await expect(service.query('ws-1', 'T')).rejects.toThrow(OtherError);
      await expect(service.query('ws-1', 'T')).rejects.toThrow(/^Failed to parse query response: tables: /);
    });
  });

  describe('queryNextPage', () => {
    it('fetches the continuation link as is', async () => {
      const service = new HttpQueryService({ tokens: fakeTokens().tokens });
      let capturedUrl = '';
      globalThis.fetch = vi.fn(async (url: string | URL | Request) => {
        capturedUrl = url.toString();
        return jsonResponse(onePage);
      });

      await service.queryNextPage('https://api.loganalytics.io/next?page=2');

      expect(capturedUrl).toBe('https://api.loganalytics.io/next?page=2');
    });
  });

  describe('validateAuth', () => {
    it('validates at most once per interval', async () => {
      let clock = 0;
      const { tokens, getToken } = fakeTokens();
      const service = new HttpQueryService({ tokens, validationIntervalMs: 1000, now: () => clock });

      await service.validateAuth();
      clock = 999;
      await service.validateAuth();
      expect(getToken).toHaveBeenCalledTimes(1);

      clock = 1000;
      await service.validateAuth();
      expect(getToken).toHaveBeenCalledTimes(2);
      expect(getToken).toHaveBeenLastCalledWith(MANAGEMENT_SCOPE);
    });

    it('always validates when forced', async () => {
      const { tokens, getToken } = fakeTokens();
      const service = new HttpQueryService({ tokens, now: () => 0 });

      await service.validateAuth();
      await service.forceValidateAuth();

      expect(getToken).toHaveBeenCalledTimes(2);
    });

    it('raises an authentication error when no token is available', async () => {
      const tokens: TokenProvider = { getToken: vi.fn().mockRejectedValue(new Error('not logged in')) };
      const service = new HttpQueryService({ tokens });

      await expect(service.validateAuth()).rejects.toThrow(AuthenticationError);
      await expect(service.validateAuth()).rejects.toThrow('Authentication validation failed: not logged in');
    });
  });

  describe('listTargets', () => {
    it('lists targets per group and keeps going past failing groups', async () => {
      const output = new BufferOutput();
      const logger = createStructuredLogger({ console: false, outputs: [output] });
      const service = new HttpQueryService({ tokens: fakeTokens().tokens, logger });

      globalThis.fetch = vi.fn(async (url: string | URL | Request) => {
        const href = url.toString();
        if (href === 'https://management.azure.com/subscriptions?api-version=2020-01-01') {
          return jsonResponse({
            value: [
              { subscriptionId: 'sub-1', displayName: 'Prod', tenantId: 'tenant-1', state: 'Enabled' },
              { subscriptionId: 'sub-2', displayName: 'Dev', tenantId: 'tenant-1', state: 'Enabled' },
            ],
          });
        }
        if (href.includes('/subscriptions/sub-1/')) {
          return jsonResponse({
            value: [
              {
                id: '/subscriptions/sub-1/resourceGroups/rg-logs/providers/Microsoft.OperationalInsights/workspaces/prod-logs',
                name: 'prod-logs',
                location: 'westeurope',
                properties: { customerId: 'cust-1' },
              },
            ],
          });
        }
        return new Response('denied', { status: 403 });
      });

      const listing = await service.listTargets();

      expect(listing.targets).toEqual([
        {
          id: 'cust-1',
          name: 'prod-logs',
          group: 'Prod',
          groupId: 'sub-1',
          resourceId:
            '/subscriptions/sub-1/resourceGroups/rg-logs/providers/Microsoft.OperationalInsights/workspaces/prod-logs',
          resourceGroup: 'rg-logs',
          location: 'westeurope',
          tenantId: 'tenant-1',
        },
      ]);
      expect(listing.warnings).toEqual([
        "Failed to list targets in group 'Dev' (sub-2): Remote rejected credentials (status 403): denied",
      ]);
      expect(output.filter((entry) => entry.level === 'warn')).toHaveLength(1);
    });

    it('fails when no group has targets', async () => {
      const service = new HttpQueryService({ tokens: fakeTokens().tokens });
      globalThis.fetch = vi.fn(async (url: string | URL | Request) =>
        url.toString().includes('/providers/')
          ? jsonResponse({ value: [] })
          : jsonResponse({ value: [{ subscriptionId: 'sub-1', displayName: 'Prod' }] })
      );

      await expect(service.listTargets()).rejects.toThrow('No targets found in any group');
    });
  });
});

describe('extractResourceGroup', () => {
  it('reads the segment after resourceGroups', () => {
    expect(extractResourceGroup('/subscriptions/s/resourceGroups/my-rg/providers/x')).toBe('my-rg');
    expect(extractResourceGroup('/subscriptions/s')).toBeUndefined();
  });
});
