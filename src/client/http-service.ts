import { z } from 'zod';
import type {
  QueryOptions,
  QueryResponse,
  RemoteQueryService,
  RequestOptions,
  Target,
  TargetListing,
} from './types.js';
import type { TokenProvider } from '../auth/types.js';
import { REMOTE_DEFAULTS, AUTH_DEFAULTS, HTTP_DEFAULT_HEADERS } from '../config/constants.js';
import {
  AuthenticationError,
  NetworkError,
  OtherError,
  classifyStatus,
  type ClassifyContext,
  type QueryError,
} from '../errors/index.js';
import { silentLogger, type StructuredLogger } from '../observability/logger.js';
import { errorMessage, getProperty } from '../utils/type-guards.js';

const queryResponseSchema = z.object({
  tables: z.array(
    z.object({
      name: z.string(),
      columns: z.array(z.object({ name: z.string(), type: z.string() })),
      rows: z.array(z.array(z.unknown())),
    })
  ),
  nextLink: z.string().nullish(),
});

const groupListSchema = z.object({
  value: z.array(
    z.object({
      subscriptionId: z.string(),
      displayName: z.string(),
      tenantId: z.string().optional(),
      state: z.string().optional(),
    })
  ),
});

const targetListSchema = z.object({
  value: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      location: z.string().optional(),
      properties: z.object({ customerId: z.string() }),
    })
  ),
});

type Group = z.infer<typeof groupListSchema>['value'][number];

export interface HttpQueryServiceConfig {
  tokens: TokenProvider;
  queryBaseUrl?: string;
  managementBaseUrl?: string;
  queryScope?: string;
  managementScope?: string;
  /** Minimum time between credential validations */
  validationIntervalMs?: number;
  now?: () => number;
  logger?: StructuredLogger;
}

/**
 * Remote query service over fetch.
 *
 * Every failure leaves this class already classified: transport errors as
 * NetworkError, non-2xx responses through classifyStatus, malformed bodies
 * as OtherError.
 */
export class HttpQueryService implements RemoteQueryService {
  private readonly tokens: TokenProvider;
  private readonly queryBaseUrl: string;
  private readonly managementBaseUrl: string;
  private readonly queryScope: string;
  private readonly managementScope: string;
  private readonly validationIntervalMs: number;
  private readonly now: () => number;
  private readonly logger: StructuredLogger;
  private lastValidatedAt: number | undefined;

  constructor(config: HttpQueryServiceConfig) {
    this.tokens = config.tokens;
    this.queryBaseUrl = trimSlash(config.queryBaseUrl ?? REMOTE_DEFAULTS.QUERY_BASE_URL);
    this.managementBaseUrl = trimSlash(config.managementBaseUrl ?? REMOTE_DEFAULTS.MANAGEMENT_BASE_URL);
    this.queryScope = config.queryScope ?? REMOTE_DEFAULTS.QUERY_SCOPE;
    this.managementScope = config.managementScope ?? REMOTE_DEFAULTS.MANAGEMENT_SCOPE;
    this.validationIntervalMs = config.validationIntervalMs ?? AUTH_DEFAULTS.VALIDATION_INTERVAL_MS;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? silentLogger();
  }

  async validateAuth(): Promise<void> {
    if (this.lastValidatedAt !== undefined && this.now() - this.lastValidatedAt < this.validationIntervalMs) {
      return;
    }
    await this.forceValidateAuth();
  }

  async forceValidateAuth(): Promise<void> {
    try {
      await this.tokens.getToken(this.managementScope);
    } catch (error) {
      throw new AuthenticationError(`Authentication validation failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    this.lastValidatedAt = this.now();
  }

  async query(targetId: string, queryText: string, options: QueryOptions = {}): Promise<QueryResponse> {
    await this.validateAuth();
    const token = await this.bearer(this.queryScope);

    const url = `${this.queryBaseUrl}/v1/workspaces/${encodeURIComponent(targetId)}/query`;
    this.logger.debug('Querying target', { targetId });

    const response = await this.send(
      url,
      {
        method: 'POST',
        headers: this.headers(token),
        body: JSON.stringify({ query: queryText, timespan: options.timespan }),
        signal: options.signal,
      },
      { prefix: `Query failed for target ${targetId}`, target: targetId, timeoutMs: options.timeoutMs }
    );

    return this.parseQueryResponse(response);
  }

  async queryNextPage(nextLink: string, options: RequestOptions = {}): Promise<QueryResponse> {
    await this.validateAuth();
    const token = await this.bearer(this.queryScope);

    const response = await this.send(
      nextLink,
      { method: 'GET', headers: this.headers(token), signal: options.signal },
      { prefix: 'Pagination failed', timeoutMs: options.timeoutMs }
    );

    return this.parseQueryResponse(response);
  }

  async listTargets(): Promise<TargetListing> {
    await this.validateAuth();

    const groups = await this.listGroups();
    if (groups.length === 0) {
      throw new OtherError('No subscriptions found for the signed-in account');
    }

    const token = await this.bearer(this.managementScope);
    const targets: Target[] = [];
    const warnings: string[] = [];

    for (const group of groups) {
      const label = `'${group.displayName}' (${group.subscriptionId})`;
      const url =
        `${this.managementBaseUrl}/subscriptions/${encodeURIComponent(group.subscriptionId)}` +
        `/providers/Microsoft.OperationalInsights/workspaces?api-version=${REMOTE_DEFAULTS.WORKSPACES_API_VERSION}`;

      // One group failing must not hide the others
      let body: unknown;
      try {
        const response = await this.send(url, { method: 'GET', headers: this.headers(token) }, {});
        body = await this.readJson(response, 'target list');
      } catch (error) {
        warnings.push(`Failed to list targets in group ${label}: ${errorMessage(error)}`);
        continue;
      }

      const parsed = targetListSchema.safeParse(body);
      if (!parsed.success) {
        warnings.push(`Failed to parse target list for group ${label}`);
        continue;
      }
      if (parsed.data.value.length === 0) {
        warnings.push(`No targets found in group ${label}`);
        continue;
      }

      for (const resource of parsed.data.value) {
        targets.push({
          id: resource.properties.customerId,
          name: resource.name,
          group: group.displayName,
          groupId: group.subscriptionId,
          resourceId: resource.id,
          resourceGroup: extractResourceGroup(resource.id),
          location: resource.location,
          tenantId: group.tenantId,
        });
      }
    }

    for (const warning of warnings) {
      this.logger.warn(warning);
    }

    if (targets.length === 0) {
      throw new OtherError('No targets found in any group');
    }

    return { targets, warnings };
  }

  private async listGroups(): Promise<Group[]> {
    const token = await this.bearer(this.managementScope);
    const url = `${this.managementBaseUrl}/subscriptions?api-version=${REMOTE_DEFAULTS.SUBSCRIPTIONS_API_VERSION}`;

    const response = await this.send(url, { method: 'GET', headers: this.headers(token) }, {
      prefix: 'Listing subscriptions failed',
    });
    const parsed = groupListSchema.safeParse(await this.readJson(response, 'subscription list'));
    if (!parsed.success) {
      throw new OtherError(`Failed to parse subscription list: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data.value;
  }

  private async bearer(scope: string): Promise<string> {
    try {
      return await this.tokens.getToken(scope);
    } catch (error) {
      throw new AuthenticationError(`Failed to get token for ${scope}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private headers(token: string): Record<string, string> {
    return {
      Authorization: `Bearer ${token}`,
      'Content-Type': HTTP_DEFAULT_HEADERS.CONTENT_TYPE,
      Accept: HTTP_DEFAULT_HEADERS.ACCEPT,
    };
  }

  private async send(url: string, init: RequestInit, context: ClassifyContext): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      throw new NetworkError(`HTTP request failed: ${describeFetchError(error)}`, undefined, { cause: error });
    }

    if (!response.ok) {
      throw await this.failure(response, context);
    }
    return response;
  }

  private async failure(response: Response, context: ClassifyContext): Promise<QueryError> {
    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      body = `(body unreadable: ${errorMessage(error)})`;
    }

    this.logger.debug('Remote request failed', { status: response.status, url: response.url });
    return classifyStatus(response.status, body, {
      ...context,
      retryAfter: response.headers.get('retry-after'),
    });
  }

  private async readJson(response: Response, what: string): Promise<unknown> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new NetworkError(`Failed to read ${what}: ${errorMessage(error)}`, response.status, { cause: error });
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new OtherError(`Failed to parse ${what}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async parseQueryResponse(response: Response): Promise<QueryResponse> {
    const parsed = queryResponseSchema.safeParse(await this.readJson(response, 'query response'));
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new OtherError(
        `Failed to parse query response: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`
      );
    }

    const { tables, nextLink } = parsed.data;
    return nextLink ? { tables, nextLink } : { tables };
  }
}

/**
 * Resource group segment of an ARM resource id
 */
export function extractResourceGroup(resourceId: string): string | undefined {
  const parts = resourceId.split('/');
  const index = parts.findIndex((part) => part.toLowerCase() === 'resourcegroups');
  return index >= 0 && index + 1 < parts.length ? parts[index + 1] : undefined;
}

function trimSlash(url: string): string {
  return url.replace(/\/$/, '');
}

/** fetch hides the socket error in `cause` */
function describeFetchError(error: unknown): string {
  const cause = getProperty(error, 'cause');
  return cause instanceof Error ? `${errorMessage(error)} (${cause.message})` : errorMessage(error);
}
