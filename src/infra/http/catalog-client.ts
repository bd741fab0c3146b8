/**
 * Control-plane catalog API client
 *
 * Queries the config catalog, its change feed and the scraper endpoint of the config
 * database to verify what a deployed system has discovered.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { DEFAULT_TIMEOUTS } from '@/config/constants';
import { extractErrorMessage } from '@/lib/errors';
import { basicAuth } from '@/lib/http';
import { Success, Failure, type Result } from '@/types';

export interface CatalogClientConfig {
  /** Base URL of the control-plane API */
  url: string;
  /** Base URL of the config database, for scraper runs */
  configDbUrl?: string;
  username?: string;
  password?: string;
  timeoutMs?: number;
}

export interface ResourceSelector {
  id?: string;
  name?: string;
  namespace?: string;
  types?: string[];
  statuses?: string[];
  labels?: Record<string, string>;
  fieldSelector?: string;
  search?: string;
}

export interface CatalogChangesRequest {
  catalogId?: string;
  configType?: string;
  changeType?: string;
  severity?: string;
  includeDeletedConfigs?: boolean;
  depth?: number;
  createdBy?: string;
  summary?: string;
  source?: string;
  tags?: string;
  agentId?: string;
  from?: string;
  to?: string;
  pageSize?: number;
  page?: number;
  sortBy?: string;
  recursive?: string;
  soft?: boolean;
}

const CHANGE_REQUEST_FIELDS: Record<keyof CatalogChangesRequest, string> = {
  catalogId: 'id',
  configType: 'config_type',
  changeType: 'type',
  severity: 'severity',
  includeDeletedConfigs: 'include_deleted_configs',
  depth: 'depth',
  createdBy: 'created_by',
  summary: 'summary',
  source: 'source',
  tags: 'tags',
  agentId: 'agent_id',
  from: 'from',
  to: 'to',
  pageSize: 'page_size',
  page: 'page',
  sortBy: 'sort_by',
  recursive: 'recursive',
  soft: 'soft',
};

const stringMap = z.record(z.string());

export const selectedResourceSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  namespace: z.string().optional(),
  type: z.string().default(''),
  tags: stringMap.optional(),
  config: z.string().optional(),
  labels: stringMap.optional(),
  properties: stringMap.optional(),
});

export type SelectedResource = z.infer<typeof selectedResourceSchema>;

const searchResourcesResponseSchema = z.object({
  configs: z.array(selectedResourceSchema).nullable().default([]),
});

export const configChangeSchema = z
  .object({
    id: z.string(),
    config_id: z.string().default(''),
    change_type: z.string().default(''),
    severity: z.string().default(''),
    source: z.string().default(''),
    summary: z.string().optional(),
    created_at: z.string().nullable().optional(),
    count: z.number().default(0),
    name: z.string().optional(),
    type: z.string().optional(),
    tags: stringMap.optional(),
  })
  .transform((row) => ({
    id: row.id,
    configId: row.config_id,
    changeType: row.change_type,
    severity: row.severity,
    source: row.source,
    summary: row.summary,
    createdAt: row.created_at ?? undefined,
    count: row.count,
    configName: row.name,
    configType: row.type,
    tags: row.tags,
  }));

export type ConfigChange = z.infer<typeof configChangeSchema>;

const catalogChangesResponseSchema = z
  .object({
    summary: z.record(z.number()).optional(),
    total: z.number().default(0),
    changes: z.array(configChangeSchema).nullable().default([]),
  })
  .transform((response) => ({
    summary: response.summary ?? {},
    total: response.total,
    changes: response.changes ?? [],
  }));

export type CatalogChangesResponse = z.infer<typeof catalogChangesResponseSchema>;

const scrapeResultSchema = z
  .object({
    errors: z.array(z.string()).nullable().default([]),
    scrape_summary: z.record(z.unknown()).nullable().default({}),
  })
  .transform((result) => ({
    errors: result.errors ?? [],
    summary: result.scrape_summary ?? {},
  }));

export type ScrapeResult = z.infer<typeof scrapeResultSchema>;

const whoAmISchema = z.record(z.unknown());

function selectorToWire(selector: ResourceSelector): Record<string, unknown> {
  const wire: Record<string, unknown> = {};
  if (selector.id) wire.id = selector.id;
  if (selector.name) wire.name = selector.name;
  if (selector.namespace) wire.namespace = selector.namespace;
  if (selector.types?.length) wire.types = selector.types;
  if (selector.statuses?.length) wire.statuses = selector.statuses;
  if (selector.labels && Object.keys(selector.labels).length > 0) wire.labels = selector.labels;
  if (selector.fieldSelector) wire.field_selector = selector.fieldSelector;
  if (selector.search) wire.search = selector.search;
  return wire;
}

function changesRequestToWire(request: CatalogChangesRequest): Record<string, unknown> {
  const wire: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(CHANGE_REQUEST_FIELDS)) {
    const value: unknown = Object.getOwnPropertyDescriptor(request, key)?.value;
    if (value !== undefined) {
      wire[field] = value;
    }
  }
  return wire;
}

interface HttpResponse {
  status: number;
  ok: boolean;
  body: string;
}

export class CatalogClient {
  private readonly config: CatalogClientConfig;
  private readonly logger: Logger;

  constructor(config: CatalogClientConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ catalog: config.url });
  }

  /**
   * Resources matching a selector.
   */
  async queryCatalog(selector: ResourceSelector): Promise<Result<SelectedResource[]>> {
    const response = await this.request('POST', this.config.url, '/resources/search', {
      configs: [selectorToWire(selector)],
    });
    if (!response.ok) {
      return response;
    }
    const parsed = this.parse(response.value, searchResourcesResponseSchema, 'query catalog');
    return parsed.ok ? Success(parsed.value.configs ?? []) : parsed;
  }

  /** Free-text catalog search */
  searchCatalog(search: string): Promise<Result<SelectedResource[]>> {
    return this.queryCatalog({ search });
  }

  async searchCatalogChanges(request: CatalogChangesRequest): Promise<Result<CatalogChangesResponse>> {
    const response = await this.request('POST', this.config.url, '/catalog/changes', changesRequestToWire(request));
    if (!response.ok) {
      return response;
    }
    return this.parse(response.value, catalogChangesResponseSchema, 'search catalog changes');
  }

  /**
   * Trigger a scraper run on the config database.
   */
  async runScraper(id: string, name = ''): Promise<Result<ScrapeResult>> {
    const base = this.config.configDbUrl;
    if (!base) {
      return Failure('config database URL is not configured', {
        resolution: 'Set configDbUrl on the catalog client',
      });
    }
    const response = await this.request('POST', base, `/run/${encodeURIComponent(id)}`, { scraper: name });
    if (!response.ok) {
      return response;
    }
    return this.parse(response.value, scrapeResultSchema, 'run scraper');
  }

  /** True when `/health` answers 2xx; transport errors are failures */
  async isHealthy(): Promise<Result<boolean>> {
    const response = await this.send('GET', this.config.url, '/health');
    return response.ok ? Success(response.value.ok) : response;
  }

  /**
   * Identity of the configured credentials. `authenticated` is false on a non-2xx
   * answer.
   */
  async whoAmI(): Promise<Result<{ authenticated: boolean; body: Record<string, unknown> }>> {
    const response = await this.send('GET', this.config.url, '/auth/whoami');
    if (!response.ok) {
      return response;
    }

    let body: Record<string, unknown> = {};
    if (response.value.body) {
      const parsed = this.parseJson(response.value.body, whoAmISchema, 'whoami');
      if (!parsed.ok) {
        return parsed;
      }
      body = parsed.value;
    }
    return Success({ authenticated: response.value.ok, body });
  }

  private headers(withBody: boolean): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (withBody) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.config.username) {
      headers.Authorization = basicAuth(this.config.username, this.config.password ?? '');
    }
    return headers;
  }

  /**
   * Send a request; any HTTP status is a successful send.
   */
  private async send(
    method: 'GET' | 'POST',
    base: string,
    path: string,
    body?: unknown,
  ): Promise<Result<HttpResponse>> {
    const url = new URL(path.replace(/^\//, ''), base.endsWith('/') ? base : `${base}/`).toString();
    const timeoutMs = this.config.timeoutMs ?? DEFAULT_TIMEOUTS.catalogRequest;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      this.logger.debug({ method, url }, 'Catalog request');
      const response = await fetch(url, {
        method,
        headers: this.headers(body !== undefined),
        signal: controller.signal,
        ...(body !== undefined && { body: JSON.stringify(body) }),
      });
      const text = await response.text();
      return Success({ status: response.status, ok: response.ok, body: text });
    } catch (error) {
      const message =
        error instanceof Error && error.name === 'AbortError'
          ? `request timed out after ${timeoutMs}ms`
          : extractErrorMessage(error);
      this.logger.error({ method, url, error: message }, 'Catalog request failed');
      return Failure(`${method} ${url} failed: ${message}`, { details: { url } });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Send and treat any non-2xx status as a failure carrying the response body.
   */
  private async request(
    method: 'GET' | 'POST',
    base: string,
    path: string,
    body?: unknown,
  ): Promise<Result<HttpResponse>> {
    const response = await this.send(method, base, path, body);
    if (!response.ok) {
      return response;
    }
    if (!response.value.ok) {
      return Failure(`${method} ${path} failed with status ${response.value.status}: ${response.value.body}`, {
        details: { status: response.value.status, body: response.value.body },
      });
    }
    return response;
  }

  private parse<T>(
    response: HttpResponse,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    operation: string,
  ): Result<T> {
    return this.parseJson(response.body, schema, operation);
  }

  private parseJson<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, operation: string): Result<T> {
    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch {
      return Failure(`${operation} returned invalid JSON`, { details: { body: text.slice(0, 512) } });
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      return Failure(`${operation} returned an unexpected response: ${parsed.error.message}`);
    }
    return Success(parsed.data);
  }
}
