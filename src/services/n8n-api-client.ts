/**
 * n8n REST API Client
 * Owns the HTTP transport and exposes one sub-client per resource family
 */

import type { Logger } from 'winston';
import { z } from 'zod';
import { AuditResource } from '../resources/audit.js';
import type {
  HttpMethod,
  N8nTransport,
  RequestOptions
} from '../resources/base-resource.js';
import { CredentialsResource } from '../resources/credentials.js';
import { ExecutionsResource } from '../resources/executions.js';
import { TagsResource } from '../resources/tags.js';
import { WorkflowsResource } from '../resources/workflows.js';
import { getConfig, TimeoutSchema } from '../utils/config.js';
import {
  ApiError,
  ConnectionError,
  ValidationError
} from '../utils/error-handler.js';
import { createSilentLogger } from '../utils/logger.js';
import { parseEntity } from '../utils/validation.js';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface N8nClientConfig {
  /** Instance root, e.g. http://localhost:5678 (without /api/v1) */
  baseUrl: string;
  /** Sent as X-N8N-API-KEY when set */
  apiKey?: string;
  /** Per-request timeout in milliseconds, at most 2^31-1 */
  timeout?: number;
  /** Receives request traces and failures; silent by default */
  logger?: Logger;
  fetch?: FetchLike;
}

const ClientSettingsSchema = z.object({
  baseUrl: z.string().url(),
  timeout: TimeoutSchema.optional(),
});

const DEFAULT_TIMEOUT_MS = 30_000;
const API_PREFIX = '/api/v1';

export class N8nClient implements N8nTransport {
  readonly baseUrl: string;
  readonly logger: Logger;
  readonly workflows: WorkflowsResource;
  readonly executions: ExecutionsResource;
  readonly credentials: CredentialsResource;
  readonly tags: TagsResource;
  readonly audit: AuditResource;

  private readonly apiUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly fetchFn: FetchLike;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  private constructor(clientConfig: N8nClientConfig) {
    this.baseUrl = clientConfig.baseUrl.replace(/\/+$/, '');
    this.apiUrl = `${this.baseUrl}${API_PREFIX}`;
    this.timeout = clientConfig.timeout ?? DEFAULT_TIMEOUT_MS;
    this.logger = clientConfig.logger ?? createSilentLogger();
    this.fetchFn = clientConfig.fetch ?? globalThis.fetch;

    this.headers = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (clientConfig.apiKey) {
      this.headers['X-N8N-API-KEY'] = clientConfig.apiKey;
    }

    this.workflows = new WorkflowsResource(this);
    this.executions = new ExecutionsResource(this);
    this.credentials = new CredentialsResource(this);
    this.tags = new TagsResource(this);
    this.audit = new AuditResource(this);
  }

  /**
   * Create a client and verify the instance is reachable.
   * No client is returned unless the connectivity probe succeeds.
   * @throws ValidationError if baseUrl or timeout is out of range
   * @throws ConnectionError
   */
  static async connect(clientConfig: N8nClientConfig): Promise<N8nClient> {
    parseEntity(
      ClientSettingsSchema,
      { baseUrl: clientConfig.baseUrl, timeout: clientConfig.timeout },
      'client config'
    );

    const client = new N8nClient(clientConfig);
    try {
      await client.ping();
    } catch (error) {
      client.close();
      throw error;
    }
    client.logger.info('n8n API connection verified', { baseUrl: client.baseUrl });
    return client;
  }

  /**
   * Lightweight connectivity probe: fetches at most one workflow and
   * discards it.
   * @throws ConnectionError on a non-2xx status or transport failure
   */
  async ping(): Promise<void> {
    try {
      await this.request('GET', '/workflows', { query: { limit: 1 } });
    } catch (error) {
      if (error instanceof ConnectionError) throw error;
      const status = error instanceof ApiError ? error.status : undefined;
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConnectionError(
        `Failed to connect to n8n instance at ${this.baseUrl}: ${reason}`,
        { baseUrl: this.baseUrl, status },
        { cause: error }
      );
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Release the client. Requests still in flight are aborted and later
   * requests fail with ConnectionError. Safe to call more than once.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
    this.logger.debug('n8n client closed', { baseUrl: this.baseUrl });
  }

  async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const url = this.buildUrl(path, options.query);

    if (this.closed) {
      throw new ConnectionError('n8n client is closed', { method, url });
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeout);
    this.inFlight.add(controller);

    let response: Response;
    let text: string;
    try {
      this.logger.debug(`${method} ${url}`);

      response = await this.fetchFn(url, {
        method,
        headers: this.headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      const reason = timedOut
        ? `Request timeout after ${this.timeout}ms`
        : this.closed
          ? 'Request aborted because the client was closed'
          : `Request failed: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.error(`n8n transport error: ${reason}`, { method, url });
      throw new ConnectionError(reason, { method, url }, { cause: error });
    } finally {
      clearTimeout(timeoutId);
      this.inFlight.delete(controller);
    }

    if (!response.ok) {
      this.logger.error('n8n API error', {
        method,
        url,
        status: response.status,
        body: text,
      });
      throw new ApiError(response.status, text, { method, url });
    }

    if (!text) {
      return undefined;
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      this.logger.error('n8n API returned a non-JSON body', {
        method,
        url,
        status: response.status,
        body: text,
      });
      throw new ValidationError(
        'response body',
        [
          {
            path: '(root)',
            message: error instanceof Error ? error.message : String(error),
          },
        ],
        { method, url }
      );
    }
  }

  private buildUrl(path: string, query: RequestOptions['query']): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) params.append(key, String(value));
    }
    const search = params.toString();
    return `${this.apiUrl}${path}${search ? `?${search}` : ''}`;
  }
}

/**
 * Connect, run `fn`, and close the client exactly once whatever `fn` does.
 */
export async function withN8nClient<T>(
  clientConfig: N8nClientConfig,
  fn: (client: N8nClient) => Promise<T>
): Promise<T> {
  const client = await N8nClient.connect(clientConfig);
  try {
    return await fn(client);
  } finally {
    client.close();
  }
}

/**
 * Client settings from config/default.json and the N8N_* environment
 * variables, with explicit overrides on top
 */
export function clientConfigFromEnv(
  overrides: Partial<N8nClientConfig> = {}
): N8nClientConfig {
  const { n8n } = getConfig();
  return {
    baseUrl: n8n.baseUrl,
    apiKey: n8n.apiKey,
    timeout: n8n.timeout,
    ...overrides,
  };
}

export function createN8nClientFromEnv(
  overrides: Partial<N8nClientConfig> = {}
): Promise<N8nClient> {
  return N8nClient.connect(clientConfigFromEnv(overrides));
}

export default N8nClient;
