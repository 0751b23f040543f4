import type { z } from "zod";
import { parseEntity } from "../utils/validation.js";
import type { PaginationOptions } from "../types/index.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

export interface RequestOptions {
  /** Entries whose value is `undefined` are left out of the query string */
  query?: Record<string, QueryValue>;
  body?: unknown;
}

/**
 * Shared HTTP entry point the resource clients issue their calls through.
 * Resolves with the parsed JSON body, or `undefined` for an empty one.
 */
export interface N8nTransport {
  request(
    method: HttpMethod,
    path: string,
    options?: RequestOptions,
  ): Promise<unknown>;
}

export const DEFAULT_PAGE_LIMIT = 100;

/**
 * Abstract base class for resource-scoped clients
 * All requests go through the owning client's transport
 */
export abstract class BaseResource {
  /**
   * Path of the resource family below /api/v1, e.g. "/workflows"
   */
  protected abstract readonly basePath: string;

  constructor(protected readonly transport: N8nTransport) {}

  /**
   * Build a path below the base path with URL-encoded segments
   */
  protected path(...segments: Array<string | number>): string {
    return [
      this.basePath,
      ...segments.map((segment) => encodeURIComponent(String(segment))),
    ].join("/");
  }

  protected paginationQuery(
    options: PaginationOptions,
  ): Record<string, QueryValue> {
    return {
      limit: options.limit ?? DEFAULT_PAGE_LIMIT,
      cursor: options.cursor || undefined,
    };
  }

  /**
   * Issue a request and decode the response body
   * @throws ValidationError if the body does not match the schema
   */
  protected async send<S extends z.ZodTypeAny>(
    schema: S,
    entity: string,
    method: HttpMethod,
    path: string,
    options?: RequestOptions,
  ): Promise<z.output<S>> {
    const body = await this.transport.request(method, path, options);
    return parseEntity(schema, body, entity);
  }

  protected async remove(...segments: Array<string | number>): Promise<void> {
    await this.transport.request("DELETE", this.path(...segments));
  }
}
