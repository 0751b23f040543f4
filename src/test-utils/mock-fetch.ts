import { vi } from "vitest";
import { N8nClient, type N8nClientConfig } from "../services/n8n-api-client.js";

export const BASE_URL = "http://n8n.test";

export interface RecordedRequest {
  method: string;
  url: URL;
  /** Path below /api/v1 */
  path: string;
  headers: Headers;
  body: unknown;
}

export type MockHandler = (
  request: RecordedRequest,
) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

export function emptyResponse(status = 204): Response {
  return new Response(null, { status });
}

/**
 * In-process stand-in for fetch. Every call is recorded and answered by
 * `handler`.
 */
export function createMockFetch(handler: MockHandler) {
  const requests: RecordedRequest[] = [];
  const fetch = vi.fn(async (input: string, init: RequestInit) => {
    const url = new URL(input);
    const request: RecordedRequest = {
      method: init.method ?? "GET",
      url,
      path: url.pathname.replace(/^\/api\/v1/, ""),
      headers: new Headers(init.headers),
      body: typeof init.body === "string" ? JSON.parse(init.body) : undefined,
    };
    requests.push(request);
    return handler(request);
  });
  return { fetch, requests };
}

/**
 * Answers the connectivity probe (GET /workflows?limit=1) with an empty page
 * and hands every other request to `handler`.
 */
export function withProbe(handler: MockHandler): MockHandler {
  return (request) => {
    if (
      request.method === "GET" &&
      request.path === "/workflows" &&
      request.url.searchParams.get("limit") === "1"
    ) {
      return jsonResponse({ data: [], nextCursor: null });
    }
    return handler(request);
  };
}

/**
 * Connected client backed by a mock fetch. `requests` excludes the probe.
 */
export async function connectMockClient(
  handler: MockHandler,
  overrides: Partial<N8nClientConfig> = {},
) {
  const { fetch, requests } = createMockFetch(withProbe(handler));
  const client = await N8nClient.connect({
    baseUrl: BASE_URL,
    apiKey: "test-api-key",
    fetch,
    ...overrides,
  });
  requests.shift();
  return { client, fetch, requests };
}
