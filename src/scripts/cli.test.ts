import { describe, it, expect, vi, afterEach } from 'vitest';
import { createProgram } from './cli.js';
import { logger } from '../utils/logger.js';
import {
  BASE_URL,
  createMockFetch,
  emptyResponse,
  jsonResponse,
  withProbe,
  type MockHandler
} from '../test-utils/mock-fetch.js';

const serverWorkflow = {
  id: 'wf1',
  name: 'Inbox triage',
  nodes: [],
  connections: {},
};

function setup(handler: MockHandler) {
  const { fetch, requests } = createMockFetch(handler);
  const program = createProgram({
    clientConfig: () => ({ baseUrl: BASE_URL, apiKey: 'test-api-key', fetch }),
  });
  const output = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  const errors = vi.spyOn(logger, 'error').mockReturnValue(logger);
  const exec = (...args: string[]) => program.parseAsync(args, { from: 'user' });
  return { exec, requests, output, errors };
}

afterEach(() => {
  process.exitCode = undefined;
  vi.restoreAllMocks();
});

describe('n8n-client CLI', () => {
  it('prints a page of tags as JSON', async () => {
    const { exec, requests, output } = setup(
      withProbe(() => jsonResponse({ data: [{ id: 't1', name: 'prod' }], nextCursor: null }))
    );

    await exec('tags', 'list', '--json');

    expect(requests.map((request) => `${request.method} ${request.path}`)).toEqual([
      'GET /workflows',
      'GET /tags',
    ]);
    expect(requests[1].url.searchParams.get('limit')).toBe('100');
    expect(output).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(output.mock.calls[0][0]))).toEqual({
      data: [{ id: 't1', name: 'prod' }],
    });
    expect(process.exitCode).toBeUndefined();
  });

  it('assembles audit options from the flags', async () => {
    const { exec, requests } = setup(withProbe(() => jsonResponse({ nodes: {} })));

    await exec('audit', '--days-abandoned-workflow', '30', '--categories', 'nodes,credentials');

    expect(requests[1].method).toBe('POST');
    expect(requests[1].path).toBe('/audit');
    expect(requests[1].body).toEqual({
      additionalOptions: {
        daysAbandonedWorkflow: 30,
        categories: ['nodes', 'credentials'],
      },
    });
  });

  it('sends no audit body without flags', async () => {
    const { exec, requests } = setup(withProbe(() => jsonResponse({})));

    await exec('audit');

    expect(requests[1].path).toBe('/audit');
    expect(requests[1].body).toBeUndefined();
  });

  it('only shows the workflow when delete is not forced', async () => {
    const { exec, requests } = setup(withProbe(() => jsonResponse(serverWorkflow)));

    await exec('delete', 'wf1');

    expect(requests.slice(1).map((request) => request.method)).toEqual(['GET']);
  });

  it('deletes the workflow with --force', async () => {
    const { exec, requests } = setup(withProbe(() => emptyResponse()));

    await exec('delete', 'wf1', '--force');

    expect(requests[1].method).toBe('DELETE');
    expect(requests[1].path).toBe('/workflows/wf1');
    expect(process.exitCode).toBeUndefined();
  });

  it('logs an API failure and sets exit code 1', async () => {
    const { exec, errors } = setup(
      withProbe(() => jsonResponse({ message: 'Not Found' }, 404))
    );

    await exec('get', 'missing');

    expect(process.exitCode).toBe(1);
    expect(errors).toHaveBeenCalledWith('Get workflow failed', {
      code: 'API_ERROR',
      error: 'n8n API request failed with status 404: Not Found',
      details: {
        method: 'GET',
        url: 'http://n8n.test/api/v1/workflows/missing',
      },
    });
  });

  it('sets exit code 1 when the instance rejects the connection', async () => {
    const { exec, requests, errors } = setup(() =>
      jsonResponse({ message: 'unauthorized' }, 401)
    );

    await exec('tags', 'list');

    expect(process.exitCode).toBe(1);
    expect(requests).toHaveLength(1);
    expect(errors).toHaveBeenCalledWith(
      'List tags failed',
      expect.objectContaining({ code: 'CONNECTION_ERROR' })
    );
  });
});
