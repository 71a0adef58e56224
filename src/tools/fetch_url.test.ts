import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import { http, HttpResponse } from 'msw';
import { setupServer } from 'msw/node';
import { createFetchUrlTool } from './fetch_url.js';
import type { ToolContext } from './types.js';

const BASE_URL = 'https://docs.example.test';
const ctx: ToolContext = { cwd: process.cwd() };

const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: 'error' }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

describe('fetch_url tool', () => {
  it('returns the raw response body', async () => {
    server.use(
      http.get(`${BASE_URL}/page`, () => HttpResponse.text('<html>hi</html>'))
    );

    const result = await createFetchUrlTool().execute({ url: `${BASE_URL}/page` }, ctx);
    expect(result).toEqual({ content: '<html>hi</html>', success: true });
  });

  it('fails with NETWORK_FAILURE on a non-2xx status', async () => {
    server.use(
      http.get(`${BASE_URL}/missing`, () =>
        new HttpResponse('gone', { status: 404, statusText: 'Not Found' })
      )
    );

    const result = await createFetchUrlTool().execute({ url: `${BASE_URL}/missing` }, ctx);
    expect(result).toEqual({
      content: '',
      success: false,
      error: 'HTTP 404 Not Found',
      code: 'NETWORK_FAILURE',
    });
  });

  it('fails with NETWORK_FAILURE when the connection errors', async () => {
    server.use(http.get(`${BASE_URL}/broken`, () => HttpResponse.error()));

    const result = await createFetchUrlTool().execute({ url: `${BASE_URL}/broken` }, ctx);
    expect(result).toMatchObject({ content: '', success: false, code: 'NETWORK_FAILURE' });
  });

  it('fails with NETWORK_FAILURE for an unparseable URL', async () => {
    const result = await createFetchUrlTool().execute({ url: 'not a url' }, ctx);
    expect(result).toMatchObject({ content: '', success: false, code: 'NETWORK_FAILURE' });
  });
});
