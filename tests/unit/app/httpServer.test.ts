import { afterEach, describe, expect, it, vi } from 'vitest';
import type http from 'node:http';
import {
  PRIORITIZE_PATH,
  closeServer,
  corsHeaders,
  createHttpServer,
  handlePrioritizeRequest,
  listen,
  statusForErrorCode,
} from '../../../src/app/httpServer';
import type { CompositeResult } from '../../../src/core/agentRuntime/agent-types';
import { AppError } from '../../../src/shared/errors/app-error';
import { TEST_COMPOUND, leafResult } from '../support/agentFixtures';

vi.mock('../../../src/shared/logging/logger', () => {
  const log = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  return { logger: log, childLogger: () => log };
});

const RESULT: CompositeResult = {
  compound: TEST_COMPOUND,
  priorityScore: 0.6,
  confidence: 0.7,
  reasoning: 'balanced',
  leaves: { efficacy: leafResult({ role: 'efficacy' }), toxicity: leafResult({ role: 'toxicity' }) },
};

function prioritizerThat(outcome: () => Promise<CompositeResult>) {
  return { prioritize: vi.fn(outcome) };
}

describe('handlePrioritizeRequest', () => {
  it('returns the composite result', async () => {
    const prioritizer = prioritizerThat(async () => RESULT);

    const reply = await handlePrioritizeRequest(prioritizer, '{"compound_name": "aspirin"}', { traceId: 'trace-http' });

    expect(reply).toEqual({ status: 200, body: RESULT });
    expect(prioritizer.prioritize).toHaveBeenCalledWith('aspirin', { traceId: 'trace-http' });
  });

  it('answers 400 for a body that is not JSON', async () => {
    const prioritizer = prioritizerThat(async () => RESULT);

    await expect(handlePrioritizeRequest(prioritizer, 'compound=aspirin')).resolves.toEqual({
      status: 400,
      body: { error: { code: 'INCOMPLETE_INPUT', message: 'Request body must be valid JSON' } },
    });
    expect(prioritizer.prioritize).not.toHaveBeenCalled();
  });

  it('answers 400 when compound_name is missing', async () => {
    const prioritizer = prioritizerThat(async () => RESULT);

    await expect(handlePrioritizeRequest(prioritizer, '{}')).resolves.toEqual({
      status: 400,
      body: { error: { code: 'INCOMPLETE_INPUT', message: 'compound_name is required' } },
    });
  });

  it.each([
    ['INCOMPLETE_INPUT', 400],
    ['COMPOUND_NOT_FOUND', 404],
    ['TIMEOUT', 504],
    ['PARTIAL_AGENT_FAILURE', 502],
    ['OUT_OF_RANGE_RESULT', 502],
  ] as const)('maps %s to %i', async (code, status) => {
    const prioritizer = prioritizerThat(async () => {
      throw new AppError(code, `failed with ${code}`);
    });

    await expect(handlePrioritizeRequest(prioritizer, '{"compound_name": "aspirin"}')).resolves.toEqual({
      status,
      body: { error: { code, message: `failed with ${code}` } },
    });
  });

  it('hides unexpected errors behind a 500', async () => {
    const prioritizer = prioritizerThat(async () => {
      throw new Error('kaboom');
    });

    await expect(handlePrioritizeRequest(prioritizer, '{"compound_name": "aspirin"}')).resolves.toEqual({
      status: 500,
      body: { error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } },
    });
  });
});

describe('statusForErrorCode', () => {
  it('treats provider and model failures as bad gateway', () => {
    expect(statusForErrorCode('PROVIDER_ERROR')).toBe(502);
    expect(statusForErrorCode('MODEL_OUTPUT_INVALID')).toBe(502);
    expect(statusForErrorCode('RATE_LIMIT_EXCEEDED')).toBe(502);
  });
});

describe('corsHeaders', () => {
  const allowed = ['http://localhost:3000', 'https://app.example.test'];

  it('echoes an allowed origin', () => {
    expect(corsHeaders('https://app.example.test', allowed)).toEqual({
      'Access-Control-Allow-Origin': 'https://app.example.test',
      'Access-Control-Allow-Methods': 'POST, OPTIONS',
      'Access-Control-Allow-Headers': 'Content-Type',
      'Access-Control-Max-Age': '600',
      Vary: 'Origin',
    });
  });

  it('sends nothing for an unknown or missing origin', () => {
    expect(corsHeaders('https://elsewhere.test', allowed)).toEqual({});
    expect(corsHeaders(undefined, allowed)).toEqual({});
  });

  it('answers any origin with a wildcard entry', () => {
    expect(corsHeaders('https://elsewhere.test', ['*'])).toMatchObject({ 'Access-Control-Allow-Origin': '*' });
    expect(corsHeaders('https://elsewhere.test', ['*'])).not.toHaveProperty('Vary');
  });
});

describe('createHttpServer', () => {
  let server: http.Server | undefined;

  afterEach(async () => {
    if (server) await closeServer(server);
    server = undefined;
  });

  async function start(): Promise<string> {
    server = createHttpServer(prioritizerThat(async () => RESULT), { allowedOrigins: ['http://localhost:3000'] });
    await listen(server, '127.0.0.1', 0);
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no TCP address');
    return `http://127.0.0.1:${address.port}${PRIORITIZE_PATH}`;
  }

  it('answers a preflight from an allowed origin with 204', async () => {
    const url = await start();

    const response = await fetch(url, {
      method: 'OPTIONS',
      headers: { Origin: 'http://localhost:3000', 'Access-Control-Request-Method': 'POST' },
    });

    expect(response.status).toBe(204);
    expect(response.headers.get('access-control-allow-origin')).toBe('http://localhost:3000');
    expect(response.headers.get('access-control-allow-methods')).toBe('POST, OPTIONS');
  });

  it('adds the allow-origin header to a POST from an allowed origin', async () => {
    const url = await start();

    const response = await fetch(url, {
      method: 'POST',
      headers: { Origin: 'http://localhost:3000', 'Content-Type': 'application/json' },
      body: '{"compound_name": "aspirin"}',
    });

    expect(response.status).toBe(200);
    expect(response.headers.get('access-control-allow-origin')).toBe('http://localhost:3000');
    await expect(response.json()).resolves.toMatchObject({ priorityScore: 0.6 });
  });

  it('leaves CORS headers off for other origins', async () => {
    const url = await start();

    const response = await fetch(url, { method: 'OPTIONS', headers: { Origin: 'https://elsewhere.test' } });

    expect(response.status).toBe(204);
    expect(response.headers.get('access-control-allow-origin')).toBeNull();
  });
});

