import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { CompositeResult } from '../core/agentRuntime/agent-types';
import type { PrioritizeOptions } from '../core/agents/prioritizer';
import { AppError, type ErrorCode } from '../shared/errors/app-error';
import { childLogger, logger } from '../shared/logging/logger';

export const PRIORITIZE_PATH = '/prioritize_compound';
const MAX_BODY_BYTES = 16 * 1024;

export interface HttpServerOptions {
  /** Origins answered with CORS headers; "*" matches any. */
  allowedOrigins: readonly string[];
}

export interface Prioritizes {
  prioritize(compoundName: string, options?: PrioritizeOptions): Promise<CompositeResult>;
}

export interface ErrorBody {
  error: { code: ErrorCode | 'NOT_FOUND' | 'METHOD_NOT_ALLOWED' | 'INTERNAL_ERROR'; message: string };
}

export interface HttpReply {
  status: number;
  body: CompositeResult | ErrorBody;
}

const requestSchema = z.object({
  compound_name: z.string({ required_error: 'compound_name is required' }),
});

export function statusForErrorCode(code: ErrorCode): number {
  switch (code) {
    case 'INCOMPLETE_INPUT':
      return 400;
    case 'COMPOUND_NOT_FOUND':
      return 404;
    case 'TIMEOUT':
      return 504;
    default:
      return 502;
  }
}

function parseRequestBody(rawBody: string): string {
  let json: unknown;
  try {
    json = JSON.parse(rawBody);
  } catch (error) {
    throw new AppError('INCOMPLETE_INPUT', 'Request body must be valid JSON', error);
  }
  const parsed = requestSchema.safeParse(json);
  if (!parsed.success) {
    throw new AppError('INCOMPLETE_INPUT', parsed.error.issues[0]?.message ?? 'Invalid request body', parsed.error);
  }
  return parsed.data.compound_name;
}

/**
 * Transport-free handler for `POST /prioritize_compound`: parses the body,
 * runs the prioritizer and maps failures onto status codes.
 */
export async function handlePrioritizeRequest(
  prioritizer: Prioritizes,
  rawBody: string,
  options: PrioritizeOptions = {},
): Promise<HttpReply> {
  try {
    const compoundName = parseRequestBody(rawBody);
    const result = await prioritizer.prioritize(compoundName, options);
    return { status: 200, body: result };
  } catch (error) {
    if (error instanceof AppError) {
      return { status: statusForErrorCode(error.code), body: { error: { code: error.code, message: error.message } } };
    }
    logger.error({ err: error, traceId: options.traceId }, '[HTTP] Unexpected prioritization failure');
    return { status: 500, body: { error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } } };
  }
}

/** CORS response headers for a request from `origin`; empty when the origin is not allowed. */
export function corsHeaders(origin: string | undefined, allowedOrigins: readonly string[]): Record<string, string> {
  if (!origin) return {};
  const allowAny = allowedOrigins.includes('*');
  if (!allowAny && !allowedOrigins.includes(origin)) return {};
  return {
    'Access-Control-Allow-Origin': allowAny ? '*' : origin,
    'Access-Control-Allow-Methods': 'POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '600',
    ...(allowAny ? {} : { Vary: 'Origin' }),
  };
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new AppError('INCOMPLETE_INPUT', `Request body exceeds ${MAX_BODY_BYTES} bytes`));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });
}

function sendJson(res: ServerResponse, status: number, body: unknown, traceId?: string): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    'Content-Type': 'application/json; charset=utf-8',
    'Content-Length': Buffer.byteLength(payload),
    ...(traceId ? { 'X-Trace-Id': traceId } : {}),
  });
  res.end(payload);
}

async function handle(
  prioritizer: Prioritizes,
  options: HttpServerOptions,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  const path = new URL(req.url ?? '/', 'http://localhost').pathname;
  if (path !== PRIORITIZE_PATH) {
    sendJson(res, 404, { error: { code: 'NOT_FOUND', message: `No route for ${path}` } });
    return;
  }

  for (const [name, value] of Object.entries(corsHeaders(req.headers.origin, options.allowedOrigins))) {
    res.setHeader(name, value);
  }
  if (req.method === 'OPTIONS') {
    res.setHeader('Allow', 'POST, OPTIONS');
    res.writeHead(204);
    res.end();
    return;
  }
  if (req.method !== 'POST') {
    res.setHeader('Allow', 'POST, OPTIONS');
    sendJson(res, 405, { error: { code: 'METHOD_NOT_ALLOWED', message: `${req.method ?? 'UNKNOWN'} is not allowed` } });
    return;
  }

  const traceId = randomUUID();
  const log = childLogger({ traceId });
  const startedAt = Date.now();

  // Abandon the run when the client goes away before the answer is written.
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort(new AppError('TIMEOUT', 'Client closed the connection'));
  });

  let rawBody: string;
  try {
    rawBody = await readBody(req);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    sendJson(res, 400, { error: { code: 'INCOMPLETE_INPUT', message } }, traceId);
    return;
  }

  const reply = await handlePrioritizeRequest(prioritizer, rawBody, { traceId, signal: controller.signal });
  log.info({ status: reply.status, durationMs: Date.now() - startedAt }, '[HTTP] POST /prioritize_compound');
  if (!res.destroyed) sendJson(res, reply.status, reply.body, traceId);
}

export function createHttpServer(prioritizer: Prioritizes, options: HttpServerOptions): http.Server {
  return http.createServer((req, res) => {
    handle(prioritizer, options, req, res).catch((error: unknown) => {
      logger.error({ err: error }, '[HTTP] Request handling failed');
      if (!res.headersSent) {
        sendJson(res, 500, { error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
      } else {
        res.destroy();
      }
    });
  });
}

export function listen(server: http.Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });
}

export function closeServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}
