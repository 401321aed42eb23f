#!/usr/bin/env node

/**
 * REST API server for lipika
 * Exposes conversion, script listing and script descriptions over HTTP
 */

import { createServer, IncomingHttpHeaders, IncomingMessage, ServerResponse } from 'http';
import type { Readable } from 'stream';
import { config } from 'dotenv';
import { z } from 'zod';
import {
  SchemaNotFoundError,
  SchemaValidationError,
  getTransliterator,
  isMatchStrategy,
  printPerfCountersAndReset,
  type Transliterator,
} from '@lipika/core';

// Parse environment variables
config();

const PORT = parseInt(process.env.PORT || '3000', 10);
export const MAX_JSON_BODY_SIZE = 1 * 1024 * 1024; // 1 MiB

export class JsonBodyError extends Error {
  status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = 'JsonBodyError';
    this.status = status;
  }
}

const ConvertBody = z.object({
  text: z.string(),
  from: z.string().min(1),
  to: z.string().min(1),
  metadata: z.boolean().optional(),
  strategy: z
    .string()
    .refine(isMatchStrategy, { message: 'strategy must be hash, automaton or prefix' })
    .optional(),
});

export interface RouteResult {
  status: number;
  body: unknown;
}

const API_DOCS = {
  name: 'lipika REST API',
  version: '0.1.0',
  endpoints: {
    'GET /health': 'Health check',
    'GET /api/scripts': 'List supported scripts',
    'GET /api/scripts/:name': 'Describe one script (name or alias)',
    'POST /api/convert': 'Convert text (body: {text, from, to, metadata?, strategy?})',
  },
  examples: {
    convert: {
      url: '/api/convert',
      body: { text: 'धर्म', from: 'devanagari', to: 'iast' },
    },
    metadata: {
      url: '/api/convert',
      body: { text: 'धर्मkr', from: 'devanagari', to: 'iast', metadata: true },
    },
  },
};

function errorStatus(error: unknown): number {
  if (error instanceof JsonBodyError) return error.status;
  if (error instanceof SchemaNotFoundError) return 404;
  if (error instanceof SchemaValidationError) return 400;
  return 500;
}

/**
 * Route a parsed request. Kept free of sockets so it can be exercised
 * directly.
 */
export function routeRequest(
  method: string,
  pathname: string,
  body: unknown,
  engine: Transliterator = getTransliterator(),
): RouteResult {
  try {
    if (pathname === '/health' && method === 'GET') {
      return { status: 200, body: { status: 'ok', scripts: engine.listSupportedScripts().length } };
    }

    if (pathname === '/api' && method === 'GET') {
      return { status: 200, body: API_DOCS };
    }

    if (pathname === '/api/scripts' && method === 'GET') {
      const scripts = engine.listSupportedScripts().map((name) => engine.describeScript(name));
      return { status: 200, body: { scripts } };
    }

    if (pathname.startsWith('/api/scripts/') && method === 'GET') {
      const name = decodeURIComponent(pathname.slice('/api/scripts/'.length));
      return { status: 200, body: engine.describeScript(name) };
    }

    if (pathname === '/api/convert' && method === 'POST') {
      const parsed = ConvertBody.safeParse(body);
      if (!parsed.success) {
        const message = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
        return { status: 400, body: { error: message } };
      }
      const { text, from, to, metadata, strategy } = parsed.data;
      const options = strategy && isMatchStrategy(strategy) ? { strategy } : {};
      if (metadata) {
        return { status: 200, body: engine.convertWithMetadata(text, from, to, options) };
      }
      const path = engine.getPathInfo(from, to);
      return { status: 200, body: { output: engine.convert(text, from, to, options), path: path.kind } };
    }

    return { status: 404, body: { error: 'Not found' } };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Internal server error';
    return { status: errorStatus(error), body: { error: message } };
  }
}

/**
 * Parse a JSON request body. Chunks are joined as bytes and decoded once, so
 * a multi-byte character split across chunks survives.
 */
export async function parseJsonBody(req: Readable, headers: IncomingHttpHeaders = {}): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;

    const contentLengthHeader = headers['content-length'];
    if (contentLengthHeader) {
      const contentLength = Number(contentLengthHeader);
      if (Number.isFinite(contentLength) && contentLength > MAX_JSON_BODY_SIZE) {
        reject(new JsonBodyError('Payload too large', 413));
        return;
      }
    }

    const abort = (error: JsonBodyError) => {
      req.destroy();
      reject(error);
    };

    req.on('data', (chunk: Buffer | string) => {
      const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, 'utf8');
      received += bytes.length;
      if (received > MAX_JSON_BODY_SIZE) {
        abort(new JsonBodyError('Payload too large', 413));
        return;
      }
      chunks.push(bytes);
    });

    req.on('end', () => {
      const body = Buffer.concat(chunks).toString('utf8');
      if (!body) {
        reject(new JsonBodyError('Empty body'));
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch {
        reject(new JsonBodyError('Invalid JSON'));
      }
    });

    req.on('error', (err) => {
      reject(err instanceof JsonBodyError ? err : new JsonBodyError(String(err), 400));
    });
  });
}

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, data: unknown, status = 200, requestId?: string): void {
  const json = JSON.stringify(data);
  res.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8' });
  res.end(json);
  if (requestId) {
    console.log(`[${requestId}] Response sent: ${json.length} bytes, status ${status}`);
  }
}

/**
 * Main request handler
 */
async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
  const requestId = Math.random().toString(36).substring(7);
  const startTime = Date.now();
  const url = new URL(req.url || '/', `http://${req.headers.host}`);
  const method = req.method || 'GET';

  console.log(`[${requestId}] START ${method} ${url.pathname}`);

  // CORS headers
  res.setHeader('Access-Control-Allow-Origin', '*');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

  // Handle OPTIONS for CORS preflight
  if (method === 'OPTIONS') {
    res.writeHead(204);
    res.end();
    console.log(`[${requestId}] END OPTIONS ${url.pathname} - ${Date.now() - startTime}ms`);
    return;
  }

  try {
    const body = method === 'POST' ? await parseJsonBody(req, req.headers) : undefined;
    const result = routeRequest(method, url.pathname, body);
    sendJson(res, result.body, result.status, requestId);
    console.log(`[${requestId}] END ${url.pathname} - ${Date.now() - startTime}ms`);
  } catch (error) {
    console.error(`[${requestId}] Request error:`, error);
    const message = error instanceof Error ? error.message : 'Internal server error';
    sendJson(res, { error: message }, errorStatus(error), requestId);
    console.log(`[${requestId}] END ${url.pathname} ERROR - ${Date.now() - startTime}ms`);
  }
}

/**
 * Start the server
 */
async function main(): Promise<void> {
  process.on('unhandledRejection', (reason) => {
    console.error('UNHANDLED REJECTION:', reason);
  });

  console.log('Building transliterator...');
  const engine = getTransliterator();
  console.log(`Ready: ${engine.listSupportedScripts().length} scripts, profile ${engine.profile}, matcher ${engine.strategy}`);

  const server = createServer((req, res) => {
    handleRequest(req, res).catch((error) => {
      console.error('Unhandled request failure:', error);
      if (!res.headersSent) {
        sendJson(res, { error: 'Internal server error' }, 500);
      }
    });
  });

  server.listen(PORT, '0.0.0.0', () => {
    console.log(`lipika API server listening on http://0.0.0.0:${PORT}`);
    console.log(`Health check: http://0.0.0.0:${PORT}/health`);
    console.log(`API docs: http://0.0.0.0:${PORT}/api`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down gracefully...`);
    server.close(() => {
      console.log('Server closed');
      printPerfCountersAndReset();
      process.exit(0);
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// Run server if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
