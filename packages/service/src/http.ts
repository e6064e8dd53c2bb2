import http from 'http';
import { z } from 'zod';
import type { IngestStats } from '@alert-buckets/types';
import {
  StoreUnavailableError,
  errorMessage,
  type ManualPurge,
  type PurgeResult,
  type RetentionSweeper,
} from '@alert-buckets/core';
import type { Logger } from './logger';

export interface HttpServerConfig {
  port: number;
  sweeper: Pick<RetentionSweeper, 'sweep' | 'getStats'>;
  purge: Pick<ManualPurge, 'purgeBucket' | 'purgeMember'>;
  ingestStats: () => Readonly<IngestStats>;
  logger?: Logger;
}

const MAX_BODY_BYTES = 64 * 1024;

type Reply = [status: number, body: unknown, headers?: http.OutgoingHttpHeaders];

const bucketBodySchema = z.object({
  phenomenon: z.string(),
  bucketId: z.string(),
});

const memberBodySchema = bucketBodySchema.extend({
  alertId: z.string(),
});

class HttpError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
  }
}

/**
 * Operator surface: health, on-demand sweeps and manual purges. Every
 * response is JSON.
 */
export function createHttpServer(config: HttpServerConfig): http.Server {
  const startedAt = Date.now();

  const routes: Record<string, (req: http.IncomingMessage) => Promise<Reply>> = {
    '/sweep': async () => [200, await config.sweeper.sweep()],

    '/purge/bucket': async (req) => {
      const body = bucketBodySchema.safeParse(await readJson(req));
      if (!body.success) return invalidRequest(body.error);
      return purgeResponse(await config.purge.purgeBucket(body.data.phenomenon, body.data.bucketId));
    },

    '/purge/member': async (req) => {
      const body = memberBodySchema.safeParse(await readJson(req));
      if (!body.success) return invalidRequest(body.error);
      const { phenomenon, bucketId, alertId } = body.data;
      return purgeResponse(await config.purge.purgeMember(phenomenon, bucketId, alertId));
    },
  };

  const handle = async (req: http.IncomingMessage): Promise<Reply> => {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    if (path === '/healthz' || path === '/health') {
      return [200, {
        status: 'ok',
        uptime: Math.floor((Date.now() - startedAt) / 1000),
        ingest: config.ingestStats(),
        sweep: config.sweeper.getStats(),
      }];
    }

    const route = routes[path];
    if (!route) return [404, { error: 'Not found' }];
    if (req.method !== 'POST') return [405, { error: 'Method not allowed' }, { Allow: 'POST' }];

    try {
      return await route(req);
    } catch (err) {
      if (err instanceof HttpError) return [err.status, { error: err.message }];
      if (err instanceof StoreUnavailableError) return [503, { error: err.message }];
      throw err;
    }
  };

  const server = http.createServer((req, res) => {
    handle(req)
      .catch((err: unknown): Reply => {
        config.logger?.error('HTTP request failed', { path: req.url, error: errorMessage(err) });
        return [500, { error: 'Internal error' }];
      })
      .then(([status, body, headers]) => {
        res.writeHead(status, { 'Content-Type': 'application/json', ...headers });
        res.end(JSON.stringify(body));
      })
      .catch((err: unknown) => {
        config.logger?.error('HTTP response failed', { path: req.url, error: errorMessage(err) });
      });
  });

  const { logger } = config;
  if (logger) {
    server.on('listening', () => logger.info('HTTP server listening', { port: config.port }));
    // A failed listen (EADDRINUSE) is reported here instead of thrown
    server.on('error', (err) => logger.error('HTTP server error', { port: config.port, error: errorMessage(err) }));
  }

  server.listen(config.port);
  return server;
}

function purgeResponse(result: PurgeResult): Reply {
  if (result.success) return [200, result];
  switch (result.reason) {
    case 'invalid-request':
      return [400, result];
    case 'store-unavailable':
      return [503, result];
    default:
      return [200, result];
  }
}

function invalidRequest(error: z.ZodError): Reply {
  const result: PurgeResult = { success: false, reason: 'invalid-request', message: formatIssues(error) };
  return [400, result];
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_BODY_BYTES) throw new HttpError(413, 'Request body too large');
    chunks.push(buf);
  }

  try {
    return JSON.parse(Buffer.concat(chunks).toString('utf-8'));
  } catch {
    throw new HttpError(400, 'Request body is not valid JSON');
  }
}
