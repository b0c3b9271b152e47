import http from 'http';
import { z } from 'zod';
import { DEFAULT_RECENT_LIMIT, MAX_RECENT_LIMIT } from './constants.js';
import { getLogger } from './logger.js';
import { renderProm, type Metrics } from './metrics.js';
import type { ScanQueue } from './queue.js';
import type { ScanStore } from './store.js';
import { getErrorMessage } from './types/errors.js';
import { validateInteger, validateRepoUrl } from './validation.js';

export type ServerHandle = {
  server: http.Server;
  port: number;
  close(): Promise<void>;
};

export type ServerOptions = {
  queue: ScanQueue;
  store: ScanStore;
  metrics: Metrics;
  port?: number;
  host?: string;
  /** Largest accepted request body in bytes */
  maxBodyBytes?: number;
};

const ScanRequestSchema = z.object({ repoUrl: z.string().min(1) });

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

type Json = Record<string, unknown> | unknown[];

function sendJson(res: http.ServerResponse, status: number, body: Json) {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

async function readBody(req: http.IncomingMessage, limit: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > limit) throw new HttpError(413, 'request body too large');
    chunks.push(buf);
  }
  return Buffer.concat(chunks).toString('utf8');
}

function parseLimit(raw: string | null): number {
  if (raw === null) return DEFAULT_RECENT_LIMIT;
  const v = validateInteger(raw, 1, MAX_RECENT_LIMIT, 'limit');
  if (!v.valid || v.value === undefined) throw new HttpError(400, v.error ?? 'invalid limit');
  return v.value;
}

function requireStore(store: ScanStore) {
  if (!store.enabled) throw new HttpError(503, 'scan store is not configured');
}

/**
 * Scan request API plus health and Prometheus endpoints.
 */
export function startServer(opts: ServerOptions): Promise<ServerHandle> {
  const log = getLogger('server');
  const port = opts.port ?? 8000;
  const maxBodyBytes = opts.maxBodyBytes ?? 64 * 1024;

  async function route(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const method = req.method ?? 'GET';
    const parts = url.pathname.split('/').filter(Boolean);

    if (method === 'GET' && url.pathname === '/healthz') {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('ok');
      return;
    }
    if (method === 'GET' && url.pathname === '/metrics') {
      res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
      res.end(renderProm(opts.metrics));
      return;
    }
    if (method === 'POST' && url.pathname === '/scan') {
      let data: unknown;
      try {
        data = JSON.parse(await readBody(req, maxBodyBytes));
      } catch (err) {
        if (err instanceof HttpError) throw err;
        throw new HttpError(400, 'request body must be JSON');
      }
      const parsed = ScanRequestSchema.safeParse(data);
      if (!parsed.success) throw new HttpError(400, 'repoUrl is required');
      const check = validateRepoUrl(parsed.data.repoUrl);
      if (!check.valid) throw new HttpError(400, check.error ?? 'invalid repoUrl');
      const taskId = opts.queue.submit(parsed.data.repoUrl);
      sendJson(res, 202, { taskId, status: 'pending' });
      return;
    }
    if (method === 'GET' && parts.length === 2 && parts[0] === 'scan') {
      const status = opts.queue.status(parts[1]);
      if (!status) throw new HttpError(404, 'task not found');
      sendJson(res, 200, status);
      return;
    }
    if (method === 'GET' && url.pathname === '/scans/recent') {
      requireStore(opts.store);
      sendJson(res, 200, await opts.store.recent(parseLimit(url.searchParams.get('limit'))));
      return;
    }
    if (method === 'GET' && url.pathname === '/scans/history') {
      requireStore(opts.store);
      const repoUrl = url.searchParams.get('repoUrl');
      if (!repoUrl) throw new HttpError(400, 'repoUrl query parameter is required');
      sendJson(res, 200, await opts.store.byRepo(repoUrl, parseLimit(url.searchParams.get('limit'))));
      return;
    }
    if (method === 'GET' && parts.length === 2 && parts[0] === 'scans') {
      requireStore(opts.store);
      const found = await opts.store.get(parts[1]);
      if (!found) throw new HttpError(404, 'scan not found');
      sendJson(res, 200, { ...found.record, issues: found.issues });
      return;
    }
    throw new HttpError(404, 'not found');
  }

  return new Promise((resolve, reject) => {
    const server = http.createServer((req, res) => {
      route(req, res).catch((err: unknown) => {
        if (err instanceof HttpError) {
          sendJson(res, err.status, { error: err.message });
          return;
        }
        log.error('request failed', { url: req.url, error: getErrorMessage(err) });
        sendJson(res, 500, { error: 'internal error' });
      });
    });
    server.on('error', (e) => reject(e));
    server.listen(port, opts.host, () => {
      const addr = server.address();
      const p = typeof addr === 'string' ? 0 : addr?.port || port;
      log.info(`listening on port ${p}`);
      resolve({ server, port: p, close: () => new Promise<void>((res) => server.close(() => res())) });
    });
  });
}
