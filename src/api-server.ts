import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { createChildLogger } from './logger.js';
import type { DedupStats } from './dedup/dedup-cache.js';
import type { RelayStats } from './relay/relay-stats.js';

const log = createChildLogger('api-server');

export type ApiHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export interface ApiServerDeps {
  readonly stats: RelayStats;
  readonly dedup: { stats(): DedupStats };
  readonly sourceChannel: string;
  readonly targetChannel: string;
  readonly polling?: () => boolean;
  readonly now?: () => number;
}

const jsonHeaders: Record<string, string> = {
  'Content-Type': 'application/json',
  'Cache-Control': 'no-store',
};

/**
 * 헬스체크/상태 API 핸들러 생성 (테스트에서 직접 호출)
 *  GET /health        → 200 OK (호스팅 헬스체크용)
 *  GET / , /api/status → 릴레이 상태 JSON
 */
export function createApiHandler(deps: ApiServerDeps): ApiHandler {
  const now = deps.now ?? Date.now;

  return async function handler(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const path = (req.url ?? '/').split('?')[0] ?? '/';
    const method = req.method ?? 'GET';

    const known = path === '/' || path === '/health' || path === '/api/status' || path === '/api/status/';
    if (!known) {
      res.writeHead(404, jsonHeaders);
      res.end(JSON.stringify({ error: 'Not found' }));
      return;
    }
    if (method !== 'GET' && method !== 'HEAD') {
      res.writeHead(405, jsonHeaders);
      res.end(JSON.stringify({ error: 'Method not allowed' }));
      return;
    }

    if (path === '/health') {
      res.writeHead(200, { 'Content-Type': 'text/plain; charset=utf-8' });
      res.end('OK');
      return;
    }

    const snap = deps.stats.snapshot();
    const status = {
      status: 'running',
      sourceChannel: deps.sourceChannel,
      targetChannel: deps.targetChannel,
      polling: deps.polling ? deps.polling() : null,
      uptimeSec: Math.floor((now() - snap.startedAt) / 1000),
      relay: snap,
      dedup: deps.dedup.stats(),
    };
    res.writeHead(200, jsonHeaders);
    res.end(JSON.stringify(status));
  };
}

export function startApiServer(deps: ApiServerDeps, port: number): Server {
  const handle = createApiHandler(deps);
  const server = createServer((req, res) => {
    handle(req, res).catch((err) => {
      log.error({ err }, 'API handler error');
      if (!res.headersSent) res.writeHead(500, jsonHeaders);
      res.end(JSON.stringify({ error: 'Internal error' }));
    });
  });
  server.listen(port, () => {
    log.info({ port }, 'Health/status server listening');
  });
  return server;
}
