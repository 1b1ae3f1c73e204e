import http from 'http';
import type { IncomingMessage, ServerResponse } from 'http';
import { componentLogger } from './logger';
import type { Logger } from './logger';
import { errorMessage } from './result';
import type { WebhookHandler, WebhookResponse } from './webhook';

export const MAX_BODY_BYTES = 64 * 1024;

export interface ServerOptions {
  handler: WebhookHandler;
  enforceSourceIp: boolean;
  trustProxy: boolean;
  maxBodyBytes?: number;
  logger?: Logger;
}

class PayloadTooLargeError extends Error {
  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = 'PayloadTooLargeError';
  }
}

function send(res: ServerResponse, statusCode: number, payload: unknown): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(payload));
}

function sendWebhook(res: ServerResponse, out: WebhookResponse): void {
  res.writeHead(out.statusCode, out.headers);
  res.end(out.body);
}

function readBody(req: IncomingMessage, limit: number): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;
    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > limit) {
        tooLarge = true;
        reject(new PayloadTooLargeError(limit));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!tooLarge) resolve(Buffer.concat(chunks).toString('utf8'));
    });
    req.on('error', reject);
  });
}

/**
 * Caller address as seen by this process, or the first X-Forwarded-For hop
 * when running behind a trusted proxy.
 */
export function sourceAddressOf(req: IncomingMessage, trustProxy: boolean): string | undefined {
  if (trustProxy) {
    const header = req.headers['x-forwarded-for'];
    const first = (Array.isArray(header) ? header[0] : header)?.split(',')[0]?.trim();
    if (first) return first;
  }
  return req.socket.remoteAddress;
}

export function createWebhookServer(opts: ServerOptions): http.Server {
  const logger = opts.logger ?? componentLogger('server');
  const limit = opts.maxBodyBytes ?? MAX_BODY_BYTES;

  async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');

    if (req.method === 'GET' && pathname === '/health') {
      send(res, 200, { ok: true });
      return;
    }

    if (req.method === 'POST' && (pathname === '/' || pathname === '/webhook')) {
      let body: string;
      try {
        body = await readBody(req, limit);
      } catch (err) {
        if (err instanceof PayloadTooLargeError) {
          send(res, 413, { status: 'error', message: err.message });
          req.resume();
          return;
        }
        throw err;
      }
      const sourceAddress = opts.enforceSourceIp ? sourceAddressOf(req, opts.trustProxy) : undefined;
      logger.info({ path: pathname, sourceAddress, bytes: body.length }, 'webhook received');
      sendWebhook(res, await opts.handler({ body, sourceAddress }));
      return;
    }

    send(res, 404, { error: 'not found' });
  }

  return http.createServer((req, res) => {
    route(req, res).catch((err: unknown) => {
      logger.error({ err }, 'error processing request');
      if (!res.headersSent) send(res, 500, { status: 'error', message: errorMessage(err) });
      else res.end();
    });
  });
}

/** Resolves with the bound port once listening. */
export function listen(server: http.Server, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (err: NodeJS.ErrnoException) => {
      if (err.code === 'EACCES') {
        reject(new Error(`Permission denied: cannot use port ${port}. Use a port above 1024 or run with elevated privileges.`));
      } else if (err.code === 'EADDRINUSE') {
        reject(new Error(`Port ${port} is already in use. Set PORT to a different value.`));
      } else {
        reject(err);
      }
    };
    server.once('error', onError);
    server.listen(port, () => {
      server.off('error', onError);
      const address = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : port);
    });
  });
}
