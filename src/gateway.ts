/**
 * HTTP + WebSocket front door.
 *
 * - `GET /` serves the control UI, `/static/*` its assets
 * - `GET /health` answers a fixed liveness payload
 * - `WS <wsPath>` opens one ControlSession per client
 */

import express, { type NextFunction, type Request, type Response } from 'express';
import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { Config } from './config.js';
import { RequestDebouncer } from './debounce.js';
import { createLogger } from './logger.js';
import { ControlSession, type ControlChannel } from './session.js';
import type { TabController } from './tab-controller.js';

const log = createLogger('gateway');

export interface Gateway {
  start: () => Promise<AddressInfo>;
  stop: () => Promise<void>;
  sessionCount: () => number;
}

function socketChannel(ws: WebSocket): ControlChannel {
  return {
    isOpen: () => ws.readyState === WebSocket.OPEN,
    send: (data) =>
      new Promise<void>((resolve, reject) => {
        ws.send(data, (err) => (err ? reject(err) : resolve()));
      }),
  };
}

function frameText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  if (req.path === '/health') {
    next();
    return;
  }
  const startTime = Date.now();
  res.on('finish', () => {
    log.debug(`${req.method} ${req.originalUrl} ${res.statusCode} (${Date.now() - startTime}ms)`);
  });
  next();
}

export function createGateway(config: Config, controller: TabController): Gateway {
  const app = express();
  app.use(requestLogger);

  const server = http.createServer(app);

  // noServer mode: upgrades on any other path are refused below
  const wss = new WebSocketServer({ noServer: true, perMessageDeflate: false });
  const sessions = new Set<ControlSession>();
  const addTabDebounce = new RequestDebouncer(config.gateway.addTabCooldownMs);

  app.get('/', (_req, res) => {
    res.sendFile(join(config.server.staticDir, 'index.html'));
  });

  app.use('/static', express.static(config.server.staticDir));

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', browser: 'connected' });
  });

  server.on('upgrade', (request, socket, head) => {
    const pathname = request.url?.split('?')[0];
    if (pathname !== config.server.wsPath) {
      log.warn(`Unknown WebSocket path: ${pathname}, destroying socket`);
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (ws) => {
      wss.emit('connection', ws, request);
    });
  });

  wss.on('connection', (ws: WebSocket) => {
    const session = new ControlSession(randomUUID(), socketChannel(ws), controller, {
      frameIntervalMs: config.stream.frameIntervalMs,
      addTabDebounce,
    });
    sessions.add(session);
    log.info(`Client connected. Total connections: ${sessions.size}`);

    const end = () => {
      if (!sessions.delete(session)) return;
      session.stop();
      log.info(`Client disconnected. Total connections: ${sessions.size}`);
    };

    ws.on('message', (data) => session.receive(frameText(data)));
    ws.on('close', end);
    ws.on('error', (err) => {
      log.error('WebSocket error', { error: err.message });
      end();
    });

    session.start();
  });

  return {
    start: () =>
      new Promise<AddressInfo>((resolve, reject) => {
        server.once('error', reject);
        server.listen(config.server.port, config.server.host, () => {
          server.off('error', reject);
          const address = server.address();
          if (address === null || typeof address === 'string') {
            reject(new Error('Server is not listening on a TCP port'));
            return;
          }
          log.info(`Listening on http://${address.address}:${address.port}`);
          resolve(address);
        });
      }),

    stop: async () => {
      for (const session of sessions) session.stop();
      sessions.clear();
      for (const client of wss.clients) client.terminate();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
      if (!server.listening) return;
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    },

    sessionCount: () => sessions.size,
  };
}
