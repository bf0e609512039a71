import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { existsSync } from 'node:fs';
import type { Server } from 'node:http';
import { fileURLToPath } from 'node:url';
import { logger } from '../utils/logger.js';
import { createEventRoutes } from './routes.js';
import type { EventLogger } from '../event-logger.js';

export interface AppOptions {
  projectId: string | null;
  publicDir?: string;
}

// Same depth from src/server and dist/server.
export function resolvePublicDir(): string | null {
  const dir = fileURLToPath(new URL('../../public', import.meta.url));
  return existsSync(dir) ? dir : null;
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

/** Status code of a 4xx error raised by body parsing (size limit, charset, encoding), else null. */
export function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  if (!('expose' in err) || err.expose !== true) return null;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createApp(eventLogger: EventLogger, options: AppOptions): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: '64kb' }));

  app.use(createEventRoutes(eventLogger, options.projectId));

  const publicDir = options.publicDir ?? resolvePublicDir();
  if (publicDir) {
    app.use(express.static(publicDir, {
      setHeaders: (res) => {
        res.setHeader('Cache-Control', 'no-store, no-cache, must-revalidate, proxy-revalidate');
      },
    }));
  } else {
    logger.warn('Static page not found; only the JSON endpoints are served');
  }

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ status: 'Invalid request (malformed JSON)', active_event: eventLogger.activeEvent });
      return;
    }
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      const message = err instanceof Error ? err.message : 'rejected';
      logger.warn(`Rejected request: ${message}`);
      res.status(clientStatus).json({ status: `Invalid request (${message})`, active_event: eventLogger.activeEvent });
      return;
    }
    logger.error(`Request failed: ${err instanceof Error ? err.message : String(err)}`);
    res.status(500).json({ status: 'Internal error', active_event: eventLogger.activeEvent });
  });

  return app;
}

export function startServer(app: Express, host: string, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}
