/**
 * Express application wiring
 */

import type { Server } from 'node:http';
import cors from 'cors';
import express from 'express';
import type { Express } from 'express';
import type { AppConfig } from '../config';
import type { ClassifierCapability } from '../services/EmotionAnalyst';
import { SessionAnalyzer } from '../services/SessionAnalyzer';
import type { SessionStore } from '../services/SessionStore';
import { createLogger } from '../utils/logger';
import { errorHandler, notFoundHandler } from './errorHandler';
import { createApiRouter } from './routes';

const log = createLogger('Api');

export interface AppDependencies {
  config: Pick<AppConfig, 'maxContentLength'>;
  store: SessionStore;
  capability: ClassifierCapability;
}

export function createApp({ config, store, capability }: AppDependencies): Express {
  const app = express();

  const analyzer = new SessionAnalyzer(store, capability, progress => {
    log.debug(`[${progress.stage}] ${progress.message}`);
  });

  app.use(cors());
  app.use(express.json({ limit: config.maxContentLength }));

  app.use('/api', createApiRouter({ store, capability, analyzer }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

/**
 * Resolve once the server is bound; bind errors such as EADDRINUSE reject
 */
export function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      server.off('error', reject);
      resolve(server);
    });
    server.once('error', reject);
  });
}
