import express, { type Express, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { resolve } from 'node:path';
import type { Database } from 'better-sqlite3';
import type { AppConfig } from './config.js';
import type { ApiResponse } from './types/index.js';
import { createServices, type Services } from './services/index.js';
import { createApiRouter } from './routes/index.js';
import { errorHandler, requestLogger } from './middleware/index.js';

export const APP_VERSION = '1.0.0';
export const JSON_BODY_LIMIT = '1mb';

export interface AppContext {
  config: Pick<AppConfig, 'mediaRoot' | 'mediaUrl' | 'bcryptRounds' | 'maxImageBytes'>;
  db: Database;
}

export interface CreatedApp {
  app: Express;
  services: Services;
}

export function createApp({ config, db }: AppContext): CreatedApp {
  const services = createServices(db, {
    mediaRoot: config.mediaRoot,
    mediaUrl: config.mediaUrl,
    bcryptRounds: config.bcryptRounds,
  });

  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());

  // Body parsing
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.use(requestLogger);

  // Uploaded images
  app.use(config.mediaUrl, express.static(resolve(config.mediaRoot), { index: false }));

  app.use('/api', createApiRouter(services, { maxImageBytes: config.maxImageBytes }));

  app.get('/', (_req: Request, res: Response): void => {
    const response: ApiResponse<{ message: string; version: string }> = {
      success: true,
      data: { message: 'Cookbook API', version: APP_VERSION },
    };
    res.json(response);
  });

  // Error handling (must be last)
  app.use(errorHandler);

  return { app, services };
}
