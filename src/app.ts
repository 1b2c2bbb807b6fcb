import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { env } from './config/env';
import { errorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/logger';
import { createSearchRateLimiter } from './middleware/rateLimiter';
import { createRequireAdmin } from './middleware/requireAdmin';
import { createCatalogRouter, type CatalogServices } from './routes/catalog';
import { NotFoundError } from './utils/errors';

export interface AppOptions {
  searchRateLimitPerMinute?: number;
  adminToken?: string;
}

export function createApp(services: CatalogServices, options: AppOptions = {}) {
  const app = express();

  app.use(helmet());

  app.use(
    cors({
      origin: env.NODE_ENV === 'development' ? ['http://localhost:5173', 'http://localhost:3001'] : [],
    })
  );

  app.use(express.json());

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(requestLogger);

  const searchLimiter = createSearchRateLimiter(
    options.searchRateLimitPerMinute ?? env.SEARCH_RATE_LIMIT_PER_MINUTE
  );
  const requireAdmin = createRequireAdmin(options.adminToken ?? env.CATALOG_ADMIN_TOKEN);
  app.use('/api/catalog', createCatalogRouter(services, { searchLimiter, requireAdmin }));

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route not found: ${req.method} ${req.path}`, 'ROUTE_NOT_FOUND'));
  });

  app.use(errorHandler);

  return app;
}
