import express, { type Express } from 'express';
import cors from 'cors';
import type { HubContext } from './services/context';
import { createDevicesRouter } from './routes/devices';
import { createProductsRouter } from './routes/products';
import { createShelvesRouter } from './routes/shelves';
import { createReadingsRouter } from './routes/readings';
import { errorMiddleware } from './routes/apiError';

export function createServer(ctx: HubContext, corsOrigin: string[] | string = '*'): Express {
  const app = express();

  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());

  app.get('/health', (_req, res) => res.json({ ok: true }));

  app.use('/api/devices', createDevicesRouter(ctx));
  app.use('/api/products', createProductsRouter(ctx));
  app.use('/api/shelves', createShelvesRouter(ctx));
  app.use('/api', createReadingsRouter(ctx));

  app.use((_req, res) => res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Route not found' } }));
  app.use(errorMiddleware);

  return app;
}
