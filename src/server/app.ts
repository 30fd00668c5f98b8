import express, { type Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { requestIdMiddleware } from './middleware/requestId.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createProcurementRouter, type ProcurementRouterDeps } from './routes/procurementRoutes.js';

/**
 * Build the Express application. Kept free of I/O so it can be constructed in tests.
 */
export function createApp(deps: ProcurementRouterDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors());
  app.use(requestIdMiddleware);
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', commodityGroups: deps.classifier.labels().length });
  });

  app.use('/api/procurement', createProcurementRouter(deps));

  app.use(notFoundHandler);
  // Error handler must be registered last
  app.use(errorHandler);

  return app;
}
