import cors from 'cors';
import express from 'express';

import { ServerConfig } from './config';
import { requestLogger } from './middleware/requestLogger';
import summariesRouter from './routes/summaries';

const corsOptions = {
  allowedHeaders: ['Content-Type', 'Authorization'],
  methods: ['GET', 'POST', 'OPTIONS'],
  origin: '*',
};

/**
 * Build the express application without binding a port.
 */
export function createApp(): express.Express {
  const app = express();
  app.disable('x-powered-by'); // Prevent version disclosure

  // eslint-disable-next-line sonarjs/cors -- CORS is intentionally enabled for API access
  app.use(cors(corsOptions));
  app.use(express.json({ limit: ServerConfig.bodyLimit }));

  // Add request logging middleware (before routes)
  app.use(requestLogger);

  app.use('/api/workouts', summariesRouter);

  // Health check endpoint
  app.get('/health', (_req: express.Request, res: express.Response) => {
    res.status(200).send('OK');
  });

  return app;
}
