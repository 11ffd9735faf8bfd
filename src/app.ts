import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createRoutes } from './routes';
import { AppServices } from './services';
import { errorHandler } from './middleware/errorHandler';

/**
 * Build the Express application around a set of services
 */
export function createApp(services: AppServices): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'message-categorizer',
      version: '1.0.0'
    });
  });

  app.use('/api', createRoutes(services));

  // 404 handler
  app.use('*', (req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`,
      availableRoutes: {
        health: 'GET /health',
        categories: 'GET|POST /api/categories',
        messages: 'GET|POST /api/messages',
        classify: 'POST /api/messages/:id/classify',
        bootstrap: 'POST /api/bootstrap'
      }
    });
  });

  app.use(errorHandler);

  return app;
}
