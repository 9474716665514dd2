// src/app.ts
// Armado de la app Express; el listen vive en server.ts para poder testear con supertest

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createGenerateRoutes } from './routes/generateRoutes';
import type { GenerateControllerDeps } from './controllers/generateController';
import { createErrorMiddleware } from './utils/errorHandler';

export function createApp(deps: GenerateControllerDeps): express.Express {
  const app = express();

  // Middlewares...
  app.use(helmet());
  app.use(cors({ origin: '*' }));
  app.use(express.json({ limit: '1mb' }));

  // Rutas...
  app.use('/api', createGenerateRoutes(deps));

  app.get('/', (_req, res) => {
    res.json({
      message: 'API Generador QR - Backend corriendo correctamente',
      version: '1.0.0',
      timestamp: new Date().toISOString(),
    });
  });

  // 404 - Ruta no encontrada
  app.use('*', (_req, res) => {
    res.status(404).json({ error: 'Ruta no encontrada' });
  });

  // Manejo global de errores custom
  app.use(createErrorMiddleware(deps.logger));

  return app;
}
