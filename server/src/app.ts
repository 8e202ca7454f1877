/**
 * Express app setup
 */

import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { randomUUID } from 'crypto';
import { logger } from './lib/logger';
import { rateLimiter } from './lib/rateLimit';
import weatherRoutes from './routes/weather.routes';
import healthRoutes from './routes/health.routes';

const requestId = (req: Request, res: Response, next: NextFunction) => {
  const reqId = req.get('X-Request-ID') || randomUUID();
  res.setHeader('X-Request-ID', reqId);
  next();
};

const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();

  res.on('finish', () => {
    logger.info(
      {
        reqId: res.getHeader('X-Request-ID'),
        method: req.method,
        url: req.originalUrl ?? req.url,
        status: res.statusCode,
        duration: Date.now() - start,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
      },
      'Request completed'
    );
  });

  next();
};

const app = express();

// API only: no CSP
app.use(helmet({
  contentSecurityPolicy: false,
  crossOriginEmbedderPolicy: false,
}));

const corsOrigins = process.env['CORS_ORIGINS']?.split(',') || ['http://localhost:3000'];
app.use(cors({
  origin: corsOrigins,
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'X-Request-ID'],
}));

app.use(express.json({ limit: '100kb' }));

app.use(requestId);
app.use(requestLogger);
app.use(rateLimiter);

app.use('/api/v1', weatherRoutes);
app.use('/api/v1/healthz', healthRoutes);
app.use('/health', healthRoutes);

app.get('/', (_req: Request, res: Response) => {
  res.json({
    service: 'Station Weather API',
    version: '1.0.0',
    status: 'running',
    timestamp: new Date().toISOString(),
    endpoints: {
      current_temperature: 'POST /api/v1/current-temperature',
      annual_temperature: 'POST /api/v1/annual-temperature',
      health: '/api/v1/healthz',
    },
  });
});

app.use('*', (req: Request, res: Response) => {
  res.status(404).json({
    error: 'Not Found',
    message: `Route ${req.originalUrl} not found`,
    timestamp: new Date().toISOString(),
  });
});

// malformed JSON bodies surface here as 400s from express.json
app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
  const reqId = res.getHeader('X-Request-ID');
  const status = typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
    ? error.status
    : 500;

  logger.error({
    reqId,
    err: error,
    url: req.url,
    method: req.method,
  }, 'Unhandled error');

  res.status(status).json({
    error: status === 400 ? 'bad_request' : 'Internal Server Error',
    message: process.env['NODE_ENV'] === 'development' && error instanceof Error ? error.message : 'Something went wrong',
    timestamp: new Date().toISOString(),
    ...(typeof reqId === 'string' && { requestId: reqId }),
  });
});

export default app;
