import express from 'express';
import type { RequestHandler } from 'express';
import cors from 'cors';
import type { CorsOptions } from 'cors';
import type { AppConfig } from './connections/config/app.config';
import { withSession } from './connections/db/session';
import type { ScopeDependencies } from './middlewares/scope.middleware';
import { requestScope } from './middlewares/scope.middleware';
import type { AvatarStorage } from './modules/upload/storage.service';
import { createApiRouter } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import type { HealthResponse } from './types/response.types';
import { logger } from './utils/logging';

export interface AppDependencies extends ScopeDependencies {
  config: AppConfig;
  storage: AvatarStorage;
  profileLimiter?: RequestHandler;
}

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:3001',
  'http://localhost:5173',
  'http://localhost:5174',
];

export const buildCorsOptions = (config: AppConfig): CorsOptions => {
  const allowedOrigins = new Set<string>(config.corsOrigins);
  if (config.frontendUrl) {
    allowedOrigins.add(config.frontendUrl);
  }
  if (config.nodeEnv === 'development') {
    DEV_ORIGINS.forEach((origin) => allowedOrigins.add(origin));
  }

  return {
    origin: (origin, callback) => {
      // Requests with no origin (curl, server to server)
      if (!origin || allowedOrigins.has(origin)) {
        callback(null, true);
        return;
      }
      // In development, allow all origins if CORS_ORIGINS is not set
      if (config.nodeEnv === 'development' && config.corsOrigins.length === 0) {
        callback(null, true);
        return;
      }
      callback(null, false);
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
    exposedHeaders: ['X-RateLimit-Limit', 'X-RateLimit-Remaining', 'X-RateLimit-Reset', 'Retry-After'],
    maxAge: 86400, // 24 hours
    optionsSuccessStatus: 200,
  };
};

export const createApp = (deps: AppDependencies) => {
  const { config } = deps;
  const app = express();

  // Middleware
  app.use(cors(buildCorsOptions(config)));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await withSession(deps.pool, (client) => client.query('SELECT 1'));
      const body: HealthResponse = { status: 'ok', database: 'connected' };
      res.json(body);
    } catch (error: unknown) {
      logger.error('[Health] Database check failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      const body: HealthResponse = { status: 'error', database: 'disconnected' };
      res.status(500).json(body);
    }
  });

  // Locally stored avatars
  app.use('/uploads', express.static(config.storage.uploadDir));

  // API Routes
  app.use(
    '/api',
    requestScope(deps),
    createApiRouter({
      storage: deps.storage,
      maxFileSize: config.storage.maxFileSize,
      profileLimiter: deps.profileLimiter,
    })
  );

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
