import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { ReconciliationConfig } from './config/reconciliation';
import { errorHandler } from './middleware/errorHandler';
import { rateLimiter } from './middleware/rateLimiter';
import { createHealthRouter } from './routes/health';
import { createReconciliationRouter } from './routes/reconciliation';
import { MartQueryService } from './services/martQueryService';
import { ReconciliationEngine } from './services/reconciliationEngine';
import { SnowflakeService } from './services/snowflakeService';
import { createLogger } from './utils/logger';

const logger = createLogger('http');

export interface AppServices {
  warehouse: SnowflakeService;
  engine: ReconciliationEngine;
  config: ReconciliationConfig;
}

export function createApp({ warehouse, engine, config }: AppServices): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors({
    origin: process.env.CORS_ORIGIN ? process.env.CORS_ORIGIN.split(',') : true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Requested-With']
  }));

  // Performance middleware
  app.use(compression());
  app.use(express.json({ limit: '10mb' }));

  // Rate limiting
  app.use(rateLimiter);

  // Logging middleware
  app.use((req, _res, next) => {
    logger.info(`${req.method} ${req.path}`, {
      ip: req.ip,
      userAgent: req.get('User-Agent'),
    });
    next();
  });

  app.use('/health', createHealthRouter({ warehouse, engine }));
  app.use(
    '/api/v1/reconciliation',
    createReconciliationRouter({
      engine,
      config,
      martQuery: new MartQueryService(warehouse, config.target),
    })
  );

  // Error handling
  app.use(errorHandler);

  return app;
}
