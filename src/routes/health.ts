import { Router, Request, Response } from 'express';
import { SnowflakeService } from '../services/snowflakeService';
import { ReconciliationEngine } from '../services/reconciliationEngine';
import { asyncHandler } from '../middleware/errorHandler';
import { createLogger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

const logger = createLogger('health');

export interface HealthRouterDeps {
  warehouse: SnowflakeService;
  engine: ReconciliationEngine;
}

export function createHealthRouter({ warehouse, engine }: HealthRouterDeps): Router {
  const router = Router();

  // Liveness only, never touches the warehouse
  router.get('/simple', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: `${Math.floor(process.uptime())}s`,
      environment: process.env.NODE_ENV || 'development'
    });
  });

  // Health check endpoint
  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const startTime = Date.now();

    const snowflakeHealthy = await warehouse.testConnection();
    const cacheStats = warehouse.getCacheStats();
    const lookups = cacheStats.hits + cacheStats.misses;

    const healthStatus = {
      status: snowflakeHealthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      environment: process.env.NODE_ENV || 'development',
      services: {
        snowflake: {
          status: snowflakeHealthy ? 'up' : 'down',
          database: process.env.SNOWFLAKE_DATABASE,
        },
        cache: {
          status: 'up',
          keys: cacheStats.keys,
          hitRate: lookups > 0 ? cacheStats.hits / lookups : 0
        },
        reconciliation: {
          running: engine.isRunning
        }
      },
      performance: {
        responseTime: `${Date.now() - startTime}ms`,
        uptime: `${Math.floor(process.uptime())}s`
      }
    };

    res.status(snowflakeHealthy ? 200 : 503).json(healthStatus);
  }));

  // Detailed health check with the currently discoverable sources
  router.get('/detailed', asyncHandler(async (_req: Request, res: Response) => {
    const startTime = Date.now();

    try {
      const tables = await engine.discover();

      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        sources: {
          spendTables: tables.spend.length,
          budgetTables: tables.budget.length
        },
        cache: warehouse.getCacheStats(),
        performance: {
          responseTime: `${Date.now() - startTime}ms`,
          uptime: `${Math.floor(process.uptime())}s`,
          memoryUsage: process.memoryUsage()
        },
        system: {
          nodeVersion: process.version,
          platform: process.platform,
          arch: process.arch
        }
      });
    } catch (error) {
      logger.error('Detailed health check failed', { error: errorMessage(error) });

      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: errorMessage(error)
      });
    }
  }));

  return router;
}
