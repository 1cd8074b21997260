import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import { createApp } from './app';
import { loadReconciliationConfig } from './config/reconciliation';
import { ReconciliationEngine } from './services/reconciliationEngine';
import { snowflakeService } from './services/snowflakeService';
import { createLogger } from './utils/logger';
import { errorMessage } from './utils/errors';

const logger = createLogger();
const PORT = parseInt(process.env.PORT || '3001');

// Initialize services and start server
async function startServer(): Promise<void> {
  const config = loadReconciliationConfig();
  const engine = new ReconciliationEngine(snowflakeService, config);
  const app = createApp({ warehouse: snowflakeService, engine, config });

  // Test Snowflake connection
  const connected = await snowflakeService.testConnection();
  if (connected) {
    logger.info('Snowflake connection established successfully');
  } else {
    logger.warn('Snowflake is unreachable; read endpoints will fail until it recovers');
  }

  app.listen(PORT, '0.0.0.0', () => {
    logger.info(`Reconciliation API running on port ${PORT}`);
    logger.info(`Environment: ${process.env.NODE_ENV || 'development'}`);
    logger.info('Available endpoints:');
    logger.info('  - GET  /health');
    logger.info('  - GET  /api/v1/reconciliation');
    logger.info('  - GET  /api/v1/reconciliation/summary');
    logger.info('  - GET  /api/v1/reconciliation/rule-sets');
    logger.info('  - POST /api/v1/reconciliation/preview');
    logger.info('  - POST /api/v1/reconciliation/runs');
  });
}

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully`);
  await snowflakeService.disconnect();
  process.exit(0);
}

// Graceful shutdown
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
