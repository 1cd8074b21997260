import snowflake from 'snowflake-sdk';
import NodeCache from 'node-cache';
import { getDatabaseConfig } from '../config/database';
import { createLogger } from '../utils/logger';
import { WarehouseError } from '../utils/errors';
import { QueryCacheOptions, QueryResult, SqlBind, Warehouse, WarehouseRow } from '../types/reconciliation';

const logger = createLogger('snowflake');

export class SnowflakeService implements Warehouse {
  private connection: snowflake.Connection | null = null;
  private cache: NodeCache;
  private isConnected = false;
  private connecting: Promise<void> | null = null;

  constructor() {
    // Cache with 5 minute default TTL
    this.cache = new NodeCache({
      stdTTL: parseInt(process.env.CACHE_TTL_SECONDS || '300'),
      checkperiod: 60,
      useClones: false,
    });
  }

  /**
   * Open the shared connection. Callers arriving while a connect is pending
   * wait on the same attempt.
   */
  async connect(): Promise<void> {
    if (this.isConnected && this.connection) {
      return;
    }
    if (!this.connecting) {
      this.connecting = this.openConnection().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private openConnection(): Promise<void> {
    return new Promise((resolve, reject) => {
      const connection = snowflake.createConnection(getDatabaseConfig().snowflake);
      this.connection = connection;

      connection.connect((err) => {
        if (err) {
          logger.error('Failed to connect to Snowflake', { error: err.message });
          this.connection = null;
          reject(new WarehouseError(`Snowflake connection failed: ${err.message}`));
          return;
        }

        this.isConnected = true;
        logger.info('Successfully connected to Snowflake');
        resolve();
      });
    });
  }

  async disconnect(): Promise<void> {
    const connection = this.connection;
    if (!connection || !this.isConnected) {
      return;
    }

    return new Promise((resolve) => {
      connection.destroy((err) => {
        if (err) {
          logger.error('Error disconnecting from Snowflake', { error: err.message });
        } else {
          logger.info('Disconnected from Snowflake');
        }
        this.isConnected = false;
        this.connection = null;
        resolve();
      });
    });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.connect();
      const result = await this.executeQuery('SELECT 1 AS TEST');
      return result.rows.length > 0;
    } catch (error) {
      logger.error('Snowflake connection test failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /**
   * Run one statement. Results are cached only when the caller opts in, so
   * discovery and materialization always see the live catalog.
   */
  async executeQuery(
    sqlText: string,
    binds: SqlBind[] = [],
    options: QueryCacheOptions = {}
  ): Promise<QueryResult<WarehouseRow>> {
    const startTime = Date.now();
    const cacheKey =
      options.cacheKey ||
      `query:${Buffer.from(sqlText + JSON.stringify(binds)).toString('base64').slice(0, 50)}`;

    if (options.useCache) {
      const cached = this.cache.get<QueryResult<WarehouseRow>>(cacheKey);
      if (cached) {
        logger.debug(`Cache hit for query: ${cacheKey}`);
        return cached;
      }
    }

    await this.connect();

    return new Promise((resolve, reject) => {
      const connection = this.connection;
      if (!connection) {
        reject(new WarehouseError('No Snowflake connection available'));
        return;
      }

      connection.execute({
        sqlText,
        binds,
        complete: (err, _stmt, rows) => {
          const executionTime = Date.now() - startTime;

          if (err) {
            logger.error('Snowflake query error', {
              error: err.message,
              sqlText: sqlText.substring(0, 200),
              executionTime,
            });
            reject(new WarehouseError(`Query failed: ${err.message}`, { sqlState: err.sqlState }));
            return;
          }

          const resultRows: WarehouseRow[] = rows ?? [];
          const result: QueryResult<WarehouseRow> = {
            rows: resultRows,
            totalCount: resultRows.length,
            executionTime,
          };

          if (options.useCache && result.rows.length > 0) {
            const ttl = options.cacheTTL || parseInt(process.env.CACHE_TTL_SECONDS || '300');
            this.cache.set(cacheKey, result, ttl);
            logger.debug(`Cached query result: ${cacheKey}`);
          }

          logger.debug('Query executed successfully', {
            rowCount: result.totalCount,
            executionTime,
            sqlText: sqlText.substring(0, 100),
          });

          resolve(result);
        },
      });
    });
  }

  // Cache management
  clearCache(pattern?: string): void {
    if (pattern) {
      const keys = this.cache.keys().filter((key) => key.includes(pattern));
      this.cache.del(keys);
      logger.info(`Cleared ${keys.length} cache entries matching pattern: ${pattern}`);
    } else {
      this.cache.flushAll();
      logger.info('Cleared all cache entries');
    }
  }

  getCacheStats(): NodeCache.Stats {
    return this.cache.getStats();
  }
}

export const snowflakeService = new SnowflakeService();
