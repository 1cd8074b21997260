import { ConnectionOptions } from 'snowflake-sdk';
import { ConfigurationError } from '../utils/errors';

export interface DatabaseConfig {
  snowflake: ConnectionOptions;
}

// Lazy initialization to ensure environment variables are loaded
let _databaseConfig: DatabaseConfig | null = null;

function missingSnowflakeVariables(env: NodeJS.ProcessEnv): string[] {
  const missingVars: string[] = [];
  if (!env.SNOWFLAKE_ACCOUNT) missingVars.push('SNOWFLAKE_ACCOUNT');
  if (!env.SNOWFLAKE_USER && !env.SNOWFLAKE_USERNAME) missingVars.push('SNOWFLAKE_USER or SNOWFLAKE_USERNAME');
  if (!env.SNOWFLAKE_PASSWORD) missingVars.push('SNOWFLAKE_PASSWORD');
  return missingVars;
}

export function createDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  validateDatabaseConfig(env);

  return {
    snowflake: {
      account: env.SNOWFLAKE_ACCOUNT ?? '',
      username: env.SNOWFLAKE_USER || env.SNOWFLAKE_USERNAME || '',
      password: env.SNOWFLAKE_PASSWORD ?? '',
      database: env.SNOWFLAKE_DATABASE || 'MARKETING',
      schema: env.SNOWFLAKE_SCHEMA || 'PUBLIC',
      warehouse: env.SNOWFLAKE_WAREHOUSE || 'COMPUTE_WH',
      role: env.SNOWFLAKE_ROLE || 'RECON_ROLE',
      clientSessionKeepAlive: true,
      clientSessionKeepAliveHeartbeatFrequency: 3600, // 1 hour
    },
  };
}

export function getDatabaseConfig(): DatabaseConfig {
  if (!_databaseConfig) {
    _databaseConfig = createDatabaseConfig();
  }
  return _databaseConfig;
}

// Validate required environment variables
export function validateDatabaseConfig(env: NodeJS.ProcessEnv = process.env): void {
  const missingVars = missingSnowflakeVariables(env);
  if (missingVars.length > 0) {
    throw new ConfigurationError(`Missing required environment variables: ${missingVars.join(', ')}`, {
      missing: missingVars,
    });
  }
}
