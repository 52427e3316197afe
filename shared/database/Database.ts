/**
 * Persistence gateway
 *
 * One pg Pool per process, built from environment configuration at cold start
 * and shared by every repository and the database audit sink.
 */

import { Pool } from 'pg';
import { DatabaseConfig } from '../types/config.types';
import { AppError, AppErrorCodes, toError } from '../errors/AppError';

export type Queryable = Pick<Pool, 'query'>;

export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  return {
    host: env.DB_HOST || 'localhost',
    port: parseInt(env.DB_PORT || '5432', 10),
    user: env.DB_USER || 'postgres',
    password: env.DB_PASSWORD || 'postgres',
    database: env.DB_NAME || 'geav',
    sslMode: env.DB_SSL_MODE === 'require' ? 'require' : 'disable',
    poolMax: parseInt(env.DB_POOL_MAX || '10', 10),
  };
}

export function createPool(config: DatabaseConfig): Pool {
  if (!Number.isInteger(config.port) || config.port <= 0) {
    throw new AppError(`Invalid database port: ${config.port}`, AppErrorCodes.INVALID_CONFIG, {
      port: config.port,
    });
  }

  return new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    max: config.poolMax,
    ssl: config.sslMode === 'require' ? { rejectUnauthorized: false } : false,
  });
}

/**
 * Open the pool and check connectivity once
 */
export async function initDatabase(config: DatabaseConfig = loadDatabaseConfig()): Promise<Pool> {
  const pool = createPool(config);

  try {
    await pool.query('SELECT 1');
  } catch (error) {
    await pool.end();
    throw new AppError(
      `Error connecting to the database: ${toError(error).message}`,
      AppErrorCodes.DATABASE_ERROR,
      { host: config.host, port: config.port, database: config.database }
    );
  }

  return pool;
}

/**
 * pg returns NUMERIC and BIGINT columns as strings
 */
export function decodeNumeric(value: string | number | null): number {
  return value === null ? 0 : Number(value);
}

/**
 * Wrap a driver failure with the operation that caused it
 */
export function databaseError(operation: string, error: unknown): AppError {
  return new AppError(`Error ${operation}: ${toError(error).message}`, AppErrorCodes.DATABASE_ERROR, {
    operation,
  });
}
