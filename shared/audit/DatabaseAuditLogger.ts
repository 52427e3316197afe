/**
 * DatabaseAuditLogger - audit table sink
 *
 * Inserts one row per audit call. The table is created on first use;
 * a failed creation is retried on the next call.
 */

import { LogEntry } from '../types/logging.types';
import { AppError, AppErrorCodes, toError } from '../errors/AppError';
import { Queryable } from '../database/Database';
import { createLogger, Logger } from '../utils/logger';
import { BaseAuditLogger } from './AuditLogger';

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export function createTableStatement(tableName: string): string {
  return `
    CREATE TABLE IF NOT EXISTS ${tableName} (
      id SERIAL PRIMARY KEY,
      timestamp TIMESTAMP WITH TIME ZONE NOT NULL,
      level TEXT NOT NULL,
      message TEXT NOT NULL,
      service_name TEXT NOT NULL,
      request_id TEXT,
      user_id INTEGER,
      action TEXT,
      resource TEXT,
      resource_id TEXT,
      metadata JSONB,
      error_message TEXT,
      created_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP
    )
  `;
}

export function insertStatement(tableName: string): string {
  return `
    INSERT INTO ${tableName} (
      timestamp, level, message, service_name, request_id, user_id,
      action, resource, resource_id, metadata, error_message
    ) VALUES (
      $1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11
    )
  `;
}

function orNull<T>(value: T, empty: T): T | null {
  return value === empty ? null : value;
}

export class DatabaseAuditLogger extends BaseAuditLogger {
  private tableReady: Promise<void> | null = null;

  constructor(
    private readonly db: Queryable,
    serviceName: string,
    private readonly tableName: string,
    fallback: Logger = createLogger('DatabaseAuditLogger')
  ) {
    super(serviceName, fallback);

    if (!TABLE_NAME_PATTERN.test(tableName)) {
      throw new AppError(`Invalid audit table name: ${tableName}`, AppErrorCodes.INVALID_TABLE_NAME, {
        tableName,
      });
    }
  }

  /**
   * Idempotent; concurrent callers share one in-flight CREATE TABLE
   */
  async ensureTable(): Promise<void> {
    const pending = this.tableReady ?? this.createTable();
    this.tableReady = pending;

    try {
      await pending;
    } catch (error) {
      if (this.tableReady === pending) {
        this.tableReady = null;
      }
      throw error;
    }
  }

  protected async write(entry: LogEntry): Promise<void> {
    try {
      await this.ensureTable();
    } catch (error) {
      this.fallback.error('Error ensuring log table', toError(error), { table: this.tableName });
      return;
    }

    let metadataJSON: string | null = null;
    if (entry.metadata) {
      try {
        metadataJSON = JSON.stringify(entry.metadata);
      } catch (error) {
        this.fallback.error('Error marshaling metadata', toError(error), { table: this.tableName });
        return;
      }
    }

    try {
      await this.db.query(insertStatement(this.tableName), [
        entry.timestamp,
        entry.level,
        entry.message,
        entry.serviceName,
        orNull(entry.requestId, ''),
        orNull(entry.userId, 0),
        orNull(entry.action, ''),
        orNull(entry.resource, ''),
        orNull(entry.resourceId, ''),
        metadataJSON,
        entry.error ? entry.error.message : null,
      ]);
    } catch (error) {
      this.fallback.error('Error inserting log entry', toError(error), {
        table: this.tableName,
        level: entry.level,
      });
    }
  }

  private async createTable(): Promise<void> {
    await this.db.query(createTableStatement(this.tableName));
  }
}
