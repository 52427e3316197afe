import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { AuditConfig } from '../types/config.types';
import { Queryable } from '../database/Database';
import { AuditLogger } from './AuditLogger';
import { CloudWatchAuditLogger, MetricsClient } from './CloudWatchAuditLogger';
import { CompositeAuditLogger } from './CompositeAuditLogger';
import { DatabaseAuditLogger } from './DatabaseAuditLogger';

export interface AuditLoggerDeps {
  db: Queryable;
  metricsClient?: MetricsClient;
}

/**
 * Metrics sink first, database sink second
 */
export function createAuditLogger(config: AuditConfig, deps: AuditLoggerDeps): AuditLogger {
  const metricsClient = deps.metricsClient ?? new CloudWatchClient({ region: config.region });

  return new CompositeAuditLogger([
    new CloudWatchAuditLogger(metricsClient, config.serviceName, config.namespace),
    new DatabaseAuditLogger(deps.db, config.serviceName, config.tableName),
  ]);
}

export function loadAuditConfig(env: NodeJS.ProcessEnv = process.env): AuditConfig {
  return {
    serviceName: env.SERVICE_NAME || 'geav-site-api',
    tableName: env.AUDIT_TABLE || 'api_logs',
    namespace: env.METRICS_NAMESPACE || 'GeavSite/API',
    region: env.AWS_REGION || 'us-east-1',
  };
}
