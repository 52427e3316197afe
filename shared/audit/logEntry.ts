/**
 * LogEntry construction and serialization
 */

import {
  AuditContext,
  LogEntry,
  LogLevel,
  Metadata,
  RequestContext,
  SerializedLogEntry,
} from '../types/logging.types';
import { getRequestIdFromContext, getUserIdFromContext } from './context';

/**
 * Rebuild the wire-shape metadata map from an AuditContext.
 * Returns undefined when the context carries nothing.
 */
export function buildMetadata(audit?: AuditContext): Metadata | undefined {
  if (!audit) {
    return undefined;
  }

  const metadata: Metadata = {
    ...audit.extra,
    ...(audit.action !== undefined && { action: audit.action }),
    ...(audit.resource !== undefined && { resource: audit.resource }),
    ...(audit.resourceId !== undefined && { resource_id: audit.resourceId }),
  };

  return Object.keys(metadata).length > 0 ? metadata : undefined;
}

/**
 * Convert an untyped metadata map into an AuditContext.
 * Only string values of action/resource/resource_id are promoted; everything else stays in extra.
 */
export function auditContextFromMetadata(metadata: Record<string, unknown>): AuditContext {
  const audit: AuditContext = {};
  const extra: Metadata = {};

  for (const [key, value] of Object.entries(metadata)) {
    if (key === 'action' && typeof value === 'string') {
      audit.action = value;
    } else if (key === 'resource' && typeof value === 'string') {
      audit.resource = value;
    } else if (key === 'resource_id' && typeof value === 'string') {
      audit.resourceId = value;
    } else if (isMetadataValue(value)) {
      extra[key] = value;
    }
  }

  if (Object.keys(extra).length > 0) {
    audit.extra = extra;
  }
  return audit;
}

function isMetadataValue(value: unknown): value is Metadata[string] {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    typeof value === 'bigint'
  );
}

function promoted(metadata: Metadata | undefined, key: string): string {
  const value = metadata?.[key];
  return typeof value === 'string' ? value : '';
}

export function createLogEntry(
  serviceName: string,
  level: LogLevel,
  message: string,
  ctx: RequestContext | undefined,
  error?: Error | null,
  audit?: AuditContext
): LogEntry {
  const metadata = buildMetadata(audit);

  return {
    timestamp: new Date(),
    level,
    message,
    serviceName,
    requestId: getRequestIdFromContext(ctx),
    userId: getUserIdFromContext(ctx),
    action: promoted(metadata, 'action'),
    resource: promoted(metadata, 'resource'),
    resourceId: promoted(metadata, 'resource_id'),
    ...(metadata && { metadata }),
    ...(error && { error }),
  };
}

/**
 * Snake_case wire form with empty optional fields left out
 */
export function serializeLogEntry(entry: LogEntry): SerializedLogEntry {
  return {
    timestamp: entry.timestamp.toISOString(),
    level: entry.level,
    message: entry.message,
    service_name: entry.serviceName,
    ...(entry.requestId !== '' && { request_id: entry.requestId }),
    ...(entry.userId !== 0 && { user_id: entry.userId }),
    ...(entry.action !== '' && { action: entry.action }),
    ...(entry.resource !== '' && { resource: entry.resource }),
    ...(entry.resourceId !== '' && { resource_id: entry.resourceId }),
    ...(entry.metadata && { metadata: { ...entry.metadata } }),
  };
}
