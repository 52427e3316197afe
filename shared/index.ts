/**
 * Shared package exports
 */

// Types
export * from './types/api.types';
export * from './types/config.types';
export * from './types/logging.types';

// Errors
export * from './errors/AppError';
export * from './errors/NotFoundError';
export * from './errors/UserInputError';

// Logging
export * from './utils/logger';

// Audit
export * from './audit/AuditLogger';
export * from './audit/CloudWatchAuditLogger';
export * from './audit/CompositeAuditLogger';
export * from './audit/DatabaseAuditLogger';
export * from './audit/context';
export * from './audit/createAuditLogger';
export * from './audit/logEntry';

// Persistence
export * from './database/Database';
export * from './models/NamedEntity';
export * from './repositories/NamedEntityRepository';

// Config
export * from './config/loadServiceConfig';

// HTTP
export * from './http/createApp';
export * from './http/requestContext';
export * from './http/ResourceHandler';
export * from './http/responses';
export * from './http/schemas';
export * from './http/startServer';
