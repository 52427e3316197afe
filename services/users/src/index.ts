import { createAuditLogger, createLogger, initDatabase, startServer, toError } from '@geav/shared';
import { loadConfig } from './config/config';
import { PostgresUserRepository } from './repositories/UserRepository';
import { createServer } from './server';

const logger = createLogger('users-service');

/**
 * Users service entry point
 *
 * The pg pool and CloudWatch client are created once here and shared by every request.
 */
async function main(): Promise<void> {
  const config = loadConfig();

  logger.info('Starting users service', {
    environment: config.environment,
    port: config.port,
    database: config.database.database,
  });

  const pool = await initDatabase(config.database);
  const audit = createAuditLogger(config.audit, { db: pool });

  const app = createServer({
    serviceName: config.audit.serviceName,
    users: new PostgresUserRepository(pool),
    audit,
  });

  startServer(app, config.port, logger, () => pool.end());
}

main().catch((error: unknown) => {
  logger.fatal('Failed to start users service', toError(error));
  process.exit(1);
});
