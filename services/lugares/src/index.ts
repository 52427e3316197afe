import { createAuditLogger, createLogger, initDatabase, startServer, toError } from '@geav/shared';
import { loadConfig } from './config/config';
import { PostgresLugarRepository } from './repositories/LugarRepository';
import { createServer } from './server';

const logger = createLogger('lugares-service');

async function main(): Promise<void> {
  const config = loadConfig();

  logger.info('Starting lugares service', {
    environment: config.environment,
    port: config.port,
  });

  const pool = await initDatabase(config.database);
  const audit = createAuditLogger(config.audit, { db: pool });

  const app = createServer({
    serviceName: config.audit.serviceName,
    lugares: new PostgresLugarRepository(pool),
    audit,
  });

  startServer(app, config.port, logger, () => pool.end());
}

main().catch((error: unknown) => {
  logger.fatal('Failed to start lugares service', toError(error));
  process.exit(1);
});
