import { NamedEntityRepository, createAuditLogger, createLogger, initDatabase, startServer, toError } from '@geav/shared';
import { loadConfig } from './config/config';
import { createServer } from './server';

const logger = createLogger('catalog-service');

async function main(): Promise<void> {
  const config = loadConfig();

  logger.info('Starting catalog service', {
    environment: config.environment,
    port: config.port,
  });

  const pool = await initDatabase(config.database);
  const audit = createAuditLogger(config.audit, { db: pool });

  const app = createServer({
    serviceName: config.audit.serviceName,
    stores: {
      ramos: new NamedEntityRepository(pool, 'ramos', 'ramo'),
      tags_lugares: new NamedEntityRepository(pool, 'tags_lugares', 'tag'),
      tags_cancoes: new NamedEntityRepository(pool, 'tags_cancoes', 'tag'),
    },
    audit,
  });

  startServer(app, config.port, logger, () => pool.end());
}

main().catch((error: unknown) => {
  logger.fatal('Failed to start catalog service', toError(error));
  process.exit(1);
});
