import { loadAuditConfig } from '../audit/createAuditLogger';
import { loadDatabaseConfig } from '../database/Database';
import { ServiceConfig } from '../types/config.types';

const ENVIRONMENTS: readonly ServiceConfig['environment'][] = ['development', 'production', 'test'];

function parseEnvironment(value: string | undefined): ServiceConfig['environment'] {
  return ENVIRONMENTS.find((environment) => environment === value) ?? 'development';
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return {
    port: parseInt(env.PORT || '8080', 10),
    environment: parseEnvironment(env.ENVIRONMENT),
    database: loadDatabaseConfig(env),
    audit: loadAuditConfig(env),
  };
}
