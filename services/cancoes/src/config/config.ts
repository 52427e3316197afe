import { ServiceConfig, loadServiceConfig } from '@geav/shared';

export type Config = ServiceConfig;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return loadServiceConfig(env);
}
