/**
 * Configuration types shared by every service
 */

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  sslMode: 'disable' | 'require';
  poolMax: number;
}

export interface AuditConfig {
  serviceName: string;
  tableName: string;
  namespace: string;
  region: string;
}

export interface ServiceConfig {
  port: number;
  environment: 'development' | 'production' | 'test';
  database: DatabaseConfig;
  audit: AuditConfig;
}
