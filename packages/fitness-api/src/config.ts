import { SERVER_CONFIG } from '@fitledger/shared';

export interface ApiConfig {
  port: number;
  host: string;
  token?: string;
  logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return {
    port: parseInt(env.FITNESS_API_PORT || String(SERVER_CONFIG.FITNESS_API_PORT)),
    host: env.FITNESS_API_HOST || SERVER_CONFIG.FITNESS_API_HOST,
    token: env.FITNESS_API_TOKEN || undefined,
    logLevel: env.LOG_LEVEL || 'info',
  };
}
