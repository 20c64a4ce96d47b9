import dotenv from 'dotenv';

dotenv.config();

export interface ServerConfig {
  port: number;
  nodeEnv: string;
  /** Largest request body the RPC routes will read */
  bodyLimitBytes: number;
}

const DEFAULT_BODY_LIMIT_BYTES = 4 * 1024 * 1024;

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const bodyLimit = parseInt(env.STORE_REQUEST_BODY_LIMIT_BYTES || '', 10);

  return {
    port: parseInt(env.PORT || '8081', 10),
    nodeEnv: env.NODE_ENV || 'development',
    bodyLimitBytes: Number.isNaN(bodyLimit) || bodyLimit < 1 ? DEFAULT_BODY_LIMIT_BYTES : bodyLimit,
  };
}

export const config: ServerConfig = loadServerConfig();
