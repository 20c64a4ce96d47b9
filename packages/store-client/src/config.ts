import dotenv from 'dotenv';

dotenv.config();

export interface ClientConfig {
  serverUrl: string;
  timeoutMs: number;
}

const DEFAULT_CONFIG: ClientConfig = {
  serverUrl: 'http://localhost:8081',
  timeoutMs: 10000,
};

/**
 * Resolve client settings: explicit overrides, then BOOKSTORE_* environment
 * variables, then defaults.
 */
export function loadClientConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  const envTimeout = parseInt(process.env.BOOKSTORE_TIMEOUT_MS || '', 10);

  return {
    serverUrl: overrides.serverUrl ?? process.env.BOOKSTORE_SERVER_URL ?? DEFAULT_CONFIG.serverUrl,
    timeoutMs: overrides.timeoutMs ?? (Number.isNaN(envTimeout) ? DEFAULT_CONFIG.timeoutMs : envTimeout),
  };
}
