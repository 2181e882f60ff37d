import bytes from 'bytes';
import { ConfigError } from './Errors';

export interface ServerConfig {
  host: string;
  port: number;
  /** Largest request body the server reads, in `bytes` notation (e.g. `10mb`). */
  bodyLimit: string;
}

export const DEFAULT_CONFIG: ServerConfig = {
  host: 'localhost',
  port: 4000,
  bodyLimit: '10mb',
};

export const MAX_PORT = 65535;

export function resolveServerConfig(config?: Partial<ServerConfig>): ServerConfig {
  const resolved = { ...DEFAULT_CONFIG, ...config };

  if (!Number.isInteger(resolved.port) || resolved.port < 0 || resolved.port > MAX_PORT) {
    throw new ConfigError(`port must be an integer between 0 and ${MAX_PORT}`);
  }
  if (resolved.host.trim().length === 0) {
    throw new ConfigError('host must not be empty');
  }
  // Same parser the body reader applies to its `limit` option
  const limit = bytes.parse(resolved.bodyLimit);
  if (limit === null || limit < 0) {
    throw new ConfigError(`Invalid bodyLimit: ${resolved.bodyLimit}`);
  }

  return resolved;
}
