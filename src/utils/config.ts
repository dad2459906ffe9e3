import dotenv from 'dotenv';
import { ConnectionConfig, OpenPolicy } from '../types/index.js';
import { DEFAULT_TIMEOUT } from '../core/transport.js';

dotenv.config();

function parseOpenPolicy(value: string | undefined): OpenPolicy {
  return value === 'create-on-not-found' ? 'create-on-not-found' : 'create-on-any-failure';
}

/**
 * Embed credentials into the base URL the same way a user would type them
 */
function withCredentials(url: string, username?: string, password?: string): string {
  if (!username || !password) {
    return url;
  }
  const auth = `${encodeURIComponent(username)}:${encodeURIComponent(password)}`;
  return url.replace('://', `://${auth}@`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ConnectionConfig {
  const timeout = parseInt(env.COUCHDB_TIMEOUT || String(DEFAULT_TIMEOUT), 10);

  return {
    uri: withCredentials(
      env.COUCHDB_URL || 'http://localhost:5984',
      env.COUCHDB_USERNAME,
      env.COUCHDB_PASSWORD
    ),
    prefix: env.COUCHDB_PREFIX || '',
    compression: env.COUCHDB_COMPRESSION !== 'false',
    timeout: Number.isInteger(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT,
    openPolicy: parseOpenPolicy(env.COUCHDB_OPEN_POLICY),
  };
}
