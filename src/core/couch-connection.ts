import {
  ConnectionConfig,
  CouchStatus,
  HttpMethod,
  QueryParams,
  RawResponse,
} from '../types/index.js';
import { IDatabaseServer, IRequestDispatcher } from './interfaces.js';
import { Database } from './database.js';
import { ConfigurationError, ServerError, envelopeError } from './errors.js';
import {
  CouchResponseSchema,
  CouchStatusSchema,
  DatabaseCreatedSchema,
  DatabaseNamesSchema,
  decode,
} from './schemas.js';
import {
  DEFAULT_TIMEOUT,
  PreparedRequest,
  Transport,
  createTransport,
  dispatch,
  endpointOf,
} from './transport.js';
import logger from '../utils/logger.js';

function checkTimeout(seconds: number): void {
  if (!Number.isInteger(seconds) || seconds <= 0) {
    throw new ConfigurationError(`Timeout must be a positive whole number of seconds, got ${seconds}`);
  }
}

function parseBaseUri(uri: string): URL {
  try {
    return new URL(uri);
  } catch (error) {
    throw new ConfigurationError(`Invalid base URI: ${uri}`, { cause: error });
  }
}

/**
 * Connection to one CouchDB server.
 * Handles URI construction, request building and database lifecycle.
 */
export class CouchConnection implements IDatabaseServer, IRequestDispatcher {
  private config: ConnectionConfig;
  private transport: Transport;

  private constructor(config: ConnectionConfig, transport: Transport) {
    this.config = config;
    this.transport = transport;
  }

  /**
   * Connect with default settings: no prefix, compression on, 4s timeout
   */
  static create(uri: string): CouchConnection {
    return CouchConnection.fromConfig({
      uri,
      prefix: '',
      compression: true,
      timeout: DEFAULT_TIMEOUT,
      openPolicy: 'create-on-any-failure',
    });
  }

  static fromConfig(config: ConnectionConfig): CouchConnection {
    checkTimeout(config.timeout);
    const base = parseBaseUri(config.uri);
    const transport = createTransport(endpointOf(base), config.compression, config.timeout);
    return new CouchConnection({ ...config }, transport);
  }

  getConfig(): ConnectionConfig {
    return { ...this.config };
  }

  /**
   * Not validated until the next request is built
   */
  setUri(uri: string): void {
    this.config.uri = uri;
  }

  setPrefix(prefix: string): void {
    this.config.prefix = prefix;
  }

  setCompression(enabled: boolean): void {
    this.config.compression = enabled;
    this.transport = createTransport(this.transport.endpoint, enabled, this.config.timeout);
  }

  /**
   * @throws ConfigurationError unless `seconds` is a positive integer
   */
  setTimeout(seconds: number): void {
    checkTimeout(seconds);
    this.config.timeout = seconds;
    this.transport = createTransport(this.transport.endpoint, this.config.compression, seconds);
  }

  async listDatabaseNames(): Promise<string[]> {
    try {
      const response = await this.send(this.get('/_all_dbs'));
      return decode(DatabaseNamesSchema, response.body, 'database list');
    } catch (error) {
      logger.error({ error }, 'Failed to list databases');
      throw error;
    }
  }

  async openDatabase(name: string): Promise<Database> {
    const effectiveName = this.effectiveName(name);
    const db = new Database(effectiveName, this);

    try {
      const response = await this.send(this.head(encodeURIComponent(effectiveName)));

      if (response.status === 200) {
        logger.debug({ database: effectiveName }, 'Database exists');
        return db;
      }

      if (this.config.openPolicy === 'create-on-not-found' && response.status !== 404) {
        throw new ServerError(
          `Existence check for ${effectiveName} returned HTTP ${response.status}`,
          response.status
        );
      }

      logger.info({ database: effectiveName, status: response.status }, 'Database not found, creating it');
    } catch (error) {
      logger.error({ error, database: effectiveName }, 'Failed to open database');
      throw error;
    }

    return this.createDatabase(name);
  }

  async createDatabase(name: string): Promise<Database> {
    const effectiveName = this.effectiveName(name);

    try {
      const response = await this.send(this.put(encodeURIComponent(effectiveName)));
      const created = decode(DatabaseCreatedSchema, response.body, 'database creation response');

      if (created.ok !== true) {
        throw envelopeError(created, response.status);
      }

      logger.info({ database: effectiveName }, 'Database created');
      return new Database(effectiveName, this);
    } catch (error) {
      logger.error({ error, database: effectiveName }, 'Failed to create database');
      throw error;
    }
  }

  async destroyDatabase(name: string): Promise<boolean> {
    const effectiveName = this.effectiveName(name);

    try {
      const response = await this.send(this.delete(encodeURIComponent(effectiveName)));
      const result = decode(CouchResponseSchema, response.body, 'database deletion response');
      logger.info({ database: effectiveName, ok: result.ok ?? false }, 'Database destroy requested');
      return result.ok ?? false;
    } catch (error) {
      logger.error({ error, database: effectiveName }, 'Failed to destroy database');
      throw error;
    }
  }

  async serverStatus(): Promise<CouchStatus> {
    try {
      const response = await this.send(this.get(''));
      return decode(CouchStatusSchema, response.body, 'server status');
    } catch (error) {
      logger.error({ error }, 'Failed to fetch server status');
      throw error;
    }
  }

  /**
   * Build a request against the base URI.
   *
   * The base is treated as a directory and leading slashes on `path` are
   * dropped, so `base/` + `db` and `base` + `/db` resolve alike.
   * Credentials in the base URI go to the transport, never into the URI.
   */
  buildRequest(method: HttpMethod, path: string, query?: QueryParams): PreparedRequest {
    const base = parseBaseUri(this.config.uri);
    const uri = this.resolve(base, path, query);

    return {
      method,
      uri,
      headers: {
        'Content-Type': 'application/json',
        Referer: uri,
      },
      transport: this.transportFor(base),
    };
  }

  get(path: string, query?: QueryParams): PreparedRequest {
    return this.buildRequest('GET', path, query);
  }

  head(path: string, query?: QueryParams): PreparedRequest {
    return this.buildRequest('HEAD', path, query);
  }

  delete(path: string, query?: QueryParams): PreparedRequest {
    return this.buildRequest('DELETE', path, query);
  }

  post(path: string, body: unknown): PreparedRequest {
    return { ...this.buildRequest('POST', path), body };
  }

  put(path: string, body?: unknown): PreparedRequest {
    const request = this.buildRequest('PUT', path);
    return body === undefined ? request : { ...request, body };
  }

  send(request: PreparedRequest): Promise<RawResponse> {
    return dispatch(request);
  }

  private effectiveName(name: string): string {
    return `${this.config.prefix}${name}`;
  }

  private resolve(base: URL, path: string, query?: QueryParams): string {
    const root = new URL(base.href);
    root.search = '';
    root.hash = '';
    if (!root.pathname.endsWith('/')) {
      root.pathname = `${root.pathname}/`;
    }

    let url: URL;
    try {
      // './' keeps a segment such as "db:1" from being read as a scheme
      url = new URL(`./${path.replace(/^\/+/, '')}`, root);
    } catch (error) {
      throw new ConfigurationError(`Cannot resolve path ${path} against ${base.origin}`, { cause: error });
    }

    url.username = '';
    url.password = '';

    if (query) {
      const pairs = Array.isArray(query) ? query : Object.entries(query);
      for (const [key, value] of pairs) {
        url.searchParams.append(key, value);
      }
    }

    return url.href;
  }

  /**
   * The current transport, rebuilt first if setUri() moved to another server.
   * A URI the transport cannot be built for is a configuration problem here.
   */
  private transportFor(base: URL): Transport {
    const endpoint = endpointOf(base);
    if (endpoint !== this.transport.endpoint) {
      try {
        this.transport = createTransport(endpoint, this.config.compression, this.config.timeout);
      } catch (error) {
        throw new ConfigurationError(`Cannot build a transport for ${base.origin}`, { cause: error });
      }
    }
    return this.transport;
  }
}
