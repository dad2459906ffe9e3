import {
  DatabaseIndexList,
  DatabaseInfo,
  IndexCreated,
  IndexFields,
  RawResponse,
  SortSpec,
} from '../types/index.js';
import { IRequestDispatcher } from './interfaces.js';
import { envelopeError } from './errors.js';
import {
  CouchResponseSchema,
  DatabaseIndexListSchema,
  DatabaseInfoSchema,
  IndexCreatedSchema,
  decode,
} from './schemas.js';
import logger from '../utils/logger.js';

export function createIndexFields(fields: SortSpec[]): IndexFields {
  return { fields };
}

export interface CreateIndexOptions {
  name?: string;
  ddoc?: string;
}

function ensureOk(response: RawResponse): void {
  if (response.status >= 200 && response.status < 300) {
    return;
  }
  throw envelopeError(decode(CouchResponseSchema, response.body, 'error envelope'), response.status);
}

/**
 * Handle to one named database.
 * Holds no server state; obtained from CouchConnection.openDatabase() or createDatabase().
 */
export class Database {
  /**
   * @internal Handles come from the connection, not from callers.
   */
  constructor(
    public readonly name: string,
    public readonly connection: IRequestDispatcher
  ) {}

  /**
   * Path of this database, or of a resource inside it, relative to the server root
   */
  path(subpath?: string): string {
    const base = encodeURIComponent(this.name);
    return subpath ? `${base}/${subpath.replace(/^\/+/, '')}` : base;
  }

  async info(): Promise<DatabaseInfo> {
    try {
      const response = await this.connection.send(this.connection.get(this.path()));
      ensureOk(response);
      return decode(DatabaseInfoSchema, response.body, 'database info');
    } catch (error) {
      logger.error({ error, database: this.name }, 'Failed to get database info');
      throw error;
    }
  }

  async listIndexes(): Promise<DatabaseIndexList> {
    try {
      const response = await this.connection.send(this.connection.get(this.path('_index')));
      ensureOk(response);
      return decode(DatabaseIndexListSchema, response.body, 'index list');
    } catch (error) {
      logger.error({ error, database: this.name }, 'Failed to list indexes');
      throw error;
    }
  }

  /**
   * Create a Mango JSON index
   */
  async createIndex(index: IndexFields, options: CreateIndexOptions = {}): Promise<IndexCreated> {
    const body: Record<string, unknown> = { index, type: 'json' };
    if (options.name !== undefined) {
      body.name = options.name;
    }
    if (options.ddoc !== undefined) {
      body.ddoc = options.ddoc;
    }

    try {
      const response = await this.connection.send(this.connection.post(this.path('_index'), body));
      const created = decode(IndexCreatedSchema, response.body, 'index creation response');

      if (created.error !== undefined) {
        throw envelopeError(created, response.status);
      }

      logger.info({ database: this.name, index: created.name, result: created.result }, 'Index created');
      return created;
    } catch (error) {
      logger.error({ error, database: this.name }, 'Failed to create index');
      throw error;
    }
  }
}
