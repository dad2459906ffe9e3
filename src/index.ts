export { CouchConnection } from './core/couch-connection.js';
export { createIndexFields } from './core/database.js';
export type { Database, CreateIndexOptions } from './core/database.js';
export type { IDatabaseServer, IRequestDispatcher } from './core/interfaces.js';
export type { PreparedRequest, Transport } from './core/transport.js';
export {
  CouchError,
  ConfigurationError,
  TransportError,
  DecodeError,
  ServerError,
  UNSPECIFIED_ERROR,
} from './core/errors.js';
export type { CouchErrorCode } from './core/errors.js';
export {
  CouchStatusSchema,
  CouchResponseSchema,
  DatabaseCreatedSchema,
  DatabaseIndexListSchema,
  DatabaseInfoSchema,
  DesignCreatedSchema,
  IndexCreatedSchema,
  IndexFieldsSchema,
  IndexSchema,
  decode,
} from './core/schemas.js';
export { loadConfig } from './utils/config.js';
export type * from './types/index.js';
