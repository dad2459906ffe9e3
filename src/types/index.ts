/**
 * Core type definitions for couch-connect
 */

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'HEAD' | 'DELETE';

/**
 * How openDatabase() reads a failed existence check.
 *
 * - `create-on-any-failure`: any non-200 HEAD status triggers a create
 * - `create-on-not-found`: only 404 triggers a create, other statuses throw
 */
export type OpenPolicy = 'create-on-any-failure' | 'create-on-not-found';

export interface ConnectionConfig {
  uri: string;
  prefix: string;
  compression: boolean;
  timeout: number; // seconds
  openPolicy: OpenPolicy;
}

/**
 * Query parameters for a request. Arrays of pairs allow duplicate keys.
 */
export type QueryParams = Record<string, string> | Array<[string, string]>;

/**
 * Decoded response of a dispatched request.
 * Error statuses are returned, not thrown; only transport failures throw.
 */
export interface RawResponse {
  status: number;
  body: unknown;
}

/**
 * CouchDB server status, as returned by GET /
 */
export interface CouchVendor {
  name: string;
  version: string;
}

export interface CouchStatus {
  couchdb: string;
  uuid: string;
  version: string;
  vendor: CouchVendor;
}

/**
 * Envelope returned by mutating calls.
 * `ok` absent or false with error/reason populated signals failure.
 */
export interface CouchResponse {
  ok?: boolean;
  error?: string;
  reason?: string;
}

export interface DatabaseCreated extends CouchResponse {
  id?: string;
  name?: string;
}

/**
 * Mango sort spec: a bare field name or { field: direction }
 */
export type SortSpec = string | Record<string, 'asc' | 'desc'>;

export interface IndexFields {
  fields: SortSpec[];
}

export interface Index {
  ddoc?: string; // owning design document id
  name: string;
  type: string;
  def: IndexFields;
}

export interface DatabaseIndexList {
  total_rows: number;
  indexes: Index[];
}

export interface IndexCreated {
  result?: string;
  id?: string;
  name?: string;
  error?: string;
  reason?: string;
}

export interface DesignCreated {
  result?: string;
  id?: string;
  name?: string;
  error?: string;
  reason?: string;
}

export interface DatabaseInfo {
  db_name: string;
  doc_count: number;
  doc_del_count: number;
  update_seq: string | number;
  purge_seq?: string | number;
  compact_running?: boolean;
  instance_start_time?: string;
  sizes?: {
    active: number;
    external: number;
    file: number;
  };
}
