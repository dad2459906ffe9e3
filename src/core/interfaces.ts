/**
 * Core interfaces for request dispatch and database lifecycle
 * These interfaces allow the database handle and callers to be tested
 * against fakes instead of a live server.
 */

import type { CouchStatus, QueryParams, RawResponse } from '../types/index.js';
import type { PreparedRequest } from './transport.js';
import type { Database } from './database.js';

/**
 * Builds requests against one server and sends them
 */
export interface IRequestDispatcher {
  get(path: string, query?: QueryParams): PreparedRequest;
  head(path: string, query?: QueryParams): PreparedRequest;
  delete(path: string, query?: QueryParams): PreparedRequest;
  post(path: string, body: unknown): PreparedRequest;
  put(path: string, body?: unknown): PreparedRequest;

  /**
   * Execute a prepared request. Error statuses resolve; transport failures reject.
   */
  send(request: PreparedRequest): Promise<RawResponse>;
}

/**
 * Server-level database lifecycle operations
 */
export interface IDatabaseServer {
  listDatabaseNames(): Promise<string[]>;

  /**
   * Return a handle to the database, creating it when the existence check fails
   */
  openDatabase(name: string): Promise<Database>;

  createDatabase(name: string): Promise<Database>;

  /**
   * @returns the server's `ok` flag, false when absent
   */
  destroyDatabase(name: string): Promise<boolean>;

  serverStatus(): Promise<CouchStatus>;
}
