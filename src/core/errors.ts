import type { ZodError } from 'zod';

export type CouchErrorCode = 'CONFIGURATION' | 'TRANSPORT' | 'DECODE' | 'SERVER';

/**
 * Base class for every error raised by the client
 */
export class CouchError extends Error {
  constructor(
    message: string,
    public readonly code: CouchErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CouchError';
  }
}

/**
 * Invalid base URI, or a path/query that cannot be composed into a URI
 */
export class ConfigurationError extends CouchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION', options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Network failure, timeout, or a transport that could not be built
 */
export class TransportError extends CouchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT', options);
    this.name = 'TransportError';
  }
}

/**
 * Response body did not match the expected JSON shape
 */
export class DecodeError extends CouchError {
  public readonly zodError: ZodError | null;

  constructor(message: string, zodError?: ZodError | null) {
    super(message, 'DECODE');
    this.name = 'DecodeError';
    this.zodError = zodError ?? null;
  }
}

export const UNSPECIFIED_ERROR = 'unspecified error';

/**
 * The server's envelope reported failure
 */
export class ServerError extends CouchError {
  constructor(
    message: string = UNSPECIFIED_ERROR,
    public readonly status?: number
  ) {
    super(message, 'SERVER');
    this.name = 'ServerError';
  }
}

/**
 * Build a ServerError from a failed envelope: reason first, then error name
 */
export function envelopeError(
  envelope: { error?: string; reason?: string },
  status?: number
): ServerError {
  return new ServerError(envelope.reason ?? envelope.error ?? UNSPECIFIED_ERROR, status);
}
