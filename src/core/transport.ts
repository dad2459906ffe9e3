import Nano from 'nano';
import { z } from 'zod';
import { HttpMethod, RawResponse } from '../types/index.js';
import { TransportError } from './errors.js';
import logger from '../utils/logger.js';

export const DEFAULT_TIMEOUT = 4; // seconds

/**
 * A built nano server scope plus the settings it was built with.
 * Never mutated: configuration changes produce a new Transport.
 */
export interface Transport {
  readonly server: Nano.ServerScope;
  readonly endpoint: string;
  readonly compression: boolean;
  readonly timeout: number;
}

/**
 * A request that has been built but not sent.
 * It keeps the transport that was current when it was built.
 */
export interface PreparedRequest {
  method: HttpMethod;
  uri: string;
  headers: Record<string, string>;
  body?: unknown;
  transport: Transport;
}

// A nano failure that carries an HTTP answer
const HttpFailureSchema = z.object({
  statusCode: z.number().int(),
  message: z.string().optional().catch(undefined),
  headers: z
    .object({ 'content-type': z.string().optional().catch(undefined) })
    .passthrough()
    .optional()
    .catch(undefined),
  error: z.string().optional().catch(undefined),
  reason: z.string().optional().catch(undefined),
});

// Headers nano hands to a relax() callback, status included
const ResponseHeadersSchema = z.object({
  statusCode: z.number().int(),
});

/**
 * Scheme, credentials and host of a base URL; nano treats any path on its
 * url as a database name, so the path travels with each request instead.
 */
export function endpointOf(url: URL): string {
  const auth = url.username ? `${url.username}${url.password ? `:${url.password}` : ''}@` : '';
  return `${url.protocol}//${auth}${url.host}`;
}

export function createTransport(endpoint: string, compression: boolean, timeout: number): Transport {
  try {
    const server = Nano({
      url: endpoint,
      requestDefaults: { timeout: timeout * 1000 },
    });
    logger.debug({ compression, timeout }, 'Transport built');
    return { server, endpoint, compression, timeout };
  } catch (error) {
    throw new TransportError('Failed to build HTTP transport', { cause: error });
  }
}

type RelaxCallback = (error: unknown, body?: unknown, headers?: unknown) => void;

/**
 * Run relax() in its callback form, which is the one that reports the
 * response headers and with them the real status code.
 */
function relax(
  server: Nano.ServerScope,
  options: Nano.RequestOptions
): Promise<{ body: unknown; headers: unknown }> {
  return new Promise((resolve, reject) => {
    const callback: RelaxCallback = (error, body, headers) => {
      if (error) {
        reject(error);
      } else {
        resolve({ body, headers });
      }
    };
    // nano may also hand back a promise; a second settle is ignored
    Promise.resolve(server.relax(options, callback)).catch(reject);
  });
}

/**
 * Body of an HTTP failure: the server's envelope when it answered JSON,
 * otherwise the raw text so decoding reports the mismatch.
 */
function failureBody(failure: z.output<typeof HttpFailureSchema>): unknown {
  const contentType = failure.headers?.['content-type'];
  const isJson = contentType === undefined ? failure.error !== undefined : contentType.includes('json');
  if (isJson) {
    return { error: failure.error, reason: failure.reason };
  }
  return failure.message ?? '';
}

/**
 * Send a prepared request through the transport it captured.
 *
 * HTTP error statuses resolve with the status and the server's body;
 * only failures without an HTTP answer (network, timeout) reject.
 */
export async function dispatch(request: PreparedRequest): Promise<RawResponse> {
  const { transport, method, uri } = request;
  const target = new URL(uri);

  const headers: Record<string, string> = {
    ...request.headers,
    'Accept-Encoding': transport.compression ? 'gzip, deflate' : 'identity',
  };

  logger.debug({ method, uri }, 'Dispatching request');

  try {
    const reply = await relax(transport.server, {
      method,
      path: `${target.pathname.slice(1)}${target.search}`,
      headers,
      body: request.body,
    });

    const status = ResponseHeadersSchema.safeParse(reply.headers);
    return {
      status: status.success ? status.data.statusCode : 200,
      body: method === 'HEAD' ? null : reply.body,
    };
  } catch (error) {
    const failure = HttpFailureSchema.safeParse(error);
    if (failure.success) {
      const { statusCode } = failure.data;
      logger.debug({ method, uri, statusCode }, 'Server answered with an error status');
      return { status: statusCode, body: method === 'HEAD' ? null : failureBody(failure.data) };
    }

    logger.error({ error, method, uri }, 'Request failed');
    throw new TransportError(`${method} ${uri} failed`, { cause: error });
  }
}
