import tls from 'tls';
import type { ReadableStream } from 'stream/web';
import { Agent, fetch, type buildConnector, type Dispatcher } from 'undici';
import { DirectDialer, type Dialer } from './dialer.js';

export interface HttpClientOptions {
  headers?: Record<string, string>;
  timeout?: number;
  connectTimeout?: number;
  ignoreSsl?: boolean;
  dialer?: Dialer;
  /** Replaces the dialer-backed agent entirely (undici MockAgent in tests) */
  dispatcher?: Dispatcher;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string | number>;
  timeout?: number;
  signal?: AbortSignal;
  /** Stop reading the body after this many bytes and cancel the rest of the stream */
  maxBytes?: number;
}

export interface HttpResponse {
  url: string;
  status: number;
  ok: boolean;
  headers: Record<string, string>;
  body: string;
  /** True when the body was cut at `maxBytes` */
  truncated: boolean;
}

export class RequestTimeoutError extends Error {
  constructor(url: string, timeout: number) {
    super(`request to ${url} timed out after ${timeout}ms`);
    this.name = 'RequestTimeoutError';
  }
}

async function readPrefix(stream: ReadableStream<Uint8Array> | null, maxBytes: number): Promise<{ body: string; truncated: boolean }> {
  if (!stream) {
    return { body: '', truncated: false };
  }

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let received = 0;
  let truncated = false;

  while (received < maxBytes) {
    const { done, value } = await reader.read();
    if (done) break;
    chunks.push(value);
    received += value.byteLength;
  }

  if (received >= maxBytes) {
    truncated = true;
    await reader.cancel();
  }

  const bytes = Buffer.concat(chunks, received).subarray(0, maxBytes);
  return { body: bytes.toString('utf-8'), truncated };
}

/**
 * Thin fetch wrapper shared by the search providers and the snapshot fetcher.
 *
 * Connections are opened through the injected {@link Dialer}; TLS is layered
 * on here so a SOCKS route works for https targets as well. The whole request,
 * body included, is bounded by `timeout`.
 */
export class HttpClient {
  defaultHeaders: Record<string, string>;
  timeout: number;
  readonly dialer: Dialer;
  private connectTimeout: number;
  private rejectUnauthorized: boolean;
  private dispatcher: Dispatcher;
  private ownsDispatcher: boolean;

  constructor(options: HttpClientOptions = {}) {
    this.defaultHeaders = options.headers || {};
    this.timeout = options.timeout || 30000;
    this.connectTimeout = options.connectTimeout || 15000;
    this.rejectUnauthorized = !options.ignoreSsl;
    this.dialer = options.dialer || new DirectDialer();

    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({ connect: this._connector() });
      this.ownsDispatcher = true;
    }
  }

  private _connector(): buildConnector.connector {
    return (options: buildConnector.Options, callback: buildConnector.Callback) => {
      const secure = options.protocol === 'https:';
      const port = Number(options.port) || (secure ? 443 : 80);

      this.dialer.dial({ host: options.hostname, port, timeout: this.connectTimeout }).then(
        (socket) => {
          if (!secure) {
            callback(null, socket);
            return;
          }

          const tlsSocket = tls.connect({
            socket,
            servername: options.servername || options.hostname,
            rejectUnauthorized: this.rejectUnauthorized,
            ALPNProtocols: ['http/1.1']
          });
          tlsSocket.once('secureConnect', () => callback(null, tlsSocket));
          tlsSocket.once('error', (err) => callback(err, null));
        },
        (err: unknown) => callback(err instanceof Error ? err : new Error(String(err)), null)
      );
    };
  }

  async get(url: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const target = new URL(url);
    for (const [key, value] of Object.entries(options.query || {})) {
      target.searchParams.set(key, String(value));
    }

    const timeout = options.timeout || this.timeout;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new RequestTimeoutError(target.origin + target.pathname, timeout)), timeout);

    const parent = options.signal;
    const onParentAbort = () => controller.abort(parent?.reason);
    if (parent?.aborted) {
      controller.abort(parent.reason);
    } else {
      parent?.addEventListener('abort', onParentAbort, { once: true });
    }

    try {
      const response = await fetch(target.toString(), {
        method: 'GET',
        headers: { ...this.defaultHeaders, ...options.headers },
        redirect: 'follow',
        signal: controller.signal,
        dispatcher: this.dispatcher
      });

      const { body, truncated } = options.maxBytes === undefined
        ? { body: await response.text(), truncated: false }
        : await readPrefix(response.body, options.maxBytes);

      return {
        url: response.url || target.toString(),
        status: response.status,
        ok: response.ok,
        headers: Object.fromEntries(response.headers.entries()),
        body,
        truncated
      };
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}

export function createHttpClient(options: HttpClientOptions = {}): HttpClient {
  return new HttpClient(options);
}

export default createHttpClient;
