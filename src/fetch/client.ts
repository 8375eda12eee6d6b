import { TransportError } from '../error/transportError.js';
import type { FetchClientProviderDefinition, HeaderOptions, RequestDescriptor } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** User-Agent sent unless configured otherwise. */
export const DEFAULT_USER_AGENT = 'gamma-typed';

/** Options to configure the {@link FetchClient} transport. */
export interface FetchClientOptions {
  /**
   * Extra default headers, layered over the built-in ones.
   * A `null` value removes a built-in header.
   */
  headers?: HeaderOptions;
  /**
   * Value of the `User-Agent` header.
   * @default 'gamma-typed'
   */
  userAgent?: string;
}

/**
 * Thin transport over the native `fetch` API (undici, with its keep-alive pool) that:
 * - resolves endpoint paths against a fixed base host,
 * - sends a fixed set of default headers, or a per-call replacement set,
 * - returns the raw response for every status as an error-first tuple via {@link SafeWrapAsync}.
 *
 * Status interpretation is left to the caller.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Base host all endpoints are resolved against. Always ends with `/`. */
  #host: URL;
  /** Default headers applied when a call has no override. */
  #headers: Headers;

  /** Creates a new transport bound to a host + options */
  constructor(host: URL, opts: FetchClientOptions = {}) {
    this.#host = new URL(host);
    if (!this.#host.pathname.endsWith('/')) {
      this.#host.pathname += '/';
    }

    this.#headers = mergeHeaderOptions(
      {
        'User-Agent': opts.userAgent ?? DEFAULT_USER_AGENT,
        Accept: '*/*',
        Connection: 'keep-alive',
        'Content-Type': 'application/json',
      },
      opts.headers,
    );
  }

  /** Base host, as a copy. */
  get host(): URL {
    return new URL(this.#host);
  }

  /** Default headers, as a copy. */
  get headers(): Headers {
    return new Headers(this.#headers);
  }

  /**
   * Joins the base host and endpoint into a single URL.
   *
   * - Strips a leading slash from the endpoint so it appends to the host path instead of replacing it.
   *
   * @param endpoint - Endpoint path relative to the host, optionally with a query string.
   */
  url(endpoint: string): URL {
    return new URL(endpoint.replace(/^\/+/, ''), this.#host);
  }

  /**
   * Sends a request descriptor.
   *
   * - `headers`, when given, replace the defaults for this call entirely.
   * - No body is ever sent.
   *
   * Errors:
   * - Network / fetch errors are wrapped in {@link TransportError}.
   * - Non-2xx responses are NOT errors here.
   *
   * @returns A promise resolving to `[error, response]`.
   */
  async execute(request: RequestDescriptor, headers?: HeaderOptions): SafeWrapAsync<TransportError, Response> {
    const [err, res] = await safeWrapAsync(() =>
      fetch(request.url, {
        method: request.method,
        headers: headers ? mergeHeaderOptions(headers) : this.headers,
      }),
    );

    if (err) {
      return [
        new TransportError(`error wrapping ${request.method} request in fetchClient`, request.method, request.url.pathname, {
          cause: err,
        }),
        null,
      ];
    }

    return [null, res];
  }
}
