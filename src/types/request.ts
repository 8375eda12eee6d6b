import type { FetchClientOptions } from '../fetch/client.js';
import type { TransportError } from '../error/transportError.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the transport; a `null`/`undefined` value drops the header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** HTTP methods the Gamma API is read with. */
export type HttpMethod = 'GET';

/**
 * A not-yet-sent request: built fresh for every call and never reused.
 */
export interface RequestDescriptor {
  /** HTTP method */
  method: HttpMethod;
  /** Absolute URL, host + resource path + query string */
  url: URL;
}

/** Per-call options accepted by every client method. */
export interface RequestOptions {
  /**
   * Headers sent instead of the client's defaults. These fully replace the defaults
   * for this call, they are not merged.
   */
  headers?: HeaderOptions;
}

/** Contract for HTTP transports used by RequestClient. */
export interface FetchClientProviderDefinition {
  /** Normalized base host every request is resolved against. */
  readonly host: URL;
  /** Default headers sent when a call supplies no override. */
  readonly headers: Headers;
  /** Resolves a relative endpoint path (with query string) against the host. */
  url: (endpoint: string) => URL;
  /** Sends the request, resolving to the raw response for any status. */
  execute: (request: RequestDescriptor, headers?: HeaderOptions) => SafeWrapAsync<TransportError, Response>;
}

/** Factory signature for constructing HTTP providers. */
export interface FetchClientProvider {
  /** Creates a new instance of the transport, bound to a host + options */
  new (host: URL, opts: FetchClientOptions): FetchClientProviderDefinition;
}
