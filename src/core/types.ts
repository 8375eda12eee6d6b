import type { StandardSchemaV1 } from '@standard-schema/spec';
import type { HttpMethod } from '../types/request.js';

/**
 * Declarative description of one API endpoint: which method, which path template,
 * how its `{placeholder}` segments and query string are typed, and what it returns.
 *
 * @typeParam PathInput - Shape accepted for `$path`, inferred from the `$path` schema.
 * @typeParam SearchInput - Shape accepted for `$search`, inferred from the `$search` schema.
 * @typeParam Output - Decoded response type, inferred from the `response` schema.
 */
export interface EndpointDefinition<PathInput = unknown, SearchInput = unknown, Output = unknown> {
  method: HttpMethod;
  /** Path relative to the host, `{name}` segments filled from `$path` (e.g. `tags/{id}/related-tags`). */
  path: string;
  $path?: StandardSchemaV1<PathInput, unknown>;
  $search?: StandardSchemaV1<SearchInput, unknown>;
  response: StandardSchemaV1<unknown, Output>;
}

/** Map of named endpoint definitions. */
export type EndpointDefinitions = Record<string, EndpointDefinition>;

/** Path and query input for an endpoint. */
export interface EndpointParams<PathInput = unknown, SearchInput = unknown> {
  $path?: PathInput;
  $search?: SearchInput;
}

/** Decoded response type of an endpoint definition. */
export type EndpointResponse<Endpoint> = Endpoint extends { response: StandardSchemaV1<unknown, infer Output> }
  ? Output
  : never;
