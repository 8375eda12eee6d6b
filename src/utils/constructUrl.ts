import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ConfigurationError } from '../error/configurationError.js';
import { validator } from './validator.js';
import type { SafeWrapAsync } from './wrap.js';

/** Schemas that govern how an endpoint's `{placeholder}` segments and query string are filled. */
export interface UrlSchemas {
  $path?: StandardSchemaV1;
  $search?: StandardSchemaV1;
}

/** Raw, not yet validated, path and query input. */
export interface UrlParams {
  $path?: unknown;
  $search?: unknown;
}

type Primitive = string | number | boolean | bigint;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPrimitive(value: unknown): value is Primitive {
  const type = typeof value;
  return type === 'string' || type === 'number' || type === 'boolean' || type === 'bigint';
}

/**
 * Writes a camelCase key the way the API spells query parameters, `includeTemplate` -> `include_template`.
 */
export function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (char) => `_${char.toLowerCase()}`);
}

/** Runs the optional schema, falling back to the raw input when there is none. */
async function parse(
  input: unknown,
  schema: StandardSchemaV1 | undefined,
  label: string,
  template: string,
): SafeWrapAsync<ConfigurationError, unknown> {
  if (!schema) {
    return [null, input];
  }

  const [errParse, parsed] = await validator(input, schema);
  if (errParse) {
    return [new ConfigurationError(`error validating ${label} params`, template, { cause: errParse }), null];
  }

  return [null, parsed];
}

/**
 * Constructs a relative URL by replacing `{name}` path segments and appending query parameters.
 *
 * - `$path` and `$search` are validated against their schemas first, the parsed output is used.
 * - Path values are URI-encoded, so a slug can never break out of its segment.
 * - Query keys are snake_cased, `undefined`/`null` values omitted, arrays written as repeated keys.
 * - Fails with {@link ConfigurationError} on invalid input or on a placeholder left unfilled.
 */
export async function constructUrl(template: string, params: UrlParams, schemas: UrlSchemas): SafeWrapAsync<ConfigurationError, string> {
  const searchParams = new URLSearchParams();
  let result = template;

  // 1. Handle Query Params ($search)
  if (params.$search !== undefined) {
    const [errSearch, search] = await parse(params.$search, schemas.$search, '$search', template);
    if (errSearch) {
      return [errSearch, null];
    }

    if (!isRecord(search)) {
      return [new ConfigurationError('error extracting search params, expected an object', template), null];
    }

    for (const [key, value] of Object.entries(search)) {
      if (value === undefined || value === null) {
        continue;
      }

      const values: unknown[] = Array.isArray(value) ? value : [value];
      for (const item of values) {
        if (!isPrimitive(item)) {
          return [new ConfigurationError(`error extracting search param ${key}, unsupported value`, template), null];
        }
        searchParams.append(toSnakeCase(key), String(item));
      }
    }
  }

  // 2. Handle $path Object Params
  if (params.$path !== undefined) {
    const [errPath, path] = await parse(params.$path, schemas.$path, '$path', template);
    if (errPath) {
      return [errPath, null];
    }

    if (!isRecord(path)) {
      return [new ConfigurationError('error extracting path params, expected an object', template), null];
    }

    for (const [key, value] of Object.entries(path)) {
      if (!isPrimitive(value)) {
        return [new ConfigurationError(`error extracting path param ${key}, unsupported value`, template), null];
      }
      result = result.replaceAll(`{${key}}`, encodeURIComponent(String(value)));
    }
  }

  // Check for remaining unreplaced braces
  if (result.includes('{') || result.includes('}')) {
    return [new ConfigurationError(`error constructing URL, path contains {} ${result}`, template), null];
  }

  const query = searchParams.toString();
  if (query) {
    result += `?${query}`;
  }

  // Strip leading slash for clean concatenation with the host
  return [null, result.replace(/^\/+/, '')];
}
