import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Reads a successful response body as JSON, whatever its `Content-Type`.
 *
 * - A literal JSON `null` resolves to `[null, null]`.
 * - A body that cannot be read, or is not JSON, resolves to `[Error, null]` with the original error as `cause`.
 *   An empty body (including 204/205) is not JSON.
 */
export async function getResponseData(response: Response): SafeWrapAsync<Error, unknown> {
  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error('error reading response body in getResponseData', { cause: errText }), null];
  }

  const body: string = text;
  const [errJson, json] = safeWrap((): unknown => JSON.parse(body));
  if (errJson) {
    return [new Error('error parsing json response body in getResponseData', { cause: errJson }), null];
  }

  return [null, json];
}

/**
 * Reads a response body as text for diagnostics; an unreadable body reads as `''`.
 */
export async function getResponseText(response: Response): Promise<string> {
  const [, text] = await safeWrapAsync(() => response.text());
  return text ?? '';
}
