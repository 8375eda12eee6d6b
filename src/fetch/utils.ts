import type { HeaderOptions } from '../types/request.js';

type HeaderValue = string | readonly string[] | null | undefined;

function headerEntries(layer: HeaderOptions): Array<[string, HeaderValue]> {
  if (layer instanceof Headers) {
    return [...layer.entries()];
  }

  if (Array.isArray(layer)) {
    return layer.map(([name, value]): [string, HeaderValue] => [name, value]);
  }

  return Object.entries(layer);
}

/**
 * Builds the headers the transport sends from its layers, in order: the built-in defaults,
 * then the client's configured `headers`, or a single per-call override.
 *
 * A later layer replaces a header of an earlier one; `null`/`undefined` removes it.
 * Repeated values (`readonly string[]`) are joined with `, `.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const layer of layers) {
    if (!layer) {
      continue;
    }

    for (const [name, value] of headerEntries(layer)) {
      if (value == null) {
        merged.delete(name);
      } else {
        merged.set(name, typeof value === 'string' ? value : value.join(', '));
      }
    }
  }

  return merged;
}
