import { describe, expect, it } from 'vitest';
import { getResponseData, getResponseText } from './getResponseData.js';

describe('getResponseData', () => {
  it('parses a JSON object body', async () => {
    const [err, value] = await getResponseData(new Response('{"id":"1","slug":"politics"}', { status: 200 }));

    expect(err).toBeNull();
    expect(value).toEqual({ id: '1', slug: 'politics' });
  });

  it('parses JSON regardless of the content type', async () => {
    const response = new Response('[1,2]', { status: 200, headers: { 'Content-Type': 'text/plain' } });

    const [err, value] = await getResponseData(response);

    expect(err).toBeNull();
    expect(value).toEqual([1, 2]);
  });

  it('returns null for a literal JSON null', async () => {
    const [err, value] = await getResponseData(new Response('null', { status: 200 }));

    expect(err).toBeNull();
    expect(value).toBeNull();
  });

  it.each([
    ['a 204', () => new Response(null, { status: 204 })],
    ['a 205', () => new Response(null, { status: 205 })],
    ['an empty 200', () => new Response('', { status: 200 })],
    ['a whitespace 200', () => new Response(' \n', { status: 200 })],
  ])('returns a parse error for %s', async (_label, response) => {
    const [err, value] = await getResponseData(response());

    expect(value).toBeNull();
    expect(err?.message).toBe('error parsing json response body in getResponseData');
    expect(err?.cause).toBeInstanceOf(SyntaxError);
  });

  it('returns an error for malformed JSON', async () => {
    const [err, value] = await getResponseData(new Response('{"id":', { status: 200 }));

    expect(value).toBeNull();
    expect(err?.message).toBe('error parsing json response body in getResponseData');
    expect(err?.cause).toBeInstanceOf(SyntaxError);
  });

  it('returns an error when the body was already consumed', async () => {
    const response = new Response('[]', { status: 200 });
    await response.text();

    const [err, value] = await getResponseData(response);

    expect(value).toBeNull();
    expect(err?.message).toBe('error reading response body in getResponseData');
  });
});

describe('getResponseText', () => {
  it('returns the body verbatim', async () => {
    expect(await getResponseText(new Response('  tag not found ', { status: 404 }))).toBe('  tag not found ');
  });

  it('returns an empty string for an unreadable body', async () => {
    const response = new Response('boom', { status: 500 });
    await response.text();

    expect(await getResponseText(response)).toBe('');
  });
});
