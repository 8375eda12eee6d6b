import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ConfigurationError } from '../error/configurationError.js';
import { isValidationError } from '../error/validationError.js';
import { constructUrl, toSnakeCase } from './constructUrl.js';

const idPath = z.object({ id: z.number().int().nonnegative() });
const includeTemplate = z.object({ includeTemplate: z.boolean().optional() });

describe('constructUrl', () => {
  it('fills path params and appends snake_cased search params', async () => {
    const [err, url] = await constructUrl(
      'tags/{id}',
      { $path: { id: 42 }, $search: { includeTemplate: true } },
      { $path: idPath, $search: includeTemplate },
    );

    expect(err).toBeNull();
    expect(url).toBe('tags/42?include_template=true');
  });

  it('omits undefined search params entirely', async () => {
    const [err, url] = await constructUrl(
      'tags/{id}',
      { $path: { id: 42 }, $search: { includeTemplate: undefined } },
      { $path: idPath, $search: includeTemplate },
    );

    expect(err).toBeNull();
    expect(url).toBe('tags/42');
  });

  it('URI-encodes path values so slugs stay inside their segment', async () => {
    const [err, url] = await constructUrl(
      'tags/slug/{slug}/related-tags',
      { $path: { slug: 'us elections/2024?x' } },
      { $path: z.object({ slug: z.string().min(1) }) },
    );

    expect(err).toBeNull();
    expect(url).toBe('tags/slug/us%20elections%2F2024%3Fx/related-tags');
  });

  it('repeats keys for arrays and encodes values form-style', async () => {
    const [err, url] = await constructUrl(
      'teams',
      { $search: { league: ['nba', 'nfl'], order: 'name asc', limit: 5, ascending: false } },
      {},
    );

    expect(err).toBeNull();
    expect(url).toBe('teams?league=nba&league=nfl&order=name+asc&limit=5&ascending=false');
  });

  it('strips a leading slash when there are no params', async () => {
    const [err, url] = await constructUrl('/sports/market-types', {}, {});

    expect(err).toBeNull();
    expect(url).toBe('sports/market-types');
  });

  it('fails when a placeholder is left unfilled', async () => {
    const [err, url] = await constructUrl('tags/{id}/related-tags', {}, { $path: idPath });

    expect(url).toBeNull();
    expect(err).toBeInstanceOf(ConfigurationError);
    expect(err?.value).toBe('tags/{id}/related-tags');
    expect(err?.message).toBe('error constructing URL, path contains {} tags/{id}/related-tags');
  });

  it('fails with the validation error as cause on invalid path input', async () => {
    const [err, url] = await constructUrl('tags/{id}', { $path: { id: -1 } }, { $path: idPath });

    expect(url).toBeNull();
    expect(err?.message).toBe('error validating $path params');
    expect(isValidationError(err)).toBe(true);
  });

  it('fails on nested search values', async () => {
    const [err, url] = await constructUrl('tags', { $search: { filter: { nested: true } } }, {});

    expect(url).toBeNull();
    expect(err?.message).toBe('error extracting search param filter, unsupported value');
  });
});

describe('toSnakeCase', () => {
  it('converts camelCase keys', () => {
    expect(toSnakeCase('includeTemplate')).toBe('include_template');
    expect(toSnakeCase('isCarousel')).toBe('is_carousel');
    expect(toSnakeCase('limit')).toBe('limit');
  });
});
