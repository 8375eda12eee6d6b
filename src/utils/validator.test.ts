import type { StandardSchemaV1 } from '@standard-schema/spec';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { validator } from './validator.js';

describe('validator', () => {
  it('correct schema validates to correct', async () => {
    const data = { id: '12', label: 'Politics' };
    const schema = z.object({ id: z.string(), label: z.string() });
    const [err, parsed] = await validator(data, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual(data);
  });

  it('returns the parsed output, not the input', async () => {
    const schema = z.object({ id: z.number() });
    const [err, parsed] = await validator({ id: 1, extra: true }, schema);

    expect(err).toBeNull();
    expect(parsed).toEqual({ id: 1 });
  });

  it('returns issues when the input does not match', async () => {
    const schema = z.object({ id: z.string() });
    const [err, parsed] = await validator({ id: 1 }, schema);

    expect(parsed).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error validating data');
    expect(err?.issues).toHaveLength(1);
    expect(err?.issues[0]?.path).toEqual(['id']);
  });

  it('returns error when sync validation throws', async () => {
    const cause = new Error('oops');
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: () => {
          throw cause;
        },
      },
    };

    const [err, value] = await validator('input', schema);

    expect(value).toBeNull();
    expect(err?.message).toBe('error validating on validation start');
    expect(err?.cause).toBe(cause);
  });

  it('returns error when async validation throws', async () => {
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: async () => {
          throw new Error('oops');
        },
      },
    };

    const [err, value] = await validator({}, schema);

    expect(value).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error validating async data');
    expect(err?.issues).toEqual([]);
  });

  it('awaits async validators', async () => {
    const schema: StandardSchemaV1<unknown, string> = {
      '~standard': {
        version: 1,
        vendor: 'test',
        validate: async (value) => ({ value: String(value).toUpperCase() }),
      },
    };

    const [err, value] = await validator('politics', schema);

    expect(err).toBeNull();
    expect(value).toBe('POLITICS');
  });
});
