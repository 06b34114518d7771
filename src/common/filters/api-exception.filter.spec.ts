import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';
import { GenerationError } from '../errors/generation-error';
import { toErrorEnvelope } from './api-exception.filter';

describe('toErrorEnvelope', () => {
  it('maps generation errors by kind', () => {
    expect(toErrorEnvelope(new GenerationError('NoHashtagsProducible', 'nothing'), 'rid-1')).toEqual({
      status: 422,
      body: {
        meta: {
          status: 422,
          errors: [{ code: 422, message: 'nothing', reason: 'NoHashtagsProducible' }],
          requestId: 'rid-1',
        },
      },
    });
    expect(toErrorEnvelope(new GenerationError('UpstreamUnavailable', 'down'), null).status).toBe(503);
    expect(toErrorEnvelope(new GenerationError('UnparseableUpstreamPayload', 'junk'), null).status).toBe(502);
    expect(toErrorEnvelope(new GenerationError('InvalidRequest', 'bad'), null).status).toBe(400);
  });

  it('maps zod issues to 400 with the field path as reason', () => {
    const parsed = z.object({ count: z.number() }).safeParse({ count: 'x' });
    if (parsed.success) throw new Error('expected a validation failure');
    const { status, body } = toErrorEnvelope(parsed.error, null);
    expect(status).toBe(400);
    expect(body.meta.errors).toHaveLength(1);
    expect(body.meta.errors[0]?.reason).toBe('count');
    expect(body.meta.requestId).toBeUndefined();
  });

  it('keeps Nest HTTP exception messages', () => {
    expect(toErrorEnvelope(new BadRequestException('bad'), null).body.meta.errors).toEqual([
      { code: 400, message: 'bad', reason: 'Bad Request' },
    ]);
  });

  it('hides unknown errors behind a 500', () => {
    expect(toErrorEnvelope(new Error('secret detail'), null)).toEqual({
      status: 500,
      body: { meta: { status: 500, errors: [{ code: 500, message: 'Internal server error', reason: 'internal_error' }] } },
    });
  });
});
