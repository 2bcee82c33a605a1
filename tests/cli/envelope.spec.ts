import { errorEnvelopeSchema, fail, ok, successEnvelopeSchema } from '@coinpurse/contracts';
import { z } from 'zod';

describe('CLI envelope contract', () => {
  it('uses ok envelope shape for responses', () => {
    const payload = ok({ hello: 'world' });
    expect(payload).toEqual({
      ok: true,
      data: { hello: 'world' },
      meta: {},
    });
    expect(successEnvelopeSchema(z.object({ hello: z.string() })).safeParse(payload).success).toBe(
      true,
    );
  });

  it('omits details from failures that carry none', () => {
    expect(fail('APPROVAL_REQUIRED', 'Pass --dry-run first')).toEqual({
      ok: false,
      error: { code: 'APPROVAL_REQUIRED', message: 'Pass --dry-run first' },
    });
    expect(errorEnvelopeSchema.safeParse(fail('X', 'y', { id: '1' })).success).toBe(true);
  });
});
