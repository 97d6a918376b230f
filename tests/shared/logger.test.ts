import { describe, expect, it } from 'vitest';

import { logger } from '@makerspace/shared';

describe('shared logger', () => {
  it('attaches context via withContext', () => {
    const child = logger.withContext({ requesterId: 'member-7', resourceId: 'laser-1' });

    const bindings = child.bindings();

    expect(bindings.requesterId).toBe('member-7');
    expect(bindings.resourceId).toBe('laser-1');
  });

  it('keeps the context API on nested children', () => {
    const child = logger
      .withContext({ requesterId: 'member-7' })
      .withContext({ reservationId: 'r-1' });

    expect(child.bindings()).toMatchObject({ requesterId: 'member-7', reservationId: 'r-1' });
  });
});
