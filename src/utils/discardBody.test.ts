import { Response } from 'undici';
import { describe, expect, it } from 'vitest';
import { discardBody } from './discardBody.js';

describe('discardBody', () => {
  it('cancels an unread body', async () => {
    const response = new Response('unauthorized', { status: 401 });

    const [err] = await discardBody(response);

    expect(err).toBeNull();
    expect(response.bodyUsed).toBe(true);
  });

  it('does nothing for a response without body', async () => {
    const response = new Response(null, { status: 204 });

    const [err] = await discardBody(response);

    expect(err).toBeNull();
    expect(response.bodyUsed).toBe(false);
  });

  it('does nothing for a body that was already read', async () => {
    const response = new Response('{"payload":1}', { status: 200 });
    await response.text();

    const [err] = await discardBody(response);

    expect(err).toBeNull();
  });
});
