import { Response } from 'undici';
import { describe, expect, it } from 'vitest';
import { getResponseData } from './getResponseData.js';

describe('getResponseData', () => {
  it('parses a JSON body', async () => {
    const response = new Response('{"payload":{"mkey":"vs1"}}', {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });

    expect(await getResponseData(response)).toEqual([null, { payload: { mkey: 'vs1' } }]);
  });

  it('parses JSON served with a non-JSON content type', async () => {
    const response = new Response('{"payload":-15}', { status: 200, headers: { 'Content-Type': 'text/html' } });

    expect(await getResponseData(response)).toEqual([null, { payload: -15 }]);
  });

  it('returns null for 204 and empty bodies', async () => {
    expect(await getResponseData(new Response(null, { status: 204 }))).toEqual([null, null]);
    expect(await getResponseData(new Response('  ', { status: 200 }))).toEqual([null, null]);
  });

  it('returns an error for a body that is not JSON', async () => {
    const [err, data] = await getResponseData(new Response('<html>login</html>', { status: 200 }));

    expect(data).toBeNull();
    expect(err?.message).toBe('error parsing json response body in getResponseData');
    expect(err?.cause).toBeInstanceOf(SyntaxError);
  });

  it('returns an error when the body was already consumed', async () => {
    const response = new Response('{}', { status: 200 });
    await response.text();

    const [err] = await getResponseData(response);

    expect(err?.message).toBe('error reading response body in getResponseData');
  });
});
