import { ControlPlaneClient, detailOf, parseJsonBody } from '../lib/control-plane-client';
import { FakePlatform, jsonResponse } from './helpers/fake-platform';

describe('ControlPlaneClient', () => {
  it('should send both auth headers and a JSON body', async () => {
    const platform = new FakePlatform().on('POST', 'https://api.test/videos/x', jsonResponse(200, { ok: true }));
    const client = new ControlPlaneClient({
      baseUrl: 'https://api.test/',
      apiKey: 'mk_test-key',
      fetchImpl: platform.fetch,
    });

    const response = await client.postJson('videos/x', { a: 1 });

    expect(response).toEqual({ status: 200, ok: true, body: '{"ok":true}' });
    const [call] = platform.calls;
    expect(call.headers.get('authorization')).toBe('Bearer mk_test-key');
    expect(call.headers.get('x-api-key')).toBe('mk_test-key');
    expect(call.headers.get('content-type')).toBe('application/json');
    expect(platform.jsonBodyOf(call)).toEqual({ a: 1 });
  });

  it('should omit the content type on GET', async () => {
    const platform = new FakePlatform().on('GET', 'https://api.test/whoami', jsonResponse(401, {}));
    const client = new ControlPlaneClient({ baseUrl: 'https://api.test', apiKey: 'mk_test-key', fetchImpl: platform.fetch });

    const response = await client.get('/whoami');

    expect(response.ok).toBe(false);
    expect(response.status).toBe(401);
    expect(platform.calls[0].headers.has('content-type')).toBe(false);
  });

  it('should propagate network errors', async () => {
    const platform = new FakePlatform().fail('GET', 'https://api.test/whoami', 'fetch failed');
    const client = new ControlPlaneClient({ baseUrl: 'https://api.test', apiKey: 'mk_test-key', fetchImpl: platform.fetch });

    await expect(client.get('/whoami')).rejects.toThrow('fetch failed');
  });
});

describe('response helpers', () => {
  it('should parse JSON bodies leniently', () => {
    expect(parseJsonBody('{"a":1}')).toEqual({ a: 1 });
    expect(parseJsonBody('')).toBeUndefined();
    expect(parseJsonBody('<html>')).toBeUndefined();
  });

  it('should extract error details', () => {
    expect(detailOf('{"detail":"Video duration exceeds limit"}', 'fallback')).toBe('Video duration exceeds limit');
    expect(detailOf(' plain text ', 'fallback')).toBe('plain text');
    expect(detailOf('', 'fallback')).toBe('fallback');
    expect(detailOf('{"detail":[{"msg":"bad"}]}', 'fallback')).toBe('{"detail":[{"msg":"bad"}]}');
  });
});
