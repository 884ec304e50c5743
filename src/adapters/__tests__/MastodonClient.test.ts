import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MastodonClient, normalizeInstanceUrl } from '../MastodonClient.js';
import { MastodonApiError } from '../../utils/errors.js';

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

describe('MastodonClient', () => {
  const mockFetch = vi.fn<typeof fetch>();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const lastRequest = () => {
    const call = mockFetch.mock.calls[mockFetch.mock.calls.length - 1];
    return { url: String(call[0]), init: call[1] };
  };

  describe('normalizeInstanceUrl', () => {
    it('should add a scheme and drop paths and trailing slashes', () => {
      expect(normalizeInstanceUrl('mastodon.example')).toBe('https://mastodon.example');
      expect(normalizeInstanceUrl('https://mastodon.example/')).toBe('https://mastodon.example');
      expect(normalizeInstanceUrl('http://localhost:3000/web/home')).toBe('http://localhost:3000');
    });
  });

  describe('registerApp', () => {
    it('should post the application form and return the credentials', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ id: '1', client_id: 'test-client', client_secret: 'test-secret' }));
      const client = new MastodonClient('mastodon.example');

      const credentials = await client.registerApp({ clientName: 'ical-to-masto' });

      expect(credentials).toEqual({ clientId: 'test-client', clientSecret: 'test-secret' });
      const { url, init } = lastRequest();
      expect(url).toBe('https://mastodon.example/api/v1/apps');
      expect(init?.method).toBe('POST');
      expect(String(init?.body)).toBe(
        'client_name=ical-to-masto&redirect_uris=urn%3Aietf%3Awg%3Aoauth%3A2.0%3Aoob&scopes=read+write'
      );
    });

    it('should send the website when given', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ client_id: 'test-client', client_secret: 'test-secret' }));
      const client = new MastodonClient('mastodon.example');

      await client.registerApp({ clientName: 'bot', scopes: 'write', website: 'https://example.com' });

      expect(String(lastRequest().init?.body)).toBe(
        'client_name=bot&redirect_uris=urn%3Aietf%3Awg%3Aoauth%3A2.0%3Aoob&scopes=write&website=https%3A%2F%2Fexample.com'
      );
    });

    it('should fail when the response lacks credentials', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ client_id: 'test-client' }));
      const client = new MastodonClient('mastodon.example');

      await expect(client.registerApp({ clientName: 'bot' })).rejects.toThrow(
        'Mastodon API /api/v1/apps response is missing client_secret'
      );
    });
  });

  describe('buildAuthorizeUrl', () => {
    it('should build the out-of-band authorization URL', () => {
      const client = new MastodonClient('https://mastodon.example');

      expect(client.buildAuthorizeUrl('test-client')).toBe(
        'https://mastodon.example/oauth/authorize?client_id=test-client&response_type=code' +
        '&redirect_uri=urn%3Aietf%3Awg%3Aoauth%3A2.0%3Aoob&scope=read+write'
      );
    });
  });

  describe('exchangeAuthorizationCode', () => {
    it('should return the access token', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ access_token: 'test-token', token_type: 'Bearer' }));
      const client = new MastodonClient('mastodon.example');

      const token = await client.exchangeAuthorizationCode({ clientId: 'test-client', clientSecret: 'test-secret' }, 'test-code');

      expect(token).toBe('test-token');
      const { url, init } = lastRequest();
      expect(url).toBe('https://mastodon.example/oauth/token');
      expect(String(init?.body)).toContain('grant_type=authorization_code&code=test-code');
    });

    it('should fail without an access token', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'invalid_grant' }));
      const client = new MastodonClient('mastodon.example');

      await expect(
        client.exchangeAuthorizationCode({ clientId: 'test-client', clientSecret: 'test-secret' }, 'bad-code')
      ).rejects.toThrow('No access token in response');
    });
  });

  describe('postStatus', () => {
    it('should post the status as JSON with the bearer token', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ id: '109', url: 'https://mastodon.example/@bot/109' }));
      const client = new MastodonClient('mastodon.example', 'test-token');

      const posted = await client.postStatus('Hello', { visibility: 'unlisted', spoilerText: 'events' });

      expect(posted).toEqual({ id: '109', url: 'https://mastodon.example/@bot/109' });
      const { url, init } = lastRequest();
      expect(url).toBe('https://mastodon.example/api/v1/statuses');
      expect(init?.headers).toEqual({
        'Accept': 'application/json',
        'Authorization': 'Bearer test-token',
        'Content-Type': 'application/json'
      });
      expect(JSON.parse(String(init?.body))).toEqual({ status: 'Hello', visibility: 'unlisted', spoiler_text: 'events' });
    });

    it('should refuse to post without a token', async () => {
      const client = new MastodonClient('mastodon.example');

      await expect(client.postStatus('Hello')).rejects.toThrow('An access token is required to post statuses');
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should surface API errors with their status', async () => {
      mockFetch.mockResolvedValueOnce(new Response('{"error":"Validation failed: Text can\'t be blank"}', { status: 422 }));
      const client = new MastodonClient('mastodon.example', 'test-token');

      const result = client.postStatus('');

      await expect(result).rejects.toBeInstanceOf(MastodonApiError);
      await expect(result).rejects.toMatchObject({ status: 422 });
    });

    it('should reject invalid JSON responses', async () => {
      mockFetch.mockResolvedValueOnce(new Response('<html>', { status: 200 }));
      const client = new MastodonClient('mastodon.example', 'test-token');

      await expect(client.postStatus('Hello')).rejects.toThrow('Mastodon API /api/v1/statuses returned invalid JSON');
    });
  });
});
