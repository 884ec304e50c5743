import { StatusPublisher } from '../interfaces/StatusPublisher.js';
import type { AppCredentials, AppRegistrationRequest, PostedStatus, StatusOptions } from '../types/mastodon.js';
import { MastodonApiError } from '../utils/errors.js';

export const OOB_REDIRECT_URI = 'urn:ietf:wg:oauth:2.0:oob';
export const DEFAULT_SCOPES = 'read write';

/**
 * Minimal Mastodon REST client: app registration, the OAuth code exchange
 * and status posting
 */
export class MastodonClient implements StatusPublisher {
  private readonly baseUrl: string;
  private readonly accessToken?: string;

  constructor(instance: string, accessToken?: string) {
    this.baseUrl = normalizeInstanceUrl(instance);
    this.accessToken = accessToken;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  /**
   * Register an application with the instance (POST /api/v1/apps)
   */
  async registerApp(request: AppRegistrationRequest): Promise<AppCredentials> {
    const form = new URLSearchParams({
      client_name: request.clientName,
      redirect_uris: request.redirectUri ?? OOB_REDIRECT_URI,
      scopes: request.scopes ?? DEFAULT_SCOPES
    });
    if (request.website) {
      form.set('website', request.website);
    }

    const body = await this.request('/api/v1/apps', form);
    return {
      clientId: requireString(body, 'client_id', '/api/v1/apps'),
      clientSecret: requireString(body, 'client_secret', '/api/v1/apps')
    };
  }

  /**
   * URL the user opens to authorize the application
   */
  buildAuthorizeUrl(clientId: string, redirectUri: string = OOB_REDIRECT_URI, scope: string = DEFAULT_SCOPES): string {
    const url = new URL('/oauth/authorize', this.baseUrl);
    url.searchParams.set('client_id', clientId);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('redirect_uri', redirectUri);
    url.searchParams.set('scope', scope);
    return url.toString();
  }

  /**
   * Exchange an authorization code for an access token (POST /oauth/token)
   */
  async exchangeAuthorizationCode(
    credentials: AppCredentials,
    code: string,
    redirectUri: string = OOB_REDIRECT_URI
  ): Promise<string> {
    const form = new URLSearchParams({
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      grant_type: 'authorization_code',
      code,
      redirect_uri: redirectUri
    });

    const body = await this.request('/oauth/token', form);
    if (!isRecord(body) || typeof body.access_token !== 'string') {
      throw new Error('No access token in response');
    }
    return body.access_token;
  }

  /**
   * Publish a status (POST /api/v1/statuses)
   */
  async postStatus(status: string, options: StatusOptions = {}): Promise<PostedStatus> {
    if (!this.accessToken) {
      throw new Error('An access token is required to post statuses');
    }

    const payload: Record<string, string | boolean> = { status };
    if (options.visibility) payload.visibility = options.visibility;
    if (options.sensitive !== undefined) payload.sensitive = options.sensitive;
    if (options.spoilerText) payload.spoiler_text = options.spoilerText;
    if (options.language) payload.language = options.language;
    if (options.inReplyToId) payload.in_reply_to_id = options.inReplyToId;

    const body = await this.request('/api/v1/statuses', JSON.stringify(payload), {
      'Authorization': `Bearer ${this.accessToken}`,
      'Content-Type': 'application/json'
    });

    const posted: PostedStatus = { id: requireString(body, 'id', '/api/v1/statuses') };
    if (isRecord(body) && typeof body.url === 'string') {
      posted.url = body.url;
    }
    return posted;
  }

  private async request(path: string, body: URLSearchParams | string, headers: Record<string, string> = {}): Promise<unknown> {
    const response = await fetch(new URL(path, this.baseUrl), {
      method: 'POST',
      headers: { 'Accept': 'application/json', ...headers },
      body
    });

    const text = await response.text();
    if (!response.ok) {
      throw new MastodonApiError(path, response.status, text);
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new Error(`Mastodon API ${path} returned invalid JSON`, { cause: error });
    }
  }
}

/**
 * Accepts "mastodon.example" as well as "https://mastodon.example/"
 */
export function normalizeInstanceUrl(instance: string): string {
  const trimmed = instance.trim().replace(/\/+$/, '');
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  return new URL(withScheme).origin;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(body: unknown, key: string, endpoint: string): string {
  const value = isRecord(body) ? body[key] : undefined;
  if (typeof value !== 'string') {
    throw new Error(`Mastodon API ${endpoint} response is missing ${key}`);
  }
  return value;
}
