/**
 * Mastodon API types used by the client and the token store
 */

export type StatusVisibility = 'public' | 'unlisted' | 'private' | 'direct';

export const STATUS_VISIBILITIES: readonly StatusVisibility[] = ['public', 'unlisted', 'private', 'direct'];

export interface StatusOptions {
  visibility?: StatusVisibility;
  sensitive?: boolean;
  spoilerText?: string;
  language?: string;
  inReplyToId?: string;
}

export interface PostedStatus {
  id: string;
  url?: string;
}

export interface AppRegistrationRequest {
  clientName: string;
  redirectUri?: string;
  scopes?: string;
  website?: string;
}

export interface AppCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Token file contents, keyed the way mastodon-async style clients store them
 */
export interface TokenData {
  base: string;
  client_id: string;
  client_secret: string;
  token: string;
}
