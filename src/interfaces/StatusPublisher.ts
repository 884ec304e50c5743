import type { PostedStatus, StatusOptions } from '../types/mastodon.js';

/**
 * Anything that can publish a status message on behalf of the account
 */
export interface StatusPublisher {
  postStatus(status: string, options?: StatusOptions): Promise<PostedStatus>;
}
