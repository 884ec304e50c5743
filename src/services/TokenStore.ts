import { promises as fs } from 'fs';
import { dirname, resolve } from 'path';
import type { TokenData } from '../types/mastodon.js';

/**
 * Persists the Mastodon access token as a JSON file
 */
export class TokenStore {
  private readonly tokenPath: string;

  constructor(tokenPath: string) {
    this.tokenPath = resolve(tokenPath);
  }

  getTokenPath(): string {
    return this.tokenPath;
  }

  async load(): Promise<TokenData> {
    let content: string;
    try {
      content = await fs.readFile(this.tokenPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new Error("No authentication token found. Please run 'login' command first.");
      }
      throw error;
    }

    const data: unknown = JSON.parse(content);
    if (!isTokenData(data)) {
      throw new Error(`Token file ${this.tokenPath} is missing base, client_id, client_secret or token`);
    }
    return data;
  }

  async save(data: TokenData): Promise<void> {
    await fs.mkdir(dirname(this.tokenPath), { recursive: true });
    await fs.writeFile(this.tokenPath, JSON.stringify(data, null, 2), { encoding: 'utf-8', mode: 0o600 });
    console.error(`Authentication token saved to: ${this.tokenPath}`);
  }
}

function isTokenData(value: unknown): value is TokenData {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return ['base', 'client_id', 'client_secret', 'token'].every(key => typeof record[key] === 'string');
}
