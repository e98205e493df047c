import path from 'node:path';
import fs from 'fs-extra';
import { isRecord, readString } from './library.js';

export interface AuthTokens {
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly expiresAt?: Date;
  readonly scope?: string;
  readonly tokenType: string;
}

export interface TokenStore {
  load(service: string): Promise<AuthTokens | undefined>;
  save(service: string, tokens: AuthTokens): Promise<void>;
  delete(service: string): Promise<void>;
}

export const isExpired = (tokens: AuthTokens, now: Date = new Date()): boolean =>
  tokens.expiresAt !== undefined && now.getTime() >= tokens.expiresAt.getTime();

const parseTokens = (value: unknown): AuthTokens | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  const accessToken = readString(value.accessToken);
  if (!accessToken) {
    return undefined;
  }
  const expiresAt = readString(value.expiresAt);
  return {
    accessToken,
    refreshToken: readString(value.refreshToken),
    expiresAt: expiresAt ? new Date(expiresAt) : undefined,
    scope: readString(value.scope),
    tokenType: readString(value.tokenType) ?? 'Bearer',
  };
};

/**
 * Keeps tokens per service in one JSON file.
 */
export class FileTokenStore implements TokenStore {
  constructor(private readonly filePath: string) {}

  async load(service: string): Promise<AuthTokens | undefined> {
    const store = await this.read();
    return parseTokens(store[service]);
  }

  async save(service: string, tokens: AuthTokens): Promise<void> {
    const store = await this.read();
    store[service] = {
      accessToken: tokens.accessToken,
      refreshToken: tokens.refreshToken,
      expiresAt: tokens.expiresAt?.toISOString(),
      scope: tokens.scope,
      tokenType: tokens.tokenType,
    };
    await this.write(store);
  }

  async delete(service: string): Promise<void> {
    const store = await this.read();
    if (service in store) {
      delete store[service];
      await this.write(store);
    }
  }

  private async read(): Promise<Record<string, unknown>> {
    if (!(await fs.pathExists(this.filePath))) {
      return {};
    }
    try {
      const raw: unknown = await fs.readJson(this.filePath);
      return isRecord(raw) ? raw : {};
    } catch (error) {
      console.warn(`Ignoring unreadable token store ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`);
      return {};
    }
  }

  private async write(store: Record<string, unknown>): Promise<void> {
    await fs.ensureDir(path.dirname(this.filePath));
    await fs.writeJson(this.filePath, store, { spaces: 2 });
  }
}
