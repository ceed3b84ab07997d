/**
 * Credential storage for the Gmail OAuth flow.
 *
 * The authorizer only talks to a CredentialStore, so the token file can be
 * swapped for an in-memory store in tests.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { AuthorizationError, errorMessage } from '../Types/errors.js';
import { Logger } from '../Utils/logger.js';

export const StoredTokenSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  scope: z.string(),
  token_type: z.string(),
  expiry_date: z.number(),
});

export type StoredToken = z.infer<typeof StoredTokenSchema>;

const ClientSecretEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

/** Google Cloud console download: an "installed" or a "web" application */
const ClientSecretFileSchema = z.object({
  installed: ClientSecretEntrySchema.optional(),
  web: ClientSecretEntrySchema.optional(),
});

export type ClientSecret = z.infer<typeof ClientSecretEntrySchema>;

export interface CredentialStore {
  /** Stored token, or null when there is none yet */
  read(): Promise<StoredToken | null>;
  write(token: StoredToken): Promise<void>;
  readClientSecret(): Promise<ClientSecret>;
  /** Where the token lives, for log and health output */
  describe(): string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileCredentialStore implements CredentialStore {
  private readonly logger: Logger;

  constructor(
    private readonly tokenPath: string,
    private readonly credentialsPath: string,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('credentials');
  }

  async read(): Promise<StoredToken | null> {
    let content: string;
    try {
      content = await readFile(this.tokenPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      this.logger.warn('Failed to read token file', { path: this.tokenPath, error });
      return null;
    }

    try {
      const parsed = StoredTokenSchema.safeParse(JSON.parse(content));
      if (parsed.success) return parsed.data;
      this.logger.warn('Token file has unexpected shape, ignoring it', { path: this.tokenPath });
    } catch (error) {
      this.logger.warn('Token file is not valid JSON, ignoring it', { path: this.tokenPath, error });
    }
    return null;
  }

  async write(token: StoredToken): Promise<void> {
    await mkdir(dirname(this.tokenPath), { recursive: true });
    await writeFile(this.tokenPath, JSON.stringify(token, null, 2), { encoding: 'utf-8', mode: 0o600 });
    this.logger.info('Token saved', { path: this.tokenPath });
  }

  async readClientSecret(): Promise<ClientSecret> {
    let content: string;
    try {
      content = await readFile(this.credentialsPath, 'utf-8');
    } catch (error) {
      throw new AuthorizationError(
        `Gmail client secret file not found at ${this.credentialsPath}. ` +
          'Download OAuth client credentials from Google Cloud Console.',
        { path: this.credentialsPath, cause: errorMessage(error) }
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      throw new AuthorizationError(`Gmail client secret file is not valid JSON: ${errorMessage(error)}`, {
        path: this.credentialsPath,
      });
    }

    const parsed = ClientSecretFileSchema.safeParse(json);
    const secret = parsed.success ? (parsed.data.installed ?? parsed.data.web) : undefined;
    if (!secret) {
      throw new AuthorizationError('Invalid client secret file: missing "installed" or "web" configuration', {
        path: this.credentialsPath,
      });
    }
    return secret;
  }

  describe(): string {
    return this.tokenPath;
  }
}
