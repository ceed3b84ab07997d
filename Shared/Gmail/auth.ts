/**
 * Gmail OAuth: reuse the stored token, refresh it when it is about to expire,
 * or fall back to the interactive consent flow on a loopback port.
 */

import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { google } from 'googleapis';
import type { Credentials, OAuth2Client } from 'google-auth-library';
import type { ClientSecret, CredentialStore, StoredToken } from './credentials.js';
import { AuthorizationError } from '../Types/errors.js';
import { Logger } from '../Utils/logger.js';

export const GMAIL_SCOPES = [
  'https://www.googleapis.com/auth/gmail.readonly',
  'https://www.googleapis.com/auth/gmail.compose',
];

export const CALLBACK_PATH = '/oauth2callback';

/** Refresh when the access token expires within this window */
const REFRESH_BUFFER_MS = 5 * 60 * 1000;

export interface AuthorizerOptions {
  /** Loopback port for the consent callback; 0 lets the OS pick */
  consentPort?: number;
  scopes?: string[];
  logger?: Logger;
  /** Called with the consent URL; defaults to logging it */
  onAuthUrl?: (url: string) => void;
  now?: () => number;
}

export function tokenNeedsRefresh(token: StoredToken, now: number): boolean {
  return now > token.expiry_date - REFRESH_BUFFER_MS;
}

function toStoredToken(credentials: Credentials, previous?: StoredToken): StoredToken {
  const accessToken = credentials.access_token;
  const refreshToken = credentials.refresh_token ?? previous?.refresh_token;
  if (!accessToken) {
    throw new AuthorizationError('Google returned no access token');
  }
  if (!refreshToken) {
    throw new AuthorizationError(
      'No refresh token received. Revoke the app\'s access in your Google account and authorize again.'
    );
  }
  return {
    access_token: accessToken,
    refresh_token: refreshToken,
    scope: credentials.scope ?? previous?.scope ?? GMAIL_SCOPES.join(' '),
    token_type: credentials.token_type ?? previous?.token_type ?? 'Bearer',
    expiry_date: credentials.expiry_date ?? previous?.expiry_date ?? 0,
  };
}

function listen(server: Server, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, '127.0.0.1', () => {
      server.off('error', reject);
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === 'object' && address ? address.port : port);
    });
  });
}

/**
 * Wait for Google's redirect on the loopback server and return the authorization code.
 */
function waitForCode(server: Server): Promise<string> {
  return new Promise((resolve, reject) => {
    server.on('request', (req, res) => {
      const url = new URL(req.url ?? '/', 'http://127.0.0.1');
      if (url.pathname !== CALLBACK_PATH) {
        res.writeHead(404);
        res.end('Not found');
        return;
      }

      const code = url.searchParams.get('code');
      const error = url.searchParams.get('error');
      res.writeHead(code ? 200 : 400, { 'Content-Type': 'text/plain; charset=utf-8' });

      if (error || !code) {
        res.end('Authorization failed. You can close this window.');
        reject(new AuthorizationError(`Authorization failed: ${error ?? 'no authorization code received'}`));
        return;
      }

      res.end('Authorization successful. You can close this window.');
      resolve(code);
    });
  });
}

export class GmailAuthorizer {
  private readonly logger: Logger;
  private readonly scopes: string[];
  private readonly now: () => number;

  constructor(
    private readonly store: CredentialStore,
    private readonly options: AuthorizerOptions = {}
  ) {
    this.logger = options.logger ?? new Logger('gmail-auth');
    this.scopes = options.scopes ?? GMAIL_SCOPES;
    this.now = options.now ?? Date.now;
  }

  /**
   * OAuth client with a usable access token
   */
  async authorize(): Promise<OAuth2Client> {
    const secret = await this.store.readClientSecret();
    const token = await this.store.read();

    if (!token) {
      return this.consent(secret);
    }

    const client = this.createClient(secret);
    client.setCredentials(token);

    if (tokenNeedsRefresh(token, this.now())) {
      await this.refresh(client, token);
    }
    return client;
  }

  /**
   * Refresh the access token and write the result back to the store
   */
  async refresh(client: OAuth2Client, token: StoredToken): Promise<StoredToken> {
    this.logger.info('Refreshing access token');
    const { credentials } = await client.refreshAccessToken();
    const refreshed = toStoredToken(credentials, token);
    client.setCredentials(refreshed);
    await this.store.write(refreshed);
    return refreshed;
  }

  async hasStoredToken(): Promise<boolean> {
    return (await this.store.read()) !== null;
  }

  private createClient(secret: ClientSecret, redirectUri?: string): OAuth2Client {
    return new google.auth.OAuth2(
      secret.client_id,
      secret.client_secret,
      redirectUri ?? secret.redirect_uris?.[0]
    );
  }

  /**
   * Interactive consent: print the URL, catch the redirect, exchange the code
   */
  private async consent(secret: ClientSecret): Promise<OAuth2Client> {
    const server = createServer();
    try {
      const port = await listen(server, this.options.consentPort ?? 0);
      const client = this.createClient(secret, `http://127.0.0.1:${port}${CALLBACK_PATH}`);
      const codePromise = waitForCode(server);

      const authUrl = client.generateAuthUrl({
        access_type: 'offline',
        scope: this.scopes,
        prompt: 'consent',
      });
      if (this.options.onAuthUrl) {
        this.options.onAuthUrl(authUrl);
      } else {
        this.logger.warn('Gmail authorization required. Open this URL in a browser to continue', { url: authUrl });
      }

      const code = await codePromise;
      const { tokens } = await client.getToken(code);
      const token = toStoredToken(tokens);
      client.setCredentials(token);
      await this.store.write(token);
      this.logger.info('Gmail authorization complete', { store: this.store.describe() });
      return client;
    } finally {
      server.close();
      server.closeAllConnections();
    }
  }
}
