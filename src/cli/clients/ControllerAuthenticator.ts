/**
 * Controller Authenticator - obtains an OAuth token or a login session
 * and produces the AuthContext every controller request is signed with
 */

import { Response } from 'node-fetch';
import { Logger } from 'winston';
import { AuthContext, Credential } from '../../core/engine/interfaces';
import { AuthError, TransportError } from '../../core/errors';
import { ControllerTransport, readJson } from './ControllerTransport';

export const CSRF_TOKEN = 'X-CSRF-TOKEN';

export interface ControllerIdentity {
  account: string;
  user: string;
}

export class BearerAuthContext implements AuthContext {
  readonly scheme = 'oauth';

  constructor(private readonly token: string) {}

  sign(headers: Record<string, string>): Record<string, string> {
    return { ...headers, Authorization: `Bearer ${this.token}` };
  }
}

export class SessionAuthContext implements AuthContext {
  readonly scheme = 'password';

  constructor(
    private readonly basicAuth: string,
    private readonly cookies: Map<string, string>,
    readonly csrfToken?: string
  ) {}

  sign(headers: Record<string, string>): Record<string, string> {
    const signed: Record<string, string> = { ...headers, Authorization: this.basicAuth };

    if (this.cookies.size > 0) {
      signed.Cookie = Array.from(this.cookies, ([name, value]) => `${name}=${value}`).join('; ');
    }
    if (this.csrfToken) {
      signed[CSRF_TOKEN] = this.csrfToken;
    }

    return signed;
  }
}

/**
 * Parse `Set-Cookie` header values into name/value pairs
 */
export function parseSetCookies(values: string[]): Map<string, string> {
  const cookies = new Map<string, string>();

  for (const value of values) {
    const eq = value.indexOf('=');
    if (eq <= 0) {
      continue;
    }
    const name = value.slice(0, eq).trim();
    const rest = value.slice(eq + 1);
    const semi = rest.indexOf(';');
    cookies.set(name, (semi >= 0 ? rest.slice(0, semi) : rest).trim());
  }

  return cookies;
}

export class ControllerAuthenticator {
  constructor(
    private readonly transport: ControllerTransport,
    private readonly identity: ControllerIdentity,
    private readonly credential: Credential,
    private readonly logger: Logger
  ) {}

  /**
   * Resolve the configured credential into a signing context
   */
  async authenticate(): Promise<AuthContext> {
    switch (this.credential.kind) {
      case 'oauth':
        return this.fetchOAuthToken(this.credential.secret);
      case 'password':
        return this.login(this.credential.password);
    }
  }

  private get clientId(): string {
    return `${this.identity.user}@${this.identity.account}`;
  }

  private async fetchOAuthToken(secret: string): Promise<AuthContext> {
    this.logger.info(`Retrieving oauth token at ${this.transport.baseUrl}`);

    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.clientId,
      client_secret: secret,
    });

    let payload: unknown;
    try {
      const response = await this.transport.request('/controller/api/oauth/access_token', {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
      });
      payload = await readJson(response);
    } catch (error) {
      if (error instanceof TransportError) {
        throw new AuthError(`Could not retrieve oauth token: ${error.message}`);
      }
      throw error;
    }

    const token =
      typeof payload === 'object' && payload !== null && 'access_token' in payload
        ? payload.access_token
        : undefined;
    if (typeof token !== 'string' || token === '') {
      throw new AuthError(`Could not retrieve oauth token: ${JSON.stringify(payload)}`);
    }

    this.logger.debug('Retrieved oauth token');
    return new BearerAuthContext(token);
  }

  private async login(password: string): Promise<AuthContext> {
    this.logger.info(`Logging in to ${this.transport.baseUrl}`);

    const basicAuth = `Basic ${Buffer.from(`${this.clientId}:${password}`).toString('base64')}`;

    let response: Response;
    try {
      response = await this.transport.request('/controller/auth?action=login', {
        method: 'GET',
        headers: { Authorization: basicAuth },
      });
    } catch (error) {
      if (error instanceof TransportError) {
        throw new AuthError(`Could not log in: ${error.message}`);
      }
      throw error;
    }

    if (!response.ok) {
      throw new AuthError(`Could not log in: HTTP ${response.status} ${response.statusText}`);
    }

    const setCookies = Object.entries(response.headers.raw())
      .filter(([name]) => name.toLowerCase() === 'set-cookie')
      .flatMap(([, values]) => values);
    const cookies = parseSetCookies(setCookies);
    const csrfToken = cookies.get(CSRF_TOKEN);
    if (!csrfToken) {
      this.logger.warn('Could not retrieve login cookie, continuing without CSRF token');
    }

    return new SessionAuthContext(basicAuth, cookies, csrfToken);
  }
}
