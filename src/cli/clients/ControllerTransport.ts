/**
 * Controller Transport - HTTP plumbing shared by the authenticator and the client
 * Handles base URL, proxy, timeout and status/JSON error mapping
 */

import fetch, { RequestInit, Response } from 'node-fetch';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { TransportError } from '../../core/errors';

export type FetchFunction = (url: string, init?: RequestInit) => Promise<Response>;

export interface ControllerTransportConfig {
  url: string;
  proxy?: string;
  timeout?: number;
  /** Replaces node-fetch, mainly for tests */
  fetch?: FetchFunction;
}

export class ControllerTransport {
  readonly baseUrl: string;
  private readonly timeout: number;
  private readonly fetchFn: FetchFunction;
  private readonly agent?: HttpsProxyAgent<string>;

  constructor(config: ControllerTransportConfig) {
    this.baseUrl = config.url.replace(/\/+$/, '');
    this.timeout = config.timeout || 30000;
    this.fetchFn = config.fetch ?? fetch;
    this.agent = config.proxy ? new HttpsProxyAgent(config.proxy) : undefined;
  }

  /**
   * Send a request relative to the controller base URL
   */
  async request(path: string, init: RequestInit = {}): Promise<Response> {
    const url = `${this.baseUrl}${path}`;

    try {
      return await this.fetchFn(url, {
        ...init,
        agent: this.agent,
        timeout: this.timeout,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Connection error: ${reason}`, url);
    }
  }

  /**
   * GET a path and return its parsed JSON body
   */
  async getJson(path: string, headers: Record<string, string>): Promise<unknown> {
    const response = await this.request(path, {
      method: 'GET',
      headers: { Accept: 'application/json', ...headers },
    });
    return readJson(response);
  }
}

/**
 * Check the status and parse the body of a controller response
 */
export async function readJson(response: Response): Promise<unknown> {
  const body = await response.text();

  if (!response.ok) {
    throw new TransportError(describeStatus(response.status, body), response.url, response.status);
  }

  try {
    return JSON.parse(body);
  } catch (error) {
    throw new TransportError(`Invalid JSON response: ${error}`, response.url, response.status);
  }
}

function describeStatus(status: number, body: string): string {
  switch (status) {
    case 401:
      return 'Authentication failed: Invalid or expired credentials';
    case 403:
      return 'Access denied: Check the API user permissions';
    case 404:
      return 'API endpoint not found';
    case 429:
      return 'Rate limited: Too many requests';
    default:
      return `HTTP ${status}: ${body.slice(0, 200)}`;
  }
}
