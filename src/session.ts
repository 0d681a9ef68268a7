import type { AxiosInstance, AxiosResponse } from 'axios';
import {
  DEFAULT_TIMEOUT_MS,
  EDITOR_PLUGIN_VERSION,
  EDITOR_VERSION,
  INTEGRATION_ID,
  USER_AGENT,
} from './constants';
import { ApiError } from './errors';
import { bodyText, createHttpClient, isSuccess, toNetworkError } from './http';
import { createLogger, type Logger } from './log';
import type { AuthorizedCaller, HttpMethod, HttpOptions, ProviderSession } from './types';

/**
 * Authenticated access to the Copilot API.
 *
 * Every request carries the session token as a bearer credential and goes to
 * the session's API base. Nothing is retried here.
 */
export class AuthenticatedSession implements AuthorizedCaller {
  private client: AxiosInstance;
  private timeout: number;
  private log: Logger;

  constructor(
    private readonly session: ProviderSession,
    options: HttpOptions = {},
  ) {
    this.client = options.client ?? createHttpClient();
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.log = createLogger('session', options.debug ?? false);
  }

  public get apiBase(): string {
    return this.session.apiBase;
  }

  public get expiresAt(): number | undefined {
    return this.session.expiresAt;
  }

  public resolve(path: string): string {
    return `${this.session.apiBase.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
  }

  public async call(method: HttpMethod, path: string, body?: unknown): Promise<unknown> {
    const url = this.resolve(path);
    this.log(method, url);

    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.request<unknown>({
        method,
        url,
        data: body,
        headers: this.getHeaders(),
        timeout: this.timeout,
      });
    } catch (error) {
      throw toNetworkError(error, `${method} ${url}`);
    }

    this.log(method, url, '->', response.status);
    if (!isSuccess(response.status)) {
      throw new ApiError(response.status, bodyText(response.data), url);
    }
    return response.data;
  }

  private getHeaders(): Record<string, string> {
    return {
      'Authorization': `Bearer ${this.session.apiToken.reveal()}`,
      'Accept': 'application/json',
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
      'Editor-Version': EDITOR_VERSION,
      'Editor-Plugin-Version': EDITOR_PLUGIN_VERSION,
      'Copilot-Integration-Id': INTEGRATION_ID,
    };
  }
}
