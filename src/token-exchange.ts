import type { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import {
  COPILOT_TOKEN_URL,
  DEFAULT_API_BASE,
  DEFAULT_TIMEOUT_MS,
  EDITOR_PLUGIN_VERSION,
  EDITOR_VERSION,
  USER_AGENT,
} from './constants';
import { AuthRejected, truncate } from './errors';
import { bodyText, createHttpClient, isSuccess, parsePayload, toNetworkError } from './http';
import { createLogger, type Logger } from './log';
import { Secret } from './secret';
import type { HttpOptions, OAuthToken, ProviderSession } from './types';

const copilotTokenSchema = z.object({
  token: z.string().min(1),
  expires_at: z.number().optional(),
  endpoints: z
    .object({
      api: z.string().min(1).optional(),
    })
    .optional(),
});

/**
 * Exchange a GitHub OAuth token for a short-lived Copilot session token.
 */
export class TokenExchanger {
  private client: AxiosInstance;
  private timeout: number;
  private log: Logger;

  constructor(options: HttpOptions = {}) {
    this.client = options.client ?? createHttpClient();
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.log = createLogger('exchange', options.debug ?? false);
  }

  public async exchange(oauthToken: OAuthToken): Promise<ProviderSession> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(COPILOT_TOKEN_URL, {
        headers: {
          'Accept': 'application/json',
          'Authorization': `Bearer ${oauthToken.accessToken.reveal()}`,
          'User-Agent': USER_AGENT,
          'Editor-Version': EDITOR_VERSION,
          'Editor-Plugin-Version': EDITOR_PLUGIN_VERSION,
        },
        timeout: this.timeout,
      });
    } catch (error) {
      throw toNetworkError(error, 'Copilot token exchange');
    }

    if (!isSuccess(response.status)) {
      const detail = truncate(bodyText(response.data), 200);
      if (response.status === 404) {
        throw new AuthRejected(
          404,
          'Copilot token exchange failed (404). The GitHub account probably has no active ' +
            'Copilot subscription; check https://github.com/settings/copilot',
        );
      }
      throw new AuthRejected(response.status, `Copilot token exchange failed: ${response.status} ${detail}`);
    }

    const data = parsePayload(copilotTokenSchema, response.data, 'Copilot token');
    const session: ProviderSession = {
      apiToken: new Secret(data.token),
      apiBase: data.endpoints?.api ?? DEFAULT_API_BASE,
      expiresAt: data.expires_at !== undefined ? data.expires_at * 1000 : undefined,
    };

    this.log('Session token obtained, API base:', session.apiBase);
    return session;
  }
}
