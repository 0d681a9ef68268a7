import type { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import {
  ACCESS_TOKEN_URL,
  CLIENT_ID,
  DEFAULT_TIMEOUT_MS,
  DEVICE_CODE_URL,
  DEVICE_GRANT_TYPE,
  OAUTH_SCOPE,
  SLOW_DOWN_INCREMENT,
  USER_AGENT,
} from './constants';
import { AuthDenied, AuthExpired, ProtocolError, truncate } from './errors';
import { bodyText, createHttpClient, isSuccess, parsePayload, toNetworkError } from './http';
import { createLogger, type Logger } from './log';
import { Secret } from './secret';
import type { DeviceAuthorization, DeviceFlowOptions, OAuthToken } from './types';

/**
 * GitHub OAuth device flow
 *
 * 1. `begin()` asks GitHub for a device code and a user code.
 * 2. The caller shows `verificationUri` and `userCode` to the human.
 * 3. `poll()` asks for the access token every `interval` seconds until the
 *    user approves, declines, or the code expires.
 */

const deviceCodeSchema = z.object({
  device_code: z.string().min(1),
  user_code: z.string().min(1),
  verification_uri: z.string().min(1),
  interval: z.number().positive(),
  expires_in: z.number().positive(),
});

const accessTokenSchema = z.object({
  access_token: z.string().optional(),
  error: z.string().optional(),
  error_description: z.string().optional(),
});

type AccessTokenPayload = z.infer<typeof accessTokenSchema>;

const GITHUB_HEADERS = {
  'Accept': 'application/json',
  'Content-Type': 'application/json',
  'User-Agent': USER_AGENT,
};

export class DeviceFlowAuth {
  private client: AxiosInstance;
  private clientId: string;
  private scope: string;
  private timeout: number;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;
  private log: Logger;

  constructor(options: DeviceFlowOptions = {}) {
    this.client = options.client ?? createHttpClient();
    this.clientId = options.clientId ?? CLIENT_ID;
    this.scope = options.scope ?? OAUTH_SCOPE;
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = options.now ?? Date.now;
    this.log = createLogger('auth', options.debug ?? false);
  }

  /**
   * Request a device code. The result must be shown to the user before polling.
   */
  public async begin(): Promise<DeviceAuthorization> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.post<unknown>(
        DEVICE_CODE_URL,
        { client_id: this.clientId, scope: this.scope },
        { headers: GITHUB_HEADERS, timeout: this.timeout },
      );
    } catch (error) {
      throw toNetworkError(error, 'Device code request');
    }

    if (!isSuccess(response.status)) {
      throw new ProtocolError(
        `Device code request returned ${response.status}: ${truncate(bodyText(response.data), 200)}`,
      );
    }

    const data = parsePayload(deviceCodeSchema, response.data, 'device code');
    this.log('Device flow initiated, user code:', data.user_code, 'interval:', data.interval);

    return {
      deviceCode: new Secret(data.device_code),
      userCode: data.user_code,
      verificationUri: data.verification_uri,
      interval: data.interval,
      expiresIn: data.expires_in,
    };
  }

  /**
   * Poll until GitHub hands out an access token.
   *
   * Stops with AuthExpired once `expiresIn` seconds have elapsed, whatever
   * the server keeps answering.
   */
  public async poll(auth: DeviceAuthorization): Promise<OAuthToken> {
    const deadline = this.now() + auth.expiresIn * 1000;
    let interval = auth.interval;
    let attempts = 0;

    while (this.now() < deadline) {
      attempts++;
      const payload = await this.requestAccessToken(auth.deviceCode);

      if (payload.access_token) {
        this.log(`Authorized after ${attempts} attempt(s)`);
        return { accessToken: new Secret(payload.access_token) };
      }

      switch (payload.error) {
        case 'authorization_pending':
          break;
        case 'slow_down':
          interval += SLOW_DOWN_INCREMENT;
          this.log(`Asked to slow down, interval is now ${interval}s`);
          break;
        case 'expired_token':
          throw new AuthExpired('The device code expired before authorization completed.');
        case 'access_denied':
          throw new AuthDenied('Authorization was denied by the user.');
        case undefined:
          throw new ProtocolError('Access token response had neither access_token nor error.');
        default:
          throw new ProtocolError(
            `Device flow failed: ${payload.error}${payload.error_description ? ` (${payload.error_description})` : ''}`,
          );
      }

      await this.sleep(interval * 1000);
    }

    throw new AuthExpired('Timed out waiting for device authorization.');
  }

  private async requestAccessToken(deviceCode: Secret): Promise<AccessTokenPayload> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.post<unknown>(
        ACCESS_TOKEN_URL,
        {
          client_id: this.clientId,
          device_code: deviceCode.reveal(),
          grant_type: DEVICE_GRANT_TYPE,
        },
        { headers: GITHUB_HEADERS, timeout: this.timeout },
      );
    } catch (error) {
      throw toNetworkError(error, 'Access token request');
    }

    // GitHub reports pending/slow_down in the body; a non-2xx without an
    // error code is not part of that vocabulary.
    const payload = accessTokenSchema.safeParse(response.data);
    if (!payload.success || (!isSuccess(response.status) && !payload.data.error)) {
      throw new ProtocolError(
        `Access token request returned ${response.status}: ${truncate(bodyText(response.data), 200)}`,
      );
    }
    return payload.data;
  }
}
