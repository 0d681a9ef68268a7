import { DeviceFlowAuth } from './auth';
import { AuthenticatedSession } from './session';
import { TokenExchanger } from './token-exchange';
import type { DeviceAuthorization, DeviceFlowOptions, HttpOptions } from './types';

export interface SignInOptions extends HttpOptions {
  /** Shows the verification URL and user code; called before polling starts. */
  onChallenge: (auth: DeviceAuthorization) => void;
  /** Progress messages ("waiting", "authorized"). */
  onStatus?: (message: string) => void;
  sleep?: DeviceFlowOptions['sleep'];
  now?: DeviceFlowOptions['now'];
}

/**
 * Run the whole sign-in: device code, user authorization, token exchange.
 */
export async function signIn(options: SignInOptions): Promise<AuthenticatedSession> {
  const { onChallenge, onStatus = () => undefined, ...http } = options;

  const deviceFlow = new DeviceFlowAuth(http);
  const authorization = await deviceFlow.begin();
  onChallenge(authorization);

  onStatus('Waiting for authorization...');
  const oauthToken = await deviceFlow.poll(authorization);
  onStatus('GitHub OAuth token acquired.');

  const providerSession = await new TokenExchanger(http).exchange(oauthToken);
  onStatus(`Copilot token acquired. API base: ${providerSession.apiBase}`);

  return new AuthenticatedSession(providerSession, http);
}
