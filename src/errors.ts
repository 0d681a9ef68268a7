/**
 * Error taxonomy shared by the auth flow, the session and the tools.
 *
 * Every error carries a `code` so callers can switch on it without
 * `instanceof` chains.
 */

export type CopilotProbeErrorCode =
  | 'network_error'
  | 'protocol_error'
  | 'auth_expired'
  | 'auth_denied'
  | 'auth_rejected'
  | 'api_error'
  | 'empty_response';

export abstract class CopilotProbeError extends Error {
  public abstract readonly code: CopilotProbeErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/** Transport failure: DNS, refused connection, timeout. */
export class NetworkError extends CopilotProbeError {
  public readonly code = 'network_error';
}

/** Well-formed HTTP response whose payload is missing or malformed. */
export class ProtocolError extends CopilotProbeError {
  public readonly code = 'protocol_error';
}

/** The device code expired before the user finished authorizing. */
export class AuthExpired extends CopilotProbeError {
  public readonly code = 'auth_expired';
}

/** The user declined the authorization request. */
export class AuthDenied extends CopilotProbeError {
  public readonly code = 'auth_denied';
}

/** GitHub refused to exchange the OAuth token for a Copilot token. */
export class AuthRejected extends CopilotProbeError {
  public readonly code = 'auth_rejected';

  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(message);
  }
}

/** Non-2xx answer from an authenticated Copilot API call. */
export class ApiError extends CopilotProbeError {
  public readonly code = 'api_error';

  constructor(
    public readonly status: number,
    public readonly body: string,
    public readonly url?: string,
  ) {
    super(`Copilot API returned ${status}${url ? ` for ${url}` : ''}: ${truncate(body, 200)}`);
  }
}

/** Chat reply with an empty `choices` array. */
export class EmptyResponse extends CopilotProbeError {
  public readonly code = 'empty_response';
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

export function isCopilotProbeError(error: unknown): error is CopilotProbeError {
  return error instanceof CopilotProbeError;
}
