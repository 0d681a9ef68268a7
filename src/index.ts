/**
 * copilot-probe - GitHub Copilot device-flow sign-in, chat and model probing
 *
 * @example
 * ```typescript
 * import { ChatInvoker, signIn } from 'copilot-probe';
 *
 * const session = await signIn({
 *   onChallenge: (auth) => console.error(`Open ${auth.verificationUri} and enter ${auth.userCode}`),
 * });
 * const reply = await new ChatInvoker().send(session, 'gpt-4.1', 'Hello');
 * console.log(reply);
 * ```
 */

export { DeviceFlowAuth } from './auth';
export { TokenExchanger } from './token-exchange';
export { AuthenticatedSession } from './session';
export { ChatInvoker, CHAT_ROUTES, isRoutingFailure } from './chat';
export type { ChatRoute } from './chat';
export { ModelCatalog, describeFailure } from './models';
export { signIn } from './login';
export type { SignInOptions } from './login';
export { loadConfig } from './config';
export type { CopilotProbeConfig } from './config';
export { Secret } from './secret';
export * from './errors';
export * from './format';
export type * from './types';
