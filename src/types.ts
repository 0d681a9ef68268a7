/**
 * Type definitions for the device flow, the Copilot session and the model catalog
 */

import type { AxiosInstance } from 'axios';
import type { Secret } from './secret';

export interface DeviceAuthorization {
  deviceCode: Secret;
  userCode: string;
  verificationUri: string;
  /** Seconds between polls. */
  interval: number;
  /** Seconds until the device code stops being valid. */
  expiresIn: number;
}

export interface OAuthToken {
  accessToken: Secret;
}

export interface ProviderSession {
  apiToken: Secret;
  apiBase: string;
  /** Epoch milliseconds, when GitHub sends `expires_at`. */
  expiresAt?: number;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** The one capability downstream code needs from an authenticated session. */
export interface AuthorizedCaller {
  call(method: HttpMethod, path: string, body?: unknown): Promise<unknown>;
}

export interface ChatMessage {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  max_tokens?: number;
  temperature?: number;
}

export interface ChatResponse {
  choices: ChatChoice[];
}

export interface ChatChoice {
  message: {
    role?: string;
    content: string;
  };
  finish_reason?: string | null;
}

export interface ModelEntry {
  id: string;
  displayName: string;
  experimental: boolean;
  provider: string;
}

export interface VerificationResult {
  modelId: string;
  accessible: boolean;
  statusDetail: string;
}

/** Options shared by every component that talks HTTP. */
export interface HttpOptions {
  client?: AxiosInstance;
  timeout?: number;
  debug?: boolean;
}

export interface DeviceFlowOptions extends HttpOptions {
  clientId?: string;
  scope?: string;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface ModelCatalogOptions extends HttpOptions {
  manifestUrl?: string;
  providerId?: string;
}
