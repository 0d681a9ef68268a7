import type { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { ChatInvoker } from './chat';
import { COPILOT_PROVIDER_ID, DEFAULT_TIMEOUT_MS, MODELS_DEV_URL } from './constants';
import { ApiError, NetworkError, ProtocolError, truncate } from './errors';
import { bodyText, createHttpClient, isSuccess, parsePayload, toNetworkError } from './http';
import { createLogger, type Logger } from './log';
import type { AuthorizedCaller, ChatRequest, ModelCatalogOptions, ModelEntry, VerificationResult } from './types';

export const MANIFEST_USER_AGENT = 'copilot-probe-models/0.1.0';
export const PROBE_PROMPT = 'Respond with the single word: ok';

const manifestSchema = z.record(z.string(), z.unknown());

const providerSchema = z.object({
  models: z
    .record(
      z.string(),
      z.object({
        name: z.string().optional().catch(undefined),
        experimental: z.unknown().transform(Boolean),
      }),
    )
    .optional(),
});

/**
 * Turn a caught probe failure into the one-line detail shown next to a model.
 */
export function describeFailure(error: unknown): string {
  if (error instanceof ApiError) return `${error.status} ${truncate(error.body, 200)}`.trim();
  if (error instanceof NetworkError) return `request-error: ${error.message}`;
  if (error instanceof ProtocolError) return `unknown-shape: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Copilot models as published on Models.dev.
 *
 * The listing is a static catalog, not a live Copilot query; `verify()` is
 * what tells whether the signed-in account can actually use a model.
 */
export class ModelCatalog {
  private client: AxiosInstance;
  private timeout: number;
  private manifestUrl: string;
  private providerId: string;
  private chat: ChatInvoker;
  private log: Logger;

  constructor(options: ModelCatalogOptions = {}, chat?: ChatInvoker) {
    this.client = options.client ?? createHttpClient();
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    this.manifestUrl = options.manifestUrl ?? MODELS_DEV_URL;
    this.providerId = options.providerId ?? COPILOT_PROVIDER_ID;
    this.chat = chat ?? new ChatInvoker({ debug: options.debug });
    this.log = createLogger('models', options.debug ?? false);
  }

  /**
   * Models of the configured provider, in manifest order. Experimental
   * entries are dropped unless asked for.
   */
  public async listModels(includeExperimental: boolean): Promise<ModelEntry[]> {
    const manifest = parsePayload(manifestSchema, await this.fetchManifest(), 'manifest');
    const provider = manifest[this.providerId];
    if (provider === undefined || provider === null) {
      this.log(`Provider ${this.providerId} not in manifest`);
      return [];
    }

    const { models = {} } = parsePayload(providerSchema, provider, `${this.providerId} manifest`);
    const entries: ModelEntry[] = [];

    for (const [id, info] of Object.entries(models)) {
      if (info.experimental && !includeExperimental) continue;
      entries.push({
        id,
        displayName: info.name || id,
        experimental: info.experimental,
        provider: this.providerId,
      });
    }

    this.log(`${entries.length} of ${Object.keys(models).length} model(s) kept`);
    return entries;
  }

  /**
   * Probe each model with a tiny completion, one at a time. A failing model
   * is recorded and the next one is still probed.
   */
  public async verify(session: AuthorizedCaller, models: ModelEntry[], limit?: number): Promise<VerificationResult[]> {
    const toCheck = limit === undefined ? models : models.slice(0, Math.max(0, limit));
    const results: VerificationResult[] = [];

    for (const model of toCheck) {
      const request: ChatRequest = {
        model: model.id,
        messages: [{ role: 'user', content: PROBE_PROMPT }],
        max_tokens: 5,
        temperature: 0,
      };

      try {
        await this.chat.complete(session, request);
        results.push({ modelId: model.id, accessible: true, statusDetail: 'ok' });
      } catch (error) {
        const statusDetail = describeFailure(error);
        this.log(`${model.id} not accessible: ${statusDetail}`);
        results.push({ modelId: model.id, accessible: false, statusDetail });
      }
    }

    return results;
  }

  private async fetchManifest(): Promise<unknown> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(this.manifestUrl, {
        headers: { 'User-Agent': MANIFEST_USER_AGENT, 'Accept': 'application/json' },
        timeout: this.timeout,
      });
    } catch (error) {
      throw toNetworkError(error, 'Models.dev manifest request');
    }

    if (!isSuccess(response.status)) {
      throw new ProtocolError(
        `Models.dev manifest request returned ${response.status}: ${truncate(bodyText(response.data), 200)}`,
      );
    }
    return response.data;
  }
}
