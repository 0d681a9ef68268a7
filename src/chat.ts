import { z } from 'zod';
import { ApiError, EmptyResponse } from './errors';
import { parsePayload } from './http';
import { createLogger, type Logger } from './log';
import type { AuthorizedCaller, ChatRequest, ChatResponse } from './types';

/**
 * Chat completion paths, tried in order. Some Copilot deployments only
 * route the OpenAI-style `/v1` prefix.
 */
export const CHAT_ROUTES = ['/chat/completions', '/v1/chat/completions'] as const;

export type ChatRoute = (typeof CHAT_ROUTES)[number];

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        role: z.string().optional(),
        content: z.string().nullable().transform((content) => content ?? ''),
      }),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
});

/** True when a failure means "wrong route", so the next candidate is worth trying. */
export function isRoutingFailure(error: unknown): boolean {
  return error instanceof ApiError && error.status === 404;
}

export class ChatInvoker {
  private log: Logger;

  constructor(options: { debug?: boolean } = {}) {
    this.log = createLogger('chat', options.debug ?? false);
  }

  /**
   * Send a single user prompt and return the assistant's reply.
   */
  public async send(session: AuthorizedCaller, model: string, prompt: string): Promise<string> {
    const response = await this.complete(session, {
      model,
      messages: [{ role: 'user', content: prompt }],
    });

    const first = response.choices[0];
    if (!first) {
      throw new EmptyResponse(`Model ${model} returned no completions.`);
    }
    return first.message.content;
  }

  /**
   * Post a chat completion request, walking CHAT_ROUTES until one is routed.
   */
  public async complete(session: AuthorizedCaller, request: ChatRequest): Promise<ChatResponse> {
    let lastError: unknown;

    for (const route of CHAT_ROUTES) {
      try {
        const data = await session.call('POST', route, request);
        this.log(`${request.model} answered on ${route}`);
        return parsePayload(chatResponseSchema, data, 'chat completion');
      } catch (error) {
        if (!isRoutingFailure(error)) throw error;
        this.log(`${route} is not routed for this session, trying next path`);
        lastError = error;
      }
    }

    throw lastError;
  }
}
