import { z } from 'zod';
import { DEFAULT_MODEL, DEFAULT_TIMEOUT_MS } from './constants';

export interface CopilotProbeConfig {
  /** Chat model; only the chat tool reads it. */
  model: string;
  debug: boolean;
  timeout: number;
}

const envSchema = z.object({
  MODEL: z.string().trim().min(1).optional().catch(undefined),
  COPILOT_DEBUG: z
    .string()
    .optional()
    .transform((value) => value === '1' || value?.toLowerCase() === 'true'),
  COPILOT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

/**
 * Read configuration from the environment. Invalid values throw, so a typo
 * in COPILOT_TIMEOUT_MS is reported instead of silently ignored.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CopilotProbeConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid environment: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown'}`);
  }

  return {
    model: result.data.MODEL ?? DEFAULT_MODEL,
    debug: result.data.COPILOT_DEBUG,
    timeout: result.data.COPILOT_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
  };
}
