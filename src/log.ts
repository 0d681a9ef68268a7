import { format } from 'util';

export type Logger = (...args: unknown[]) => void;

/**
 * Debug logger writing `[scope] message` lines to stderr.
 * Returns a no-op when debug output is off, so call sites stay unconditional.
 */
export function createLogger(scope: string, enabled: boolean): Logger {
  if (!enabled) return () => undefined;
  return (...args: unknown[]) => {
    process.stderr.write(`[${scope}] ${format(...args)}\n`);
  };
}
