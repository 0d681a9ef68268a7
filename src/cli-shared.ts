import { DEFAULT_PROMPT, DEFAULT_VERIFY_LIMIT } from './constants';
import { ApiError } from './errors';
import type { DeviceAuthorization } from './types';

export interface ChatArgs {
  prompt: string;
  debug: boolean;
  help: boolean;
}

export interface ModelsArgs {
  includeExperimental: boolean;
  verify: boolean;
  verifyLimit: number;
  json: boolean;
  debug: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseChatArgs(argv: string[]): ChatArgs {
  const result: ChatArgs = { prompt: DEFAULT_PROMPT, debug: false, help: false };
  const positional: string[] = [];

  for (const arg of argv) {
    if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  const prompt = positional.join(' ').trim();
  if (prompt) result.prompt = prompt;
  return result;
}

export function parseModelsArgs(argv: string[]): ModelsArgs {
  const result: ModelsArgs = {
    includeExperimental: false,
    verify: false,
    verifyLimit: DEFAULT_VERIFY_LIMIT,
    json: false,
    debug: false,
    help: false,
  };

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];
    if (arg === '--include-experimental') {
      result.includeExperimental = true;
    } else if (arg === '--verify') {
      result.verify = true;
    } else if (arg === '--verify-limit' || arg.startsWith('--verify-limit=')) {
      const raw = arg.includes('=') ? arg.slice(arg.indexOf('=') + 1) : argv[++i];
      result.verifyLimit = parseLimit(raw);
    } else if (arg === '--json') {
      result.json = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else {
      throw new UsageError(`Unknown argument: ${arg}`);
    }
    i++;
  }

  return result;
}

function parseLimit(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new UsageError(`--verify-limit expects a non-negative integer, got ${raw ?? 'nothing'}`);
  }
  return Number(raw);
}

export function printChallenge(auth: DeviceAuthorization): void {
  process.stderr.write(
    `\nPlease complete GitHub authentication for Copilot:\n` +
      `- Visit: ${auth.verificationUri}\n` +
      `- Enter code: ${auth.userCode}\n\n`,
  );
}

export function status(message: string): void {
  process.stderr.write(`${message}\n`);
}

/** Human-readable message for the CLI boundary. */
export function describeError(error: unknown): string {
  if (error instanceof ApiError && error.status === 400 && /model/i.test(error.body)) {
    return `${error.message}\nHint: the endpoint may not accept this model. Set MODEL (e.g. MODEL=gpt-4o).`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

export function fail(error: unknown): never {
  process.stderr.write(`Error: ${describeError(error)}\n`);
  process.exit(1);
}
