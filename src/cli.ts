#!/usr/bin/env node

import { ChatInvoker } from './chat';
import { fail, parseChatArgs, printChallenge, status } from './cli-shared';
import { loadConfig } from './config';
import { signIn } from './login';

function printHelp(): void {
  process.stderr.write(`copilot-chat - one-shot GitHub Copilot chat

Usage:
  copilot-chat [options] ["your prompt here"]

Options:
  --debug           Enable debug logging
  -h, --help        Show this help

Environment:
  MODEL               Model to use (default: gpt-4.1)
  COPILOT_DEBUG       Same as --debug when set to 1 or true
  COPILOT_TIMEOUT_MS  Per-request timeout in milliseconds (default: 30000)

Examples:
  copilot-chat "explain quicksort"
  MODEL=gpt-4o copilot-chat "what is 2+2"
`);
}

async function main(): Promise<void> {
  const args = parseChatArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  const config = loadConfig();
  const debug = args.debug || config.debug;

  const session = await signIn({
    debug,
    timeout: config.timeout,
    onChallenge: printChallenge,
    onStatus: status,
  });

  status(`Sending prompt to ${config.model}...`);
  const reply = await new ChatInvoker({ debug }).send(session, config.model, args.prompt);
  process.stdout.write(`${reply}\n`);
}

main().catch(fail);
