#!/usr/bin/env node

import { fail, parseModelsArgs, printChallenge, status } from './cli-shared';
import { loadConfig } from './config';
import { COPILOT_PROVIDER_ID, DEFAULT_VERIFY_LIMIT } from './constants';
import { buildModelRows, renderModelsJson, renderModelsText } from './format';
import { signIn } from './login';
import { ModelCatalog } from './models';
import type { VerificationResult } from './types';

function printHelp(): void {
  process.stderr.write(`copilot-models - list GitHub Copilot models from Models.dev

Usage:
  copilot-models [options]

Options:
  --include-experimental  Include experimental models from the manifest
  --verify                Sign in and probe each model with a tiny request
  --verify-limit <n>      Max number of models to probe (default: ${DEFAULT_VERIFY_LIMIT})
  --json                  Print a JSON array instead of text
  --debug                 Enable debug logging
  -h, --help              Show this help
`);
}

async function main(): Promise<void> {
  const args = parseModelsArgs(process.argv.slice(2));
  if (args.help) {
    printHelp();
    return;
  }

  const config = loadConfig();
  const debug = args.debug || config.debug;
  const catalog = new ModelCatalog({ debug, timeout: config.timeout });

  const models = await catalog.listModels(args.includeExperimental);

  let results: VerificationResult[] = [];
  if (args.verify && models.length > 0) {
    status('Starting verification flow...');
    const session = await signIn({
      debug,
      timeout: config.timeout,
      onChallenge: printChallenge,
      onStatus: status,
    });
    results = await catalog.verify(session, models, args.verifyLimit);
  }

  const rows = buildModelRows(models, results);
  const output = args.json ? renderModelsJson(rows) : renderModelsText(rows, COPILOT_PROVIDER_ID);
  process.stdout.write(`${output}\n`);
}

main().catch(fail);
