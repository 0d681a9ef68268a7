import { z } from 'zod';
import { parsePayload } from './http';
import type { ModelEntry, VerificationResult } from './types';

export const DISCLAIMER =
  'Listing is from Models.dev (filtered), not a live Copilot model listing. ' +
  'Whether a model actually works depends on your GitHub Copilot subscription and settings.';

export interface ModelRow {
  id: string;
  name: string;
  experimental: boolean;
  verified?: boolean;
  verifyDetail?: string;
}

const verificationResultsSchema = z.array(
  z.object({
    modelId: z.string(),
    accessible: z.boolean(),
    statusDetail: z.string(),
  }),
);

/**
 * Join catalog entries with their verification results. Models that were
 * not probed (past the verify limit) carry no `verified` field.
 */
export function buildModelRows(models: ModelEntry[], results: VerificationResult[] = []): ModelRow[] {
  const byId = new Map(results.map((result) => [result.modelId, result]));
  return models.map((model) => {
    const row: ModelRow = { id: model.id, name: model.displayName, experimental: model.experimental };
    const result = byId.get(model.id);
    if (result) {
      row.verified = result.accessible;
      row.verifyDetail = result.statusDetail;
    }
    return row;
  });
}

export function renderModelsText(rows: ModelRow[], providerId: string): string {
  const lines = [DISCLAIMER];
  if (rows.length === 0) {
    lines.push(`No models found for provider: ${providerId}`);
    return lines.join('\n');
  }

  lines.push(`Provider: ${providerId}`);
  lines.push(`Models (${rows.length}):`);
  for (const row of rows) {
    const flag = row.experimental ? ' [experimental]' : '';
    const verified = row.verified === undefined ? '' : ` [verified=${row.verified}, ${row.verifyDetail ?? ''}]`;
    lines.push(`- ${row.name} (${row.id})${flag}${verified}`);
  }
  return lines.join('\n');
}

export function renderModelsJson(rows: ModelRow[]): string {
  return JSON.stringify(rows, null, 2);
}

export function serializeVerificationResults(results: VerificationResult[]): string {
  return JSON.stringify(results, null, 2);
}

export function parseVerificationResults(text: string): VerificationResult[] {
  return parsePayload(verificationResultsSchema, JSON.parse(text), 'verification report');
}
