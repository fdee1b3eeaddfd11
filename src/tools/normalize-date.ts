import type { ServerConfig } from '../config.js';
import { generateResponseMetadata, type ToolResponse } from '../utils/metadata.js';
import { parseDateResult } from './parse-date.js';
import type { NormalizeDateInput } from './schemas.js';

export interface NormalizeDateResult {
  original: string;
  normalized: string | null;
  has_offset: boolean;
}

export async function normalizeDateTool(
  input: NormalizeDateInput,
  config: Pick<ServerConfig, 'dateOnlyAsUtc'>,
): Promise<ToolResponse<NormalizeDateResult>> {
  const parsed = parseDateResult(input, config);

  const result: NormalizeDateResult = {
    original: input.date,
    normalized: parsed.canonical ?? null,
    has_offset: parsed.record?.utc_offset_seconds != null,
  };

  return { results: result, _metadata: generateResponseMetadata() };
}
