import { parseDate } from '../parser/date-parser.js';
import { formatDateRecord } from '../parser/formatter.js';
import type { ServerConfig } from '../config.js';
import type { DateRecord } from '../types/date-record.js';
import { generateResponseMetadata, type ToolResponse } from '../utils/metadata.js';
import type { ParseDateInput } from './schemas.js';

export interface ParseDateResult {
  input: string;
  valid: boolean;
  record?: DateRecord;
  canonical?: string;
  error?: string;
}

export function parseDateResult(input: ParseDateInput, config: Pick<ServerConfig, 'dateOnlyAsUtc'>): ParseDateResult {
  const record = parseDate(input.date, {
    dateOnlyAsUtc: input.date_only_as_utc ?? config.dateOnlyAsUtc,
  });

  if (!record) {
    return { input: input.date, valid: false, error: 'Not a recognizable date' };
  }

  return {
    input: input.date,
    valid: true,
    record,
    canonical: formatDateRecord(record),
  };
}

export async function parseDateTool(
  input: ParseDateInput,
  config: Pick<ServerConfig, 'dateOnlyAsUtc'>,
): Promise<ToolResponse<ParseDateResult>> {
  return { results: parseDateResult(input, config), _metadata: generateResponseMetadata() };
}
