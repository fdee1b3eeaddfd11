import { KEYWORD_PREFIX_LENGTH, listKeywordEntries, type KeywordEntry } from '../parser/keyword-table.js';
import { generateResponseMetadata, type ToolResponse } from '../utils/metadata.js';
import type { ListKeywordsInput } from './schemas.js';

export interface ListKeywordsResult {
  prefix_length: number;
  keywords: KeywordEntry[];
}

export async function listKeywords(input: ListKeywordsInput): Promise<ToolResponse<ListKeywordsResult>> {
  const keywords = listKeywordEntries().filter((entry) => !input.type || entry.type === input.type);
  return {
    results: { prefix_length: KEYWORD_PREFIX_LENGTH, keywords },
    _metadata: generateResponseMetadata(),
  };
}
