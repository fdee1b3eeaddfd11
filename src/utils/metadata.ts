import { MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../server-metadata.js';

export interface ResponseMetadata {
  server: string;
  version: string;
  generated_at: string;
}

export interface ToolResponse<T> {
  results: T;
  _metadata: ResponseMetadata;
}

export function generateResponseMetadata(): ResponseMetadata {
  return {
    server: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
    generated_at: new Date().toISOString(),
  };
}
