export const MCP_SERVER_NAME = 'date-string-mcp';
export const MCP_SERVER_VERSION = '1.0.0';
