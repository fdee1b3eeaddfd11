export type LogLevel = 'silent' | 'info' | 'debug';

export interface ServerConfig {
  dateOnlyAsUtc: boolean;
  logLevel: LogLevel;
}

const DATE_ONLY_AS_UTC_ENV_VAR = 'DATE_MCP_DATE_ONLY_AS_UTC';
const LOG_LEVEL_ENV_VAR = 'DATE_MCP_LOG_LEVEL';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'info', 'debug'];

function parseFlag(value: string | undefined): boolean {
  if (value == null) return false;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? 'info';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    dateOnlyAsUtc: parseFlag(env[DATE_ONLY_AS_UTC_ENV_VAR]),
    logLevel: parseLogLevel(env[LOG_LEVEL_ENV_VAR]),
  };
}
