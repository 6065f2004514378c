import path from 'node:path';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';
export const DEFAULT_GIT_BIN = 'git';

type ParseResult = {
  config: UpstreamHeadConfig;
  warnings: string[];
};

export type UpstreamHeadConfig = {
  logLevel: LogLevel;
  gitBin: string;
};

/** `LOG_LEVEL`, case-insensitive; blank means the default. */
function parseLogLevel(env: NodeJS.ProcessEnv): LogLevel {
  const raw = env.LOG_LEVEL;
  const normalized = (raw ?? '').trim().toLowerCase();
  if (!normalized) return DEFAULT_LOG_LEVEL;
  const match = LOG_LEVELS.find((level) => level === normalized);
  if (!match) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join('|')}, got "${raw}"`);
  }
  return match;
}

function parseGitBin(env: NodeJS.ProcessEnv, warnings: string[]): string {
  const gitBin = (env.GIT_BIN ?? '').trim() || DEFAULT_GIT_BIN;
  if (gitBin.includes('/') && !path.isAbsolute(gitBin)) {
    warnings.push(`GIT_BIN "${gitBin}" is a relative path: it resolves against the current working directory`);
  }
  return gitBin;
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const logLevel = parseLogLevel(env);
  const gitBin = parseGitBin(env, warnings);

  return {
    config: { logLevel, gitBin },
    warnings,
  };
}
