import { LogLevel } from '@nestjs/common';

export interface AppConfig {
  port: number;
  host: string;
  logLevels: LogLevel[];
}

// Most to least severe; LOG_LEVEL enables itself and everything above it.
const LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

const DEFAULT_PORT = 3000;
const DEFAULT_HOST = '0.0.0.0';
const DEFAULT_LOG_LEVEL: LogLevel = 'log';

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePort(env.PORT),
    host: env.HOST?.trim() || DEFAULT_HOST,
    logLevels: logLevelsFrom(env.LOG_LEVEL),
  };
}

function parsePort(raw: string | undefined): number {
  const port = Number(raw);
  return Number.isInteger(port) && port > 0 && port < 65536 ? port : DEFAULT_PORT;
}

function logLevelsFrom(raw: string | undefined): LogLevel[] {
  const requested = raw?.trim().toLowerCase();
  const level = LEVELS.find(l => l === requested) ?? DEFAULT_LOG_LEVEL;
  return LEVELS.slice(0, LEVELS.indexOf(level) + 1);
}
