import { LogLevel } from '@nestjs/common';

export const APP_CONFIG = Symbol('APP_CONFIG');

export type DiagnosticsLevel = 'warn' | 'debug' | 'off';

// Runtime settings read from the environment (.env is loaded by main.ts).
export interface AppConfig {
  port: number;
  logLevels: LogLevel[];
  diagnosticsLevel: DiagnosticsLevel;
  importMaxBytes: string;   // body-parser limit, e.g. "5mb"
}

// Most to least severe; LOG_LEVEL enables its level and everything above it.
const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];
const DIAGNOSTICS_LEVELS: DiagnosticsLevel[] = ['warn', 'debug', 'off'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isDiagnosticsLevel(value: string): value is DiagnosticsLevel {
  return DIAGNOSTICS_LEVELS.some((level) => level === value);
}

/**
 * Builds the config from environment variables.
 * @throws Error on an unparseable value - startup should fail loudly
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const port = Number(env.PORT ?? 3000);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  const logLevel = (env.LOG_LEVEL ?? 'log').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}. Expected one of ${LOG_LEVELS.join(', ')}`);
  }

  const diagnosticsLevel = (env.ANALYTICS_DIAGNOSTICS ?? 'warn').toLowerCase();
  if (!isDiagnosticsLevel(diagnosticsLevel)) {
    throw new Error(
      `Invalid ANALYTICS_DIAGNOSTICS: ${env.ANALYTICS_DIAGNOSTICS}. Expected one of ${DIAGNOSTICS_LEVELS.join(', ')}`,
    );
  }

  const importMaxBytes = env.IMPORT_MAX_BYTES ?? '5mb';
  if (!/^\d+(b|kb|mb)?$/i.test(importMaxBytes)) {
    throw new Error(`Invalid IMPORT_MAX_BYTES: ${importMaxBytes}`);
  }

  return {
    port,
    logLevels: LOG_LEVELS.slice(0, LOG_LEVELS.indexOf(logLevel) + 1),
    diagnosticsLevel,
    importMaxBytes,
  };
}
