import type { LogLevel } from '@nestjs/common';
import type { EnvConfig } from './env.config';

const SEVERITY: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/** Every Nest log level at or above the configured one */
export function logLevelsFor(level: EnvConfig['LOG_LEVEL']): LogLevel[] {
  return SEVERITY.slice(0, SEVERITY.indexOf(level) + 1);
}
