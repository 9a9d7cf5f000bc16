/**
 * Logger for the protocol model.
 *
 * One pino root logger; each module takes a child bound to its component
 * name. Levels are applied to the root and every child handed out so a level
 * change from configuration reaches loggers created before it.
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type LogLevel = Extract<LevelWithSilent, 'debug' | 'info' | 'warn' | 'error' | 'silent'>;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function initialLevel(): LogLevel {
  const fromEnv = process.env['MRI_QA_LOG_LEVEL'];
  const match = LOG_LEVELS.find((level) => level === fromEnv);
  return match ?? 'info';
}

export const logger: Logger = pino({
  name: 'mri-protocol-qa',
  level: initialLevel(),
});

const children = new Map<string, Logger>();

/**
 * Child logger for a component, created once per name.
 */
export function getLogger(component: string): Logger {
  const existing = children.get(component);
  if (existing) return existing;
  const child = logger.child({ component });
  children.set(component, child);
  return child;
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of children.values()) {
    child.level = level;
  }
}

export function getLogLevel(): string {
  return logger.level;
}
