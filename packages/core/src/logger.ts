/**
 * Leveled console logger
 */

import chalk from 'chalk';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const tags = {
  debug: chalk.gray('debug'),
  info: chalk.cyan('info'),
  warn: chalk.yellow('warn'),
  error: chalk.red('error'),
};

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/**
 * Whether a message at `messageLevel` passes a logger set to `threshold`
 */
export function isLevelEnabled(threshold: LogLevel, messageLevel: Exclude<LogLevel, 'silent'>): boolean {
  return rank(messageLevel) <= rank(threshold);
}

/**
 * Create a console logger that drops messages below `level`
 */
export function createConsoleLogger(level: LogLevel = 'info', scope = 'memo-cache'): Logger {
  const prefix = chalk.dim(`[${scope}]`);
  const emit =
    (messageLevel: Exclude<LogLevel, 'silent'>, write: (line: string) => void) =>
    (message: string) => {
      if (isLevelEnabled(level, messageLevel)) {
        write(`${prefix} ${tags[messageLevel]} ${message}`);
      }
    };

  return {
    debug: emit('debug', (line) => console.debug(line)),
    info: emit('info', (line) => console.log(line)),
    warn: emit('warn', (line) => console.warn(line)),
    error: emit('error', (line) => console.error(line)),
  };
}
