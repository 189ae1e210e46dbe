/**
 * Named loggers
 *
 * Every module logs through a `pathview:*` child of the loglevel root so the
 * CLI and viewer can raise or silence one area at a time.
 */

import log from 'loglevel';

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type Logger = log.Logger;

let currentLevel: LogLevelName = 'warn';

const configured = new Set<string>();

/**
 * Get (and on first use, level) a named logger
 */
export function getLogger(area: string): Logger {
  const name = `pathview:${area}`;
  const logger = log.getLogger(name);
  if (!configured.has(name)) {
    logger.setDefaultLevel(currentLevel);
    configured.add(name);
  }
  return logger;
}

/**
 * Set the level of every pathview logger created so far and of any created later
 */
export function setLogLevel(level: LogLevelName): void {
  currentLevel = level;
  for (const name of configured) {
    log.getLogger(name).setLevel(level, false);
  }
}
