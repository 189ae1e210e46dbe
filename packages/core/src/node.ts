/**
 * Node.js file access
 *
 * Reading programs and config files from disk. Read failures are fatal and
 * surface as `InputReadError`; no partial geometry is produced.
 */

import { readFile } from 'node:fs/promises';
import { ConfigError, InputReadError } from './errors.js';
import { parseViewerConfig, type ViewerConfig } from './config.js';
import { loadToolpathFromString, type LoadOptions, type LoadResult } from './load.js';
import { getLogger } from './log.js';

const logger = getLogger('load');

async function readText(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    throw new InputReadError(path, error);
  }
}

/**
 * Read and build a program file
 */
export async function loadToolpathFile(path: string, options: LoadOptions = {}): Promise<LoadResult> {
  const source = await readText(path);
  logger.info(`Loading G-code file: ${path}`);
  return loadToolpathFromString(source, options);
}

/**
 * Read and validate a JSON config file
 */
export async function loadViewerConfig(path: string): Promise<ViewerConfig> {
  const text = await readText(path);

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${path} is not valid JSON`, [reason]);
  }
  return parseViewerConfig(raw);
}
