/**
 * pathview CLI
 *
 * Loads a program and prints the parse summary:
 *
 *   pathview <file.gcode> [--trim-priming] [--independent-e] [--config <file>] [--verbose]
 */

import { parseArgs } from 'node:util';
import { DEFAULT_VIEWER_CONFIG, type ViewerConfig } from './config.js';
import { PathviewError } from './errors.js';
import { loadToolpathFile, loadViewerConfig } from './node.js';
import { setLogLevel } from './log.js';
import { formatBounds, formatSummary } from './report.js';

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const USAGE = [
  'Usage: pathview <gcode-file> [options]',
  '',
  'Options:',
  '  --trim-priming   Drop priming and homing moves before the print',
  '  --independent-e  Let M82/M83 set the extrusion axis mode',
  '  --config <file>  Viewer config JSON',
  '  --verbose        Log parse progress',
];

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'trim-priming': { type: 'boolean', default: false },
      'independent-e': { type: 'boolean', default: false },
      config: { type: 'string' },
      verbose: { type: 'boolean', default: false },
    },
  });
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(error instanceof Error ? error.message : String(error));
    USAGE.forEach((line) => io.err(line));
    return 1;
  }

  const [file] = parsed.positionals;
  if (file === undefined) {
    USAGE.forEach((line) => io.err(line));
    return 1;
  }

  try {
    const config: ViewerConfig = parsed.values.config
      ? await loadViewerConfig(parsed.values.config)
      : DEFAULT_VIEWER_CONFIG;
    setLogLevel(parsed.values.verbose ? 'info' : config.logLevel);

    const { toolpath, stats, parsedSegments } = await loadToolpathFile(file, {
      gcode: {
        extrusionMode: parsed.values['independent-e'] ? 'independent' : config.gcode.extrusionMode,
        trimPriming: parsed.values['trim-priming'] || config.gcode.trimPriming,
      },
    });

    io.out(`Parsed ${parsedSegments} line segments`);
    if (stats.skippedLines > 0) {
      io.out(`Skipped ${stats.skippedLines} malformed lines`);
    }
    if (toolpath.summary.segmentCount !== parsedSegments) {
      io.out(`After filtering priming: ${toolpath.summary.segmentCount} segments`);
    }
    io.out(formatBounds(toolpath.bounds));
    io.out(formatSummary(toolpath));
    return 0;
  } catch (error) {
    if (error instanceof PathviewError) {
      io.err(error.message);
      return 1;
    }
    throw error;
  }
}
