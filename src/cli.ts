import path from 'path';
import { DEFAULT_OPTIONS } from './cell-classes';
import { UsageError } from './errors';
import { resolveOutputPaths } from './report-generator';
import { SchemeParser } from './scheme-parser';
import type { Logger, ParseOptions } from './types';

export interface CliArgs {
  imagePath: string;
  outputPath?: string;
  options: ParseOptions;
  quiet: boolean;
}

export const USAGE = [
  'Usage: core-scheme-parser <image_path> [cell_size] [min_area] [options]',
  '',
  'Arguments:',
  `  cell_size          Pixel size of one grid cell (default ${DEFAULT_OPTIONS.cellSize})`,
  `  min_area           Minimum blob area in pixels (default ${DEFAULT_OPTIONS.minArea})`,
  '',
  'Options:',
  `  --tolerance <n>    RGB distance below which a pixel matches a class (default ${DEFAULT_OPTIONS.colorTolerance})`,
  '  --output <path>    JSON output path (default: image path with .json)',
  '  --quiet            Only print errors',
  '',
  'Example:',
  '  core-scheme-parser core_scheme.png 26 100'
].join('\n');

const silentLogger: Logger = {
  log: () => undefined,
  warn: () => undefined
};

function parseInteger(name: string, value: string, min: number): number {
  if (!/^\d+$/.test(value) || Number(value) < min) {
    throw new UsageError(`${name} must be an integer >= ${min}, got "${value}"`);
  }
  return Number(value);
}

function parsePositive(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed <= 0) {
    throw new UsageError(`${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}

export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  const options: ParseOptions = { ...DEFAULT_OPTIONS };
  let outputPath: string | undefined;
  let quiet = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--quiet') {
      quiet = true;
    } else if (arg === '--tolerance' || arg === '--output') {
      const value = argv[i + 1];
      if (value === undefined) {
        throw new UsageError(`${arg} requires a value`);
      }
      i++;
      if (arg === '--tolerance') {
        options.colorTolerance = parsePositive('tolerance', value);
      } else {
        outputPath = path.resolve(value);
      }
    } else if (arg.startsWith('--')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (positional.length === 0) {
    throw new UsageError('Please provide an image file path');
  }
  if (positional.length > 3) {
    throw new UsageError(`Unexpected argument: ${positional[3]}`);
  }

  const [imagePath, cellSize, minArea] = positional;
  if (cellSize !== undefined) {
    options.cellSize = parseInteger('cell_size', cellSize, 1);
  }
  if (minArea !== undefined) {
    options.minArea = parseInteger('min_area', minArea, 0);
  }

  // The listing always takes the JSON path with a .ts extension
  const { jsonPath, listingPath } = resolveOutputPaths(path.resolve(imagePath), outputPath);
  if (jsonPath === listingPath) {
    throw new UsageError(`--output must not end in .ts, the listing would overwrite it: ${jsonPath}`);
  }

  return {
    imagePath: path.resolve(imagePath),
    outputPath,
    options,
    quiet
  };
}

/**
 * Run the parser for the given arguments and return the process exit code.
 */
export async function runCli(argv: string[], logger: Logger = console): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`❌ ${error.message}`);
      console.error(`\n${USAGE}`);
      return 1;
    }
    throw error;
  }

  const activeLogger = args.quiet ? silentLogger : logger;
  activeLogger.log('🚀 Starting Core Scheme Parser');
  activeLogger.log('==============================\n');

  try {
    const parser = new SchemeParser(args.options, activeLogger);
    const { output } = await parser.run(args.imagePath, args.outputPath);
    activeLogger.log(`\n✅ Extracted ${output.metadata.totalCells} cells`);
    return 0;
  } catch (error) {
    console.error('❌ Error during processing:', error instanceof Error ? error.message : error);
    return 1;
  }
}
