#!/usr/bin/env node
/**
 * Panorama batch rotator CLI
 *
 * Usage:
 *   panorot rotate <inputs...> --angle <deg> --out <dir> [--concurrency <n>] [--mkdir]
 *   panorot preview <input> --angle <deg> --out <dir>
 *   panorot info <inputs...>
 */

// Load environment variables from .env file
import 'dotenv/config';

import { realpathSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { BatchInputBuilder, createBatchRun } from '../services/batch-builder.service.js';
import { Dispatcher } from '../services/dispatcher.service.js';
import { describeImages, previewRotation } from '../services/preview.service.js';
import { AppError, BatchValidationError, getErrorMessage } from '../utils/errors.js';
import { ConsoleProgressReporter } from './progress-reporter.js';
import {
  parseArgs,
  printDivider,
  printError,
  printHeader,
  printInfo,
  printLabel,
  printSuccess,
  printWarn,
} from './utils.js';

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_USAGE = 2;

function printUsage(): void {
  console.log(`
Panorama Batch Rotator

Usage:
  panorot <command> [options]

Commands:
  rotate    Rotate every input by the same yaw angle
  preview   Write a small before/after pair for one input
  info      Show size and format of each input

Options for 'rotate':
  <inputs...>          Image files or directories (jpg, jpeg, png, bmp, tiff, tif, webp)
  --angle <deg>        Yaw rotation in degrees (positive moves content right)
  --out <dir>          Existing output directory (files keep their names)
  --concurrency <n>    Number of parallel workers (default: CPU count, at most
                       UV_THREADPOOL_SIZE, which must be set in the shell)
  --mkdir              Create the output directory if it is missing

Options for 'preview':
  <input>              Image file
  --angle <deg>        Yaw rotation in degrees
  --out <dir>          Directory for <name>_original.png and <name>_rotated.png

Examples:
  panorot rotate shots/ --angle 90 --out rotated/
  panorot rotate a.jpg b.png --angle -45.5 --out out --concurrency 2
  panorot preview pano.jpg --angle 180 --out previews
`);
}

function requireString(flags: Record<string, string | boolean>, key: string): string {
  const value = flags[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new BatchValidationError(`Missing required option --${key}`);
  }
  return value;
}

function requireNumber(flags: Record<string, string | boolean>, key: string): number {
  const raw = requireString(flags, key);
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new BatchValidationError(`Option --${key} must be a number, got "${raw}"`);
  }
  return value;
}

async function rotateCommand(positional: string[], flags: Record<string, string | boolean>): Promise<number> {
  const angle = requireNumber(flags, 'angle');
  const outputDir = path.resolve(requireString(flags, 'out'));
  const concurrency = flags.concurrency === undefined ? undefined : requireNumber(flags, 'concurrency');

  const builder = new BatchInputBuilder();
  const { skipped } = await builder.add(positional);
  for (const skip of skipped) {
    printWarn(`Skipping ${skip.path} (${skip.reason})`);
  }

  if (flags.mkdir === true) {
    await mkdir(outputDir, { recursive: true });
  }

  const batch = createBatchRun({ inputs: builder.paths, angle, outputDir });
  const dispatcher = new Dispatcher({ concurrency });

  printHeader(`Rotating ${batch.total} image(s) by ${angle}°`);
  printLabel('Workers', Math.min(dispatcher.workerCount, batch.total));
  printDivider();

  const summary = await dispatcher.run(batch, new ConsoleProgressReporter());
  return summary.failed > 0 ? EXIT_FAILURES : EXIT_OK;
}

async function previewCommand(positional: string[], flags: Record<string, string | boolean>): Promise<number> {
  const [input] = positional;
  if (!input) {
    throw new BatchValidationError('preview needs an input file');
  }
  const angle = requireNumber(flags, 'angle');
  const outDir = path.resolve(requireString(flags, 'out'));

  const preview = await previewRotation(input, angle);
  await mkdir(outDir, { recursive: true });

  const stem = path.parse(input).name;
  const originalPath = path.join(outDir, `${stem}_original.png`);
  const rotatedPath = path.join(outDir, `${stem}_rotated.png`);
  await writeFile(originalPath, preview.original);
  await writeFile(rotatedPath, preview.rotated);

  printSuccess(`Preview ${preview.width}x${preview.height} at ${angle}°`);
  printLabel('Original', originalPath);
  printLabel('Rotated', rotatedPath);
  return EXIT_OK;
}

async function infoCommand(positional: string[]): Promise<number> {
  const builder = new BatchInputBuilder();
  const { skipped } = await builder.add(positional);
  for (const skip of skipped) {
    printWarn(`Skipping ${skip.path} (${skip.reason})`);
  }

  let failures = 0;
  for (const info of await describeImages(builder.paths)) {
    if ('error' in info) {
      failures++;
      printError(`${info.path}: ${info.error}`);
    } else {
      printInfo(`${info.path}  ${info.width}x${info.height}  ${info.format.toUpperCase()}`);
    }
  }
  return failures > 0 ? EXIT_FAILURES : EXIT_OK;
}

/**
 * Run the CLI and return its exit code
 */
export async function main(argv: readonly string[]): Promise<number> {
  const [command, ...rest] = argv;
  const { positional, flags } = parseArgs(rest);

  try {
    switch (command) {
      case 'rotate':
        return await rotateCommand(positional, flags);
      case 'preview':
        return await previewCommand(positional, flags);
      case 'info':
        return await infoCommand(positional);
      case undefined:
      case 'help':
      case '--help':
        printUsage();
        return command === undefined ? EXIT_USAGE : EXIT_OK;
      default:
        printError(`Unknown command: ${command}`);
        printUsage();
        return EXIT_USAGE;
    }
  } catch (error) {
    if (!(error instanceof AppError)) {
      throw error;
    }
    printError(error.message);
    return error instanceof BatchValidationError ? EXIT_USAGE : EXIT_FAILURES;
  }
}

/**
 * True when this module is the process entry point (also through an npm bin symlink)
 */
function isEntryPoint(): boolean {
  const invoked = process.argv[1];
  if (!invoked) return false;
  try {
    return realpathSync(invoked) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      printError(getErrorMessage(error));
      process.exitCode = EXIT_FAILURES;
    });
}
