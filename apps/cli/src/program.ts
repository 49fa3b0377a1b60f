import type { OutlineProcessorOptions } from '@pdf-outline/outline-extractor';

import {
  OutlineProcessor,
  SettingsError,
  SettingsLoader,
} from '@pdf-outline/outline-extractor';
import { Command, InvalidArgumentError } from 'commander';

import type { DocumentOutlineSource } from './batch-runner';

import { BatchRunner } from './batch-runner';
import { createConsoleLogger } from './console-logger';

export interface CliOptions {
  output: string;
  config: string;
  pageOffset?: number;
  concurrency: number;
  verbose?: boolean;
}

export type ProcessorFactory = (
  options: OutlineProcessorOptions,
) => DocumentOutlineSource;

const createOutlineProcessor: ProcessorFactory = (options) =>
  new OutlineProcessor(options);

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parsePositiveInteger(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be at least 1.');
  }
  return parsed;
}

/**
 * Runs one batch and returns the process exit code
 */
export async function runCli(
  input: string,
  options: CliOptions,
  createProcessor: ProcessorFactory = createOutlineProcessor,
): Promise<number> {
  const logger = createConsoleLogger(options.verbose ?? false);

  try {
    const settings = SettingsLoader.load(options.config);
    const runner = new BatchRunner({
      logger,
      processor: createProcessor({ logger, settings }),
      outputDir: options.output,
      concurrency: options.concurrency,
      pageOffset: options.pageOffset,
    });

    await runner.run(input);
    return 0;
  } catch (error) {
    if (error instanceof SettingsError) {
      logger.error(error.getSummary());
    } else {
      logger.error(
        `Error: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    return 1;
  }
}

export function createProgram(
  createProcessor: ProcessorFactory = createOutlineProcessor,
): Command {
  return new Command()
    .name('pdf-outline')
    .description('Extract the title and heading outline of PDF files')
    .argument('<input>', 'PDF file or directory of PDF files')
    .option('-o, --output <dir>', 'output directory', 'output')
    .option('-c, --config <path>', 'settings file', 'config/settings.json')
    .option(
      '--page-offset <n>',
      'page offset applied to every document',
      parseInteger,
    )
    .option(
      '-j, --concurrency <n>',
      'documents processed in parallel',
      parsePositiveInteger,
      1,
    )
    .option('-v, --verbose', 'debug logging')
    .action(async (input: string, options: CliOptions) => {
      process.exitCode = await runCli(input, options, createProcessor);
    });
}
