#!/usr/bin/env -S npx tsx

import { Command, InvalidArgumentError } from 'commander';
import { acquire } from './acquisition/mod.ts';
import { assemble } from './assembly/mod.ts';
import { type PipelineOverrides, resolveOptions } from './config.ts';
import { describeError } from './errors.ts';
import { ConsoleProgressListener, EventEmitter } from './events/mod.ts';
import { Logger } from './logger/mod.ts';
import { run } from './pipeline.ts';

interface CommonFlags {
  output: string;
  quality?: number;
  retries?: number;
  delay?: number;
  api?: string;
  logDir: string;
  verbose: boolean;
}

function showError(message: string): never {
  console.error(`\nError: ${message}`);
  console.error('No output produced.');
  process.exit(1);
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function toOverrides(flags: CommonFlags): PipelineOverrides {
  const overrides: PipelineOverrides = { retry: {} };
  if (flags.quality !== undefined) overrides.imageQuality = flags.quality;
  if (flags.retries !== undefined) overrides.retry = { ...overrides.retry, maxAttempts: flags.retries };
  if (flags.delay !== undefined) overrides.retry = { ...overrides.retry, delayMs: flags.delay };
  if (flags.api !== undefined) overrides.apiBaseUrl = flags.api;
  return overrides;
}

async function withListeners(flags: CommonFlags, task: (events: EventEmitter) => Promise<string>): Promise<void> {
  const logger = await Logger.open(flags.logDir);
  const consoleListener = new ConsoleProgressListener(flags.verbose);
  const events = new EventEmitter();
  events.subscribe((event) => consoleListener.listen(event));
  events.subscribe((event) => logger.listen(event));

  try {
    const outputPath = await task(events);
    events.emit({ type: 'processing:complete', outputPath });
  } catch (error) {
    logger.error('Run failed', error);
    await logger.close();
    showError(describeError(error));
  }
  await logger.close();
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-o, --output <dir>', 'output directory for the record, images and EPUB', 'output')
    .option('-q, --quality <percent>', 'JPEG quality for images in the EPUB (default: 85)', parseInteger)
    .option('--retries <count>', 'attempts per chapter and image download (default: 5)', parseInteger)
    .option('--delay <ms>', 'pause between attempts in milliseconds (default: 1000)', parseInteger)
    .option('--api <url>', 'API origin (default: https://api2.mangalib.me)')
    .option('--log-dir <dir>', 'directory for log files', 'logs')
    .option('-v, --verbose', 'print informational messages and retried requests', false);
}

const program = new Command()
  .name('ranobe2epub')
  .description('Download a web novel from ranobelib and convert it to EPUB');

withCommonOptions(program.command('run', { isDefault: true }))
  .description('download a book and assemble the EPUB')
  .argument('<reference>', 'book page URL, e.g. https://ranobelib.me/ru/book/1234--some-title')
  .action(async (reference: string, flags: CommonFlags) => {
    await withListeners(flags, (events) =>
      run(reference, flags.output, (fraction, description) => events.progress(fraction, description), {
        ...toOverrides(flags),
        listeners: [(event) => {
          if (event.type !== 'progress') events.emit(event);
        }],
      }));
  });

withCommonOptions(program.command('fetch'))
  .description('download a book into the intermediate record only')
  .argument('<reference>', 'book page URL')
  .action(async (reference: string, flags: CommonFlags) => {
    await withListeners(flags, (events) =>
      acquire(reference, flags.output, { options: resolveOptions(toOverrides(flags)), events }));
  });

withCommonOptions(program.command('build'))
  .description('assemble an EPUB from an existing record')
  .argument('<record>', 'path to ranobe.json')
  .action(async (recordPath: string, flags: CommonFlags) => {
    await withListeners(flags, (events) =>
      assemble(recordPath, { options: resolveOptions(toOverrides(flags)), events }));
  });

await program.parseAsync(process.argv);
