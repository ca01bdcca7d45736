import type { AxiosInstance } from 'axios';
import { acquire } from './acquisition/mod.ts';
import { assemble } from './assembly/mod.ts';
import { type PipelineOverrides, resolveOptions } from './config.ts';
import { EventEmitter, monotonicProgress, type ProgressCallback, scaleProgress } from './events/emitter.ts';
import type { EventListener } from './events/types.ts';

export interface RunOptions extends PipelineOverrides {
  listeners?: EventListener[];
  http?: AxiosInstance;
}

const ACQUISITION_SHARE = 0.8;

/**
 * Downloads the book behind `reference` into `outputDir` and assembles it into
 * an EPUB beside the record. Resolves to the EPUB path; fatal conditions
 * reject with a `PipelineError`.
 */
export async function run(
  reference: string,
  outputDir: string,
  onProgress: ProgressCallback,
  runOptions: RunOptions = {},
): Promise<string> {
  const { listeners = [], http, ...overrides } = runOptions;
  const options = resolveOptions(overrides);

  const events = new EventEmitter();
  const unsubscribers = [
    events.subscribe(monotonicProgress(onProgress)),
    ...listeners.map((listener) => events.subscribe(listener)),
  ];

  try {
    events.progress(0, 'Starting');
    const recordPath = await acquire(reference, outputDir, {
      options,
      events: scaleProgress(events, 0, ACQUISITION_SHARE),
      http,
    });

    const outputPath = await assemble(recordPath, {
      options,
      events: scaleProgress(events, ACQUISITION_SHARE, 1),
    });

    return outputPath;
  } finally {
    unsubscribers.forEach((unsubscribe) => unsubscribe());
  }
}
