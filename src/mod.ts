export { run } from './pipeline.ts';
export type { RunOptions } from './pipeline.ts';
export { acquire, RanobeClient, resolveBookId } from './acquisition/mod.ts';
export { assemble, EpubAssembler, ImageCompressor } from './assembly/mod.ts';
export { DEFAULT_OPTIONS, resolveOptions } from './config.ts';
export type { PipelineOptions, PipelineOverrides, RetryPolicy } from './config.ts';
export { PipelineError } from './errors.ts';
export { ConsoleProgressListener, EventEmitter } from './events/mod.ts';
export { Logger } from './logger/mod.ts';
export { loadRecord, saveRecord } from './record/mod.ts';
export type { Attachment, Book, Chapter } from './record/mod.ts';
