export { EventEmitter, monotonicProgress, scaleProgress } from './emitter.ts';
export type { ProgressCallback } from './emitter.ts';
export { ConsoleProgressListener } from './listeners/console.ts';
export type * from './types.ts';
