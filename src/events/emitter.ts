import type { EventListener, LogLevel, ProgressEvent } from './types.ts';

export class EventEmitter {
  private listeners: EventListener[] = [];

  subscribe(listener: EventListener): () => void {
    this.listeners.push(listener);

    // Return unsubscribe function
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index > -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  emit(event: ProgressEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error('Error in event listener:', error);
      }
    }
  }

  progress(fraction: number, description: string): void {
    this.emit({ type: 'progress', fraction, description });
  }

  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    this.emit(meta ? { type: 'log', level, message, meta } : { type: 'log', level, message });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log('warn', message, meta);
  }
}

/**
 * Child emitter whose progress fractions land in `[start, end]` of the parent.
 * Every other event is forwarded unchanged.
 */
export function scaleProgress(parent: EventEmitter, start: number, end: number): EventEmitter {
  const child = new EventEmitter();
  child.subscribe((event) => {
    if (event.type === 'progress') {
      parent.emit({ ...event, fraction: start + (end - start) * clamp(event.fraction) });
    } else {
      parent.emit(event);
    }
  });
  return child;
}

export type ProgressCallback = (fraction: number, description: string) => void;

/**
 * Listener that hands progress to a front end callback, clamped to [0, 1]
 * and never going backwards.
 */
export function monotonicProgress(callback: ProgressCallback): EventListener {
  let last = 0;
  return (event) => {
    if (event.type !== 'progress') return;
    last = Math.max(last, clamp(event.fraction));
    callback(last, event.description);
  };
}

function clamp(fraction: number): number {
  if (Number.isNaN(fraction)) return 0;
  return Math.min(1, Math.max(0, fraction));
}
