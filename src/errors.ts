export type PipelineErrorCode = 'NotResolvable' | 'NotFound' | 'ParseError' | 'WriteFailed';

/** Fatal pipeline failure; `message` is meant to be shown to the user as is. */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.code = code;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
