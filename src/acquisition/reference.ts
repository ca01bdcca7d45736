import { PipelineError } from '../errors.ts';

const BOOK_ID_PATTERNS = [
  /\/ru\/book\/(\d+--[\w-]+)/,
  /\/ru\/(\d+--[\w-]+)\//,
];

/** Extracts a `1234--slug` book id from a ranobelib page URL. */
export function resolveBookId(reference: string): string {
  for (const pattern of BOOK_ID_PATTERNS) {
    const match = reference.match(pattern);
    if (match?.[1]) {
      return match[1];
    }
  }

  throw new PipelineError('NotResolvable', `Cannot extract a book id from "${reference}"`);
}
