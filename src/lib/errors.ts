export type RunStage = 'fetch' | 'parse' | 'write';

export class FetchError extends Error {
  readonly category: string;
  readonly status: number | undefined;

  constructor(category: string, message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(`arXiv fetch failed for ${category}: ${message}`, { cause: opts.cause });
    this.name = 'FetchError';
    this.category = category;
    this.status = opts.status;
  }
}

export class FeedParseError extends Error {
  readonly line: number | undefined;
  readonly col: number | undefined;

  constructor(message: string, pos: { line?: number; col?: number } = {}) {
    const where = pos.line !== undefined ? ` (line ${pos.line}, col ${pos.col ?? '?'})` : '';
    super(`Malformed Atom feed: ${message}${where}`);
    this.name = 'FeedParseError';
    this.line = pos.line;
    this.col = pos.col;
  }
}

/** Wraps whatever went wrong while processing one subject, tagged with the stage. */
export class SubjectRunError extends Error {
  readonly subject: string;
  readonly stage: RunStage;

  constructor(subject: string, stage: RunStage, cause: unknown) {
    super(`${stage} failed for ${subject}: ${errorMessage(cause)}`, { cause });
    this.name = 'SubjectRunError';
    this.subject = subject;
    this.stage = stage;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
