// ===========================================
// PIPELINE ERROR TAXONOMY
// ===========================================

export type PipelineErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'RATE_LIMITED'
  | 'MALFORMED_OBSERVATION'
  | 'INVALID_TOKEN_STATE'
  | 'STORE_WRITE_CONFLICT'
  | 'QUEUE_CLOSED'
  | 'CONFIG_ERROR';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Upstream unreachable after the retry budget was spent. */
export class SourceUnavailable extends PipelineError {
  constructor(readonly source: string, message: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', `${source}: ${message}`, options);
  }
}

/** The source's own quota is exhausted; the caller must back off. */
export class RateLimited extends PipelineError {
  constructor(readonly source: string, readonly retryAfterMs: number | null = null) {
    super('RATE_LIMITED', `${source}: rate limited${retryAfterMs !== null ? ` (retry after ${retryAfterMs}ms)` : ''}`);
  }
}

export class MalformedObservation extends PipelineError {
  constructor(readonly source: string, message: string) {
    super('MALFORMED_OBSERVATION', `${source}: ${message}`);
  }
}

export class InvalidTokenState extends PipelineError {
  constructor(readonly mintAddress: string, message: string) {
    super('INVALID_TOKEN_STATE', message);
  }
}

export class StoreWriteConflict extends PipelineError {
  constructor(readonly mintAddress: string, readonly expectedVersion: number | null) {
    super('STORE_WRITE_CONFLICT', `Version conflict writing ${mintAddress} (expected ${expectedVersion ?? 'new'})`);
  }
}

export class QueueClosed extends PipelineError {
  constructor() {
    super('QUEUE_CLOSED', 'Work queue is closed');
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string, readonly details?: unknown) {
    super('CONFIG_ERROR', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
