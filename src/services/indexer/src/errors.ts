/**
 * Indexer error taxonomy, mapped to HTTP statuses at the route layer.
 */

export type IndexerErrorCode =
  | 'not_found'
  | 'invalid_request'
  | 'spawn_failed'
  | 'app_exited'
  | 'port_conflict'
  | 'start_timeout';

const STATUS_BY_CODE: Record<IndexerErrorCode, 400 | 404 | 409 | 500 | 504> = {
  not_found: 404,
  invalid_request: 400,
  spawn_failed: 500,
  app_exited: 500,
  port_conflict: 409,
  start_timeout: 504,
};

export class IndexerError extends Error {
  readonly code: IndexerErrorCode;

  constructor(code: IndexerErrorCode, message: string) {
    super(message);
    this.name = 'IndexerError';
    this.code = code;
  }

  get status(): 400 | 404 | 409 | 500 | 504 {
    return STATUS_BY_CODE[this.code];
  }
}
