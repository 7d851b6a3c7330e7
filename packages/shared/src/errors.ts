/**
 * Error taxonomy for the pipeline. Every error carries a stable `code` that ends up
 * in job outcomes and logs; the message is what gets stored on a failed job.
 */

export type ErrorCode =
  | 'JOB_NOT_FOUND'
  | 'UNSUPPORTED_JOB_TYPE'
  | 'INVALID_PAYLOAD'
  | 'FETCH_ERROR'
  | 'STORAGE_ERROR'
  | 'EXTRACTION_ERROR'
  | 'EMBEDDING_ERROR'
  | 'PROCESSING_ERROR'
  | 'ANSWER_ERROR'
  | 'CONFIG_ERROR'
  | 'STORE_ERROR'
  | 'UNKNOWN_ERROR';

export class KeepsakeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class JobNotFoundError extends KeepsakeError {
  constructor(readonly jobId: string) {
    super('JOB_NOT_FOUND', `Job not found: ${jobId}`);
  }
}

export class UnsupportedJobTypeError extends KeepsakeError {
  constructor(readonly jobType: string) {
    super('UNSUPPORTED_JOB_TYPE', `Unsupported job_type: ${jobType}`);
  }
}

export class InvalidPayloadError extends KeepsakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_PAYLOAD', message, options);
  }
}

export class FetchError extends KeepsakeError {
  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super('FETCH_ERROR', message, options);
  }
}

export class StorageError extends KeepsakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('STORAGE_ERROR', message, options);
  }
}

export class ExtractionError extends KeepsakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EXTRACTION_ERROR', message, options);
  }
}

export class EmbeddingError extends KeepsakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING_ERROR', message, options);
  }
}

/** Single error surfaced by the ingestion pipelines, wrapping whichever step failed. */
export class ProcessingError extends KeepsakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('PROCESSING_ERROR', message, options);
  }
}

export class AnswerError extends KeepsakeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ANSWER_ERROR', message, options);
  }
}

export class ConfigError extends KeepsakeError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCode(err: unknown): ErrorCode {
  return err instanceof KeepsakeError ? err.code : 'UNKNOWN_ERROR';
}
