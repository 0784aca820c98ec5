import type { ErrorCode } from "../types";

export abstract class PipelineError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly retryable: boolean;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class TransientModelError extends PipelineError {
  readonly code = "TransientModelError";
  readonly retryable = true;
}

export class ExtractionError extends PipelineError {
  readonly code = "ExtractionError";
  readonly retryable = true;
}

export class ExhaustedRetriesError extends PipelineError {
  readonly code = "ExhaustedRetriesError";
  readonly retryable = false;
  readonly lastError: string;

  constructor(attempts: number, lastError: string) {
    super(`gave up after ${attempts} attempts: ${lastError}`);
    this.lastError = lastError;
  }
}

export class UnsupportedTypeError extends PipelineError {
  readonly code = "UnsupportedTypeError";
  readonly retryable = false;

  constructor(documentType: string) {
    super(`no extractor registered for document type "${documentType}"`);
  }
}

export class ValidationBlockingError extends PipelineError {
  readonly code = "ValidationBlockingError";
  readonly retryable = false;
}

export class CancelledError extends PipelineError {
  readonly code = "CancelledError";
  readonly retryable = false;
}

export class ParseError extends Error {
  readonly rawSpan: string;

  constructor(message: string, rawSpan: string) {
    super(message);
    this.name = "ParseError";
    this.rawSpan = rawSpan;
  }
}

export class ModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelError";
  }
}

export class RegistryConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryConfigurationError";
  }
}

export class IllegalTransitionError extends Error {
  constructor(from: string, to: string) {
    super(`illegal transition ${from} -> ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class UnsupportedFileError extends Error {
  constructor(filePath: string, reason: string) {
    super(`cannot ingest ${filePath}: ${reason}`);
    this.name = "UnsupportedFileError";
  }
}
