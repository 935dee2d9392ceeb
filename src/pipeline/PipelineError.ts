export type PipelineStage = 'parse' | 'search' | 'resolve' | 'compose' | 'build';

/**
 * Failure of one pipeline stage. Fatal for the request that raised it only.
 */
export class PipelineStageError extends Error {
  public readonly stage: PipelineStage;
  public readonly details: Record<string, unknown>;

  constructor(
    message: string,
    stage: PipelineStage,
    details: Record<string, unknown> = {},
    cause?: unknown
  ) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'PipelineStageError';
    this.stage = stage;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class QueryParsingError extends PipelineStageError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'parse', details, cause);
    this.name = 'QueryParsingError';
  }
}

export class FieldMappingError extends PipelineStageError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'search', details, cause);
    this.name = 'FieldMappingError';
  }
}

export class ConflictResolutionError extends PipelineStageError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'resolve', details, cause);
    this.name = 'ConflictResolutionError';
  }
}

export class FilterCompositionError extends PipelineStageError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'compose', details, cause);
    this.name = 'FilterCompositionError';
  }
}

export class QueryGenerationError extends PipelineStageError {
  constructor(message: string, details: Record<string, unknown> = {}, cause?: unknown) {
    super(message, 'build', details, cause);
    this.name = 'QueryGenerationError';
  }
}
