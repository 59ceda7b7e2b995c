/**
 * Pipeline error taxonomy.
 *
 * Input and configuration errors abort a run with a structured error
 * response. Data-source, scoring and storage failures are recovered where
 * they happen and never reach this layer.
 */

export type PipelineErrorCode = 'INPUT_ERROR' | 'CONFIGURATION_ERROR' | 'PIPELINE_ERROR';

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode = 'PIPELINE_ERROR',
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PipelineError';
  }
}

export class InputError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'INPUT_ERROR', options);
    this.name = 'InputError';
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION_ERROR', options);
    this.name = 'ConfigurationError';
  }
}

export function sanitizeError(error: unknown): string {
  if (error instanceof PipelineError) {
    return error.message;
  }
  if (error instanceof Error) {
    if (process.env.NODE_ENV === 'development') {
      return error.message;
    }
    return 'An internal error occurred';
  }
  return 'An unknown error occurred';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
