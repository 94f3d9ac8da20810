export type ErrorCode =
  | 'file_not_found'
  | 'invalid_page_range'
  | 'text_extraction_failed'
  | 'text_cleaning_failed'
  | 'synthesis_failed'
  | 'stitch_unavailable'
  | 'encoder_timeout'
  | 'rate_limited'
  | 'configuration_error'
  | 'unknown_error';

export interface ApplicationError {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: string;
  readonly retryable: boolean;
  readonly suggestion?: string;
}

/**
 * Thrown inside a stage when it cannot produce a value.
 * The orchestrator turns it back into a failed ProcessingResult.
 */
export class PipelineError extends Error {
  constructor(public readonly appError: ApplicationError) {
    super(appError.details ? `${appError.message}: ${appError.details}` : appError.message);
    this.name = 'PipelineError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(`[Config] ${message}`);
    this.name = 'ConfigurationError';
  }
}

// Texts beginning with these are failures reported inline by extraction/cleaning.
export const UPSTREAM_ERROR_PREFIXES = ['Error', 'LLM cleaning skipped'] as const;

export const EXTRACTION_ERROR_PREFIXES = [
  'Error',
  'Tesseract',
  'OCR process yielded no text',
  'Could not convert',
] as const;

export const isUpstreamErrorText = (text: string): boolean =>
  UPSTREAM_ERROR_PREFIXES.some(prefix => text.startsWith(prefix));

export const isExtractionError = (text: string): boolean =>
  EXTRACTION_ERROR_PREFIXES.some(prefix => text.startsWith(prefix));

const RATE_LIMIT_INDICATORS = ['429', 'resource_exhausted', 'quota', 'rate limit', 'too many requests'];

export const isRateLimitMessage = (message: string): boolean => {
  const lower = message.toLowerCase();
  return RATE_LIMIT_INDICATORS.some(indicator => lower.includes(indicator));
};

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const fileNotFoundError = (filePath: string): ApplicationError => ({
  code: 'file_not_found',
  message: `File not found: ${filePath}`,
  retryable: false,
});

export const invalidPageRangeError = (details: string): ApplicationError => ({
  code: 'invalid_page_range',
  message: 'Invalid page range',
  details,
  retryable: false,
});

export const textExtractionError = (details: string): ApplicationError => ({
  code: 'text_extraction_failed',
  message: 'Failed to extract text from PDF',
  details,
  retryable: false,
});

export const textCleaningError = (details?: string): ApplicationError => ({
  code: 'text_cleaning_failed',
  message: 'Text cleaning failed',
  details,
  retryable: true,
  suggestion: 'The language model may be temporarily unavailable. Try again in a few minutes.',
});

export const synthesisError = (details?: string): ApplicationError => ({
  code: 'synthesis_failed',
  message: 'Audio generation failed',
  details,
  retryable: true,
  suggestion: 'The speech engine may be rate limited. Wait a minute and retry.',
});

export const stitchUnavailableError = (details?: string): ApplicationError => ({
  code: 'stitch_unavailable',
  message: 'Combined audio could not be created',
  details,
  retryable: true,
  suggestion: 'Install ffmpeg and make sure it is on PATH (or set FFMPEG_PATH) to get a single combined file.',
});

export const encoderTimeoutError = (timeoutSeconds: number): ApplicationError => ({
  code: 'encoder_timeout',
  message: `Audio encoder timed out after ${timeoutSeconds}s`,
  retryable: true,
  suggestion: 'Try a smaller page range.',
});

export const rateLimitedError = (details?: string): ApplicationError => ({
  code: 'rate_limited',
  message: 'Speech engine rate limit reached',
  details,
  retryable: true,
  suggestion: 'Wait a minute and retry, or lower MAX_CONCURRENT_TTS_REQUESTS.',
});

export const configurationError = (details: string): ApplicationError => ({
  code: 'configuration_error',
  message: 'Configuration error',
  details,
  retryable: false,
});

export const toApplicationError = (error: unknown): ApplicationError => {
  if (error instanceof PipelineError) return error.appError;
  if (error instanceof ConfigurationError) return configurationError(error.message);

  const message = errorMessage(error);
  if (isRateLimitMessage(message)) return rateLimitedError(message);

  return {
    code: 'unknown_error',
    message: 'Processing failed',
    details: message,
    retryable: false,
  };
};

export const formatError = (error: ApplicationError): string => {
  const base = error.details ? `${error.message} (${error.details})` : error.message;
  return error.suggestion ? `${base}. ${error.suggestion}` : base;
};
