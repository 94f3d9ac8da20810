import { describe, expect, it } from 'vitest';
import {
  ConfigurationError,
  fileNotFoundError,
  formatError,
  isExtractionError,
  isRateLimitMessage,
  isUpstreamErrorText,
  PipelineError,
  textCleaningError,
  toApplicationError,
} from './errors';

describe('sentinel detection', () => {
  it('recognises upstream failures carried as text', () => {
    expect(isUpstreamErrorText('Error: PDF conversion failed')).toBe(true);
    expect(isUpstreamErrorText('LLM cleaning skipped: quota')).toBe(true);
    expect(isUpstreamErrorText('A normal sentence.')).toBe(false);
  });

  it('recognises extraction failures', () => {
    expect(isExtractionError('OCR process yielded no text.')).toBe(true);
    expect(isExtractionError('Tesseract is not installed')).toBe(true);
    expect(isExtractionError('Could not convert page 3')).toBe(true);
    expect(isExtractionError('Chapter one')).toBe(false);
  });
});

describe('isRateLimitMessage', () => {
  it.each(['429 Too Many Requests', 'RESOURCE_EXHAUSTED', 'Quota exceeded', 'rate limit hit'])('matches %s', message => {
    expect(isRateLimitMessage(message)).toBe(true);
  });

  it('ignores other failures', () => {
    expect(isRateLimitMessage('network unreachable')).toBe(false);
  });
});

describe('toApplicationError', () => {
  it('unwraps pipeline errors', () => {
    expect(toApplicationError(new PipelineError(fileNotFoundError('book.pdf')))).toEqual({
      code: 'file_not_found',
      message: 'File not found: book.pdf',
      retryable: false,
    });
  });

  it('maps configuration and rate-limit errors', () => {
    expect(toApplicationError(new ConfigurationError('missing key')).details).toBe('[Config] missing key');
    expect(toApplicationError(new Error('Quota exceeded')).code).toBe('rate_limited');
  });

  it('wraps anything else as an unknown error', () => {
    expect(toApplicationError('weird')).toEqual({
      code: 'unknown_error',
      message: 'Processing failed',
      details: 'weird',
      retryable: false,
    });
  });
});

describe('formatError', () => {
  it('renders details and the suggestion', () => {
    expect(formatError(textCleaningError('boom'))).toBe(
      'Text cleaning failed (boom). The language model may be temporarily unavailable. Try again in a few minutes.',
    );
  });

  it('builds the pipeline error message from the details', () => {
    expect(new PipelineError(textCleaningError('boom')).message).toBe('Text cleaning failed: boom');
  });
});
