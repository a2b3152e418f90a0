/**
 * Session-fatal errors. Everything recoverable is modelled as a result value
 * by the stage that produces it.
 */

import type { CaptureAttempt } from './0_types.js';

export type LassoErrorCode =
  | 'CAPTURE_FAILED'
  | 'IMAGE_DECODE_FAILED'
  | 'SESSION_CANCELLED'
  | 'OCR_TIMEOUT'
  | 'OCR_LANGUAGE_MISSING';

export class LassoError extends Error {
  readonly code: LassoErrorCode;

  constructor(code: LassoErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class CaptureFailedError extends LassoError {
  readonly attempts: CaptureAttempt[];

  constructor(attempts: CaptureAttempt[]) {
    const tried = attempts.map((a) => a.toolId).join(', ') || 'none';
    super('CAPTURE_FAILED', `No screenshot tool produced an image (tried: ${tried})`);
    this.attempts = attempts;
  }
}

export class ImageDecodeError extends LassoError {
  constructor(message: string, options?: ErrorOptions) {
    super('IMAGE_DECODE_FAILED', message, options);
  }
}

/** Raised at a stage boundary when the session's abort signal has fired */
export class SessionCancelledError extends LassoError {
  constructor(stage: string) {
    super('SESSION_CANCELLED', `Session cancelled before ${stage}`);
  }
}

export class OcrTimeoutError extends LassoError {
  constructor(timeoutMs: number) {
    super('OCR_TIMEOUT', `OCR did not finish within ${timeoutMs}ms`);
  }
}

export class OcrLanguageMissingError extends LassoError {
  readonly language: string;

  constructor(language: string, packageName: string, options?: ErrorOptions) {
    super(
      'OCR_LANGUAGE_MISSING',
      `No OCR data for language "${language}"; install it with: npm install ${packageName}`,
      options
    );
    this.language = language;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
