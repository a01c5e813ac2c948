/**
 * Types for the extraction hand-off.
 */

import type { ExtractionSnapshot } from '../model/types';

/**
 * Document bytes handed to an analysis service.
 */
export type ExtractionSource = ArrayBuffer | Uint8Array;

/**
 * External document-analysis service. Produces raw items for every page.
 */
export interface DocumentAnalysisService {
  analyze(source: ExtractionSource): Promise<ExtractionSnapshot>;
}

/**
 * Error codes for extraction failures.
 */
export enum ExtractionErrorCode {
  INVALID_SOURCE = 'INVALID_SOURCE',
  PASSWORD_REQUIRED = 'PASSWORD_REQUIRED',
  INCORRECT_PASSWORD = 'INCORRECT_PASSWORD',
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  INVALID_RESULT = 'INVALID_RESULT',
  BUSY = 'BUSY'
}

/**
 * Error class for extraction failures.
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: ExtractionErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/**
 * Wrap anything thrown by a service in an ExtractionError.
 */
export function toExtractionError(error: unknown): ExtractionError {
  if (error instanceof ExtractionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExtractionError(
    `Extraction failed: ${message}`,
    ExtractionErrorCode.EXTRACTION_FAILED,
    error
  );
}

/**
 * A finished extraction, successful or not.
 */
export type SettledExtraction =
  | { ok: true; requestId: number; snapshot: ExtractionSnapshot }
  | { ok: false; requestId: number; error: ExtractionError };
