/**
 * Clockwise rotation in degrees that makes a rendered page upright
 */
export type RotationCorrection = 0 | 90 | 180 | 270;

/**
 * Why a page ended as a fallback.
 *
 * - `validation`: every response failed structural checks
 * - `parse`: every response failed to decode as the expected JSON object
 * - `network`: transport retries exhausted
 * - `resource_exhausted`: backend kept rejecting requests as overloaded
 * - `backend_unavailable`: health probe ceiling exceeded
 * - `request`: backend rejected the request outright
 * - `render`: the page image could not be produced
 * - `cancelled`: shutdown interrupted the page
 */
export type PageErrorReason =
  | 'validation'
  | 'parse'
  | 'network'
  | 'resource_exhausted'
  | 'backend_unavailable'
  | 'request'
  | 'render'
  | 'cancelled';

/**
 * Final outcome for one page. Exactly one exists per page of an
 * assembled document.
 */
export interface PageResult {
  /** 1-based page number */
  pageNumber: number;
  text: string;
  /** True when the response passed validation */
  isValid: boolean;
  isRotationValid: boolean;
  rotationCorrection: RotationCorrection;
  primaryLanguage: string | null;
  isTable: boolean;
  isDiagram: boolean;
  /** Tokens summed over every attempt */
  inputTokens: number;
  outputTokens: number;
  /** Inference calls issued for this page */
  attempts: number;
  isFallback: boolean;
  errorReason: PageErrorReason | null;
}
