import type { PageResponse } from '../types/page-response-schema';

export type PageQualityIssueType =
  | 'empty_text'
  | 'rotation_inconsistent'
  | 'invalid_language'
  | 'placeholder_text'
  | 'meta_description'
  | 'repetitive_pattern'
  | 'repeated_lines';

/** A single quality issue found during validation */
export interface PageQualityIssue {
  type: PageQualityIssueType;
  /** Human-readable description of the issue */
  message: string;
}

/** Result of page response validation */
export interface PageValidationResult {
  /** Whether the response passes quality validation */
  isValid: boolean;
  /** List of quality issues found (empty if valid) */
  issues: PageQualityIssue[];
}

export interface PageValidationOptions {
  /**
   * Accept a response without text. Blank pages then succeed on the
   * first attempt instead of exhausting retries. (default: false)
   */
  acceptEmptyText?: boolean;
}

/** Known placeholder text patterns (case-insensitive) */
const PLACEHOLDER_PATTERNS: RegExp[] = [
  /lorem\s+ipsum/i,
  /dolor\s+sit\s+amet/i,
  /consectetur\s+adipiscing/i,
  /sed\s+do\s+eiusmod/i,
];

/** Patterns indicating the model described the image instead of transcribing it */
const META_DESCRIPTION_PATTERNS: RegExp[] = [
  /^the image (contains|shows)/i,
  /unable to (read|transcribe)/i,
  /resolution.*(too low|insufficient)/i,
  /cannot (read|make out|decipher)/i,
  /text is (not |un)(legible|readable)/i,
  /exact transcription is not possible/i,
];

/** BCP 47 primary subtag with optional subtags, e.g. `en`, `zh-Hant`, `pt_BR` */
const LANGUAGE_TAG = /^[a-z]{2,3}(?:[-_][A-Za-z0-9]{2,8})*$/;

/**
 * Minimum ratio of repetitive pattern characters to total content
 * for flagging as repetitive.
 */
const REPETITIVE_PATTERN_RATIO_THRESHOLD = 0.3;

/** Identical consecutive lines that mark a generation loop */
const REPEATED_LINE_LIMIT = 10;

/**
 * Stateless structural and quality checks on a parsed page response.
 *
 * Catches the common ways a transcription goes wrong without another
 * model call: missing text, contradictory rotation fields, placeholder
 * filler, descriptions of the image, and degenerate repetition.
 */
export class PageResponseValidator {
  static validate(
    response: PageResponse,
    options: PageValidationOptions = {},
  ): PageValidationResult {
    const issues: PageQualityIssue[] = [];
    const text = response.naturalText ?? '';

    if (text.trim().length === 0 && !options.acceptEmptyText) {
      issues.push({
        type: 'empty_text',
        message: 'Response contains no text',
      });
    }

    const rotationIssue = this.checkRotation(response);
    if (rotationIssue) issues.push(rotationIssue);

    if (
      response.primaryLanguage !== null &&
      !LANGUAGE_TAG.test(response.primaryLanguage)
    ) {
      issues.push({
        type: 'invalid_language',
        message: `"${response.primaryLanguage}" is not a language tag`,
      });
    }

    if (text.length > 0) {
      for (const detect of [
        this.detectPlaceholderText,
        this.detectMetaDescription,
        this.detectRepetitivePattern,
        this.detectRepeatedLines,
      ]) {
        const issue = detect(text);
        if (issue) issues.push(issue);
      }
    }

    return { isValid: issues.length === 0, issues };
  }

  private static checkRotation(
    response: PageResponse,
  ): PageQualityIssue | null {
    if (response.isRotationValid && response.rotationCorrection !== 0) {
      return {
        type: 'rotation_inconsistent',
        message: `Rotation marked valid but correction is ${response.rotationCorrection}`,
      };
    }
    if (!response.isRotationValid && response.rotationCorrection === 0) {
      return {
        type: 'rotation_inconsistent',
        message: 'Rotation marked invalid without a correction',
      };
    }
    return null;
  }

  private static detectPlaceholderText(text: string): PageQualityIssue | null {
    if (!PLACEHOLDER_PATTERNS.some((pattern) => pattern.test(text))) {
      return null;
    }
    return {
      type: 'placeholder_text',
      message: 'Detected placeholder text (e.g., Lorem ipsum)',
    };
  }

  private static detectMetaDescription(text: string): PageQualityIssue | null {
    if (!META_DESCRIPTION_PATTERNS.some((pattern) => pattern.test(text))) {
      return null;
    }
    return {
      type: 'meta_description',
      message: 'Detected a description of the image instead of a transcription',
    };
  }

  /**
   * Detect repetitive character patterns (e.g., `: : : : :` or `= = = = =`).
   * Flags when the same character repeats with spaces 5+ times and the
   * repetitive portion exceeds 30% of total content.
   */
  private static detectRepetitivePattern(
    text: string,
  ): PageQualityIssue | null {
    const repetitiveRegex = /(\S)(\s+\1){4,}/g;
    let totalRepetitiveLength = 0;

    let match: RegExpExecArray | null;
    while ((match = repetitiveRegex.exec(text)) !== null) {
      totalRepetitiveLength += match[0].length;
    }

    const ratio = totalRepetitiveLength / text.length;
    if (ratio < REPETITIVE_PATTERN_RATIO_THRESHOLD) return null;

    return {
      type: 'repetitive_pattern',
      message: `Detected repetitive character patterns (${(ratio * 100).toFixed(0)}% of content)`,
    };
  }

  private static detectRepeatedLines(text: string): PageQualityIssue | null {
    let previous = '';
    let run = 0;
    let longest = 0;

    for (const raw of text.split('\n')) {
      const line = raw.trim();
      if (line.length === 0) continue;
      run = line === previous ? run + 1 : 1;
      previous = line;
      longest = Math.max(longest, run);
    }

    if (longest < REPEATED_LINE_LIMIT) return null;

    return {
      type: 'repeated_lines',
      message: `Same line repeated ${longest} times in a row`,
    };
  }
}
