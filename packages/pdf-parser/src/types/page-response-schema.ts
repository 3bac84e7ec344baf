import type { RotationCorrection } from '@pagemill/model';

import { z } from 'zod/v4';

/**
 * JSON object the model is asked to return for each page. Unknown keys
 * are rejected so a drifting output format fails loudly.
 */
export const pageResponseSchema = z.strictObject({
  primary_language: z.string().nullable(),
  is_rotation_valid: z.boolean(),
  rotation_correction: z.union([
    z.literal(0),
    z.literal(90),
    z.literal(180),
    z.literal(270),
  ]),
  is_table: z.boolean(),
  is_diagram: z.boolean(),
  natural_text: z.string().nullable(),
});

/** Parsed model response for one page */
export interface PageResponse {
  primaryLanguage: string | null;
  isRotationValid: boolean;
  rotationCorrection: RotationCorrection;
  isTable: boolean;
  isDiagram: boolean;
  naturalText: string | null;
}

export type PageResponseParseFailure = 'invalid_json' | 'schema_mismatch';

export type PageResponseParseResult =
  | { success: true; response: PageResponse }
  | { success: false; reason: PageResponseParseFailure; message: string };

const CODE_FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/**
 * Decode raw model output into a PageResponse. Never throws.
 */
export function parsePageResponse(raw: string): PageResponseParseResult {
  const trimmed = raw.trim();
  const body = CODE_FENCE.exec(trimmed)?.[1] ?? trimmed;

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    return {
      success: false,
      reason: 'invalid_json',
      message: error instanceof Error ? error.message : String(error),
    };
  }

  const parsed = pageResponseSchema.safeParse(json);
  if (!parsed.success) {
    return {
      success: false,
      reason: 'schema_mismatch',
      message: parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
    };
  }

  const data = parsed.data;
  return {
    success: true,
    response: {
      primaryLanguage: data.primary_language,
      isRotationValid: data.is_rotation_valid,
      rotationCorrection: data.rotation_correction,
      isTable: data.is_table,
      isDiagram: data.is_diagram,
      naturalText: data.natural_text,
    },
  };
}
