import { describe, expect, test } from 'vitest';

import { parsePageResponse } from './page-response-schema';

const VALID = {
  primary_language: 'en',
  is_rotation_valid: true,
  rotation_correction: 0,
  is_table: false,
  is_diagram: true,
  natural_text: 'Figure 2. Site plan',
};

describe('parsePageResponse', () => {
  test('maps a valid response to camelCase fields', () => {
    expect(parsePageResponse(JSON.stringify(VALID))).toEqual({
      success: true,
      response: {
        primaryLanguage: 'en',
        isRotationValid: true,
        rotationCorrection: 0,
        isTable: false,
        isDiagram: true,
        naturalText: 'Figure 2. Site plan',
      },
    });
  });

  test('accepts null language and text', () => {
    const result = parsePageResponse(
      JSON.stringify({ ...VALID, primary_language: null, natural_text: null }),
    );

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.response.primaryLanguage).toBeNull();
      expect(result.response.naturalText).toBeNull();
    }
  });

  test('unwraps a fenced JSON block', () => {
    const raw = `\`\`\`json\n${JSON.stringify(VALID)}\n\`\`\`\n`;

    expect(parsePageResponse(raw).success).toBe(true);
  });

  test('reports text that is not JSON', () => {
    const result = parsePageResponse('Figure 2. Site plan');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason).toBe('invalid_json');
    }
  });

  test('reports truncated JSON', () => {
    const raw = JSON.stringify(VALID).slice(0, 40);

    const result = parsePageResponse(raw);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason).toBe('invalid_json');
    }
  });

  test('rejects a rotation outside the four right angles', () => {
    const result = parsePageResponse(
      JSON.stringify({ ...VALID, rotation_correction: 45 }),
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason).toBe('schema_mismatch');
      expect(result.message).toContain('rotation_correction');
    }
  });

  test('rejects a missing field', () => {
    const { is_table: _omitted, ...partial } = VALID;

    const result = parsePageResponse(JSON.stringify(partial));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason).toBe('schema_mismatch');
      expect(result.message).toContain('is_table');
    }
  });

  test('rejects unknown fields', () => {
    const result = parsePageResponse(
      JSON.stringify({ ...VALID, confidence: 0.9 }),
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason).toBe('schema_mismatch');
    }
  });

  test('rejects a JSON value that is not an object', () => {
    const result = parsePageResponse('"just a string"');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason).toBe('schema_mismatch');
      expect(result.message).toMatch(/^\(root\): /);
    }
  });
});
