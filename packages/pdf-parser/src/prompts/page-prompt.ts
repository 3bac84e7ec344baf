/**
 * Instruction sent with every page image.
 *
 * The reply must be a single JSON object matching pageResponseSchema.
 */
export const PAGE_TRANSCRIPTION_PROMPT = `Transcribe the page image into plain text, reading it the way a person would.

Respond with one JSON object and nothing else. No markdown code fences, no commentary.

The object MUST have exactly these six keys:
- "primary_language": language tag of the main text (e.g. "en", "de", "zh-Hant"), or null if the page has no text
- "is_rotation_valid": true if the page is upright, false if it is rotated
- "rotation_correction": clockwise degrees that would make the page upright, one of 0, 90, 180, 270 (0 when is_rotation_valid is true)
- "is_table": true if the page is mostly a table
- "is_diagram": true if the page is mostly a chart, drawing or figure
- "natural_text": the page text in natural reading order, or null if the page has none

## Rules

- Preserve the original language and characters exactly.
- Follow natural reading order (top to bottom, left to right across columns).
- Write headings as Markdown headings and tables as Markdown tables.
- Write equations in LaTeX.
- Skip running headers, footers and page numbers only if they repeat on every page.
- You are transcribing, NOT describing. Never write phrases such as "The image contains..." or "The text is not legible". Give your best reading of every visible character.`;

/** Prompt block that carries the PDF text layer as a hint */
const TEXT_REFERENCE_PROMPT =
  `TEXT REFERENCE: The following text was extracted from the PDF text layer of this page. ` +
  `It may be accurate, partial, or garbled, and scanned pages usually have none.\n` +
  `- Use it to get spelling and numbers right where it matches the image.\n` +
  `- Ignore it where it disagrees with the image or makes no sense.`;

/**
 * Build the request prompt for one attempt. An empty hint sends the
 * instruction alone.
 */
export function buildPagePrompt(anchorText: string): string {
  if (anchorText.trim().length === 0) {
    return PAGE_TRANSCRIPTION_PROMPT;
  }
  return (
    TEXT_REFERENCE_PROMPT +
    '\n\n```\n' +
    anchorText +
    '\n```\n\n' +
    PAGE_TRANSCRIPTION_PROMPT
  );
}
