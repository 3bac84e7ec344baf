import type { LoggerMethods } from '@pagemill/logger';
import type { OcrDocument } from '@pagemill/model';
import type { BlobStore } from '@pagemill/storage';

import { toOutputRecord } from '@pagemill/document-processor';
import { isS3Url, parseS3Url } from '@pagemill/storage';
import { uniqBy } from 'es-toolkit';
import { z } from 'zod/v4';

const RESULTS_PREFIX = 'results/';
const MARKDOWN_PREFIX = 'markdown/';

const recordSummarySchema = z.object({
  metadata: z.object({
    'pdf-total-pages': z.number(),
    'total-input-tokens': z.number(),
    'total-output-tokens': z.number(),
    'total-fallback-pages': z.number(),
  }),
});

/**
 * Totals over every written record
 */
export interface OutputTotals {
  files: number;
  documents: number;
  pages: number;
  fallbackPages: number;
  inputTokens: number;
  outputTokens: number;
}

export interface OutputWriterOptions {
  /** Also write `markdown/<source path>.md` per document (default: false) */
  markdown?: boolean;
  /** Clock for the records' `added` date (default: current time) */
  now?: () => Date;
}

/** Results file for one work item */
export function resultsKey(workItemId: string): string {
  return `${RESULTS_PREFIX}output_${workItemId}.jsonl`;
}

/**
 * Markdown key for a source ref: scheme and bucket removed, relative
 * segments dropped, extension replaced with `.md`.
 *
 * `s3://bucket/scans/a.pdf` → `scans/a.md`
 */
export function markdownKey(ref: string): string {
  const path = isS3Url(ref) ? parseS3Url(ref).key : ref;
  const segments = path
    .split(/[\\/]+/)
    .filter((segment) => segment !== '' && segment !== '.' && segment !== '..');
  const relative = segments.join('/') || 'document';
  return `${MARKDOWN_PREFIX}${relative.replace(/\.[^./]+$/, '')}.md`;
}

/**
 * OutputWriter
 *
 * Writes one JSON-lines file per work item into the workspace. Each
 * write replaces the whole file, so re-processing a batch leaves exactly
 * one copy of its records.
 */
export class OutputWriter {
  private readonly markdown: boolean;

  constructor(
    private readonly store: BlobStore,
    private readonly logger: LoggerMethods,
    private readonly options: OutputWriterOptions = {},
  ) {
    this.markdown = options.markdown ?? false;
  }

  /**
   * Write the documents of one work item.
   *
   * @returns Number of records written after removing duplicates
   */
  async writeBatch(
    workItemId: string,
    documents: readonly OcrDocument[],
  ): Promise<number> {
    const unique = uniqBy(
      documents,
      (document) => `${document.id}\n${document.sourceRef}`,
    );
    const body = unique
      .map((document) =>
        JSON.stringify(toOutputRecord(document, { now: this.options.now })),
      )
      .map((line) => `${line}\n`)
      .join('');

    const key = resultsKey(workItemId);
    await this.store.put(key, body);

    if (this.markdown) {
      for (const document of unique) {
        await this.store.put(markdownKey(document.sourceRef), document.text);
      }
    }

    this.logger.debug(
      `[OutputWriter] Wrote ${unique.length} records to ${key}`,
    );
    return unique.length;
  }

  /**
   * Sum the metadata of every record in the workspace. Lines that are not
   * output records are skipped with a warning.
   */
  async readTotals(): Promise<OutputTotals> {
    const totals: OutputTotals = {
      files: 0,
      documents: 0,
      pages: 0,
      fallbackPages: 0,
      inputTokens: 0,
      outputTokens: 0,
    };

    const keys = (await this.store.list(RESULTS_PREFIX)).filter((key) =>
      key.endsWith('.jsonl'),
    );
    for (const key of keys) {
      const blob = await this.store.get(key);
      if (!blob) continue;
      totals.files++;

      const lines = blob.body.toString('utf8').split('\n');
      lines.forEach((line, index) => {
        if (line.trim() === '') return;
        const record = this.parseSummary(line);
        if (!record) {
          this.logger.warn(
            `[OutputWriter] ${key}:${index + 1} is not an output record`,
          );
          return;
        }
        const { metadata } = record;
        totals.documents++;
        totals.pages += metadata['pdf-total-pages'];
        totals.fallbackPages += metadata['total-fallback-pages'];
        totals.inputTokens += metadata['total-input-tokens'];
        totals.outputTokens += metadata['total-output-tokens'];
      });
    }

    return totals;
  }

  private parseSummary(
    line: string,
  ): z.infer<typeof recordSummarySchema> | null {
    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch {
      return null;
    }
    const parsed = recordSummarySchema.safeParse(value);
    return parsed.success ? parsed.data : null;
  }
}
