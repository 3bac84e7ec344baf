import type { QueueStats } from '@pagemill/model';
import type { WorkQueue } from '@pagemill/work-queue';

import type { OutputTotals, OutputWriter } from './output/output-writer';

export interface WorkspaceStats {
  queue: QueueStats;
  output: OutputTotals;
}

export async function collectWorkspaceStats(
  queue: Pick<WorkQueue, 'stats'>,
  writer: Pick<OutputWriter, 'readTotals'>,
): Promise<WorkspaceStats> {
  return { queue: await queue.stats(), output: await writer.readTotals() };
}

/**
 * Human-readable report lines
 */
export function formatWorkspaceStats({ queue, output }: WorkspaceStats): string[] {
  const fallbackRate =
    output.pages > 0 ? (output.fallbackPages / output.pages) * 100 : 0;
  const percentDone = queue.total > 0 ? (queue.done / queue.total) * 100 : 0;

  return [
    `Work items: ${queue.total} total, ${queue.done} done (${percentDone.toFixed(1)}%), ${queue.leased} leased, ${queue.available} available`,
    `Output files: ${output.files}`,
    `Documents: ${output.documents}`,
    `Pages: ${output.pages} (${output.fallbackPages} fallback, ${fallbackRate.toFixed(2)}%)`,
    `Tokens: ${output.inputTokens} input, ${output.outputTokens} output`,
  ];
}
