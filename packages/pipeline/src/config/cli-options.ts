import type { ParseArgsConfig } from 'node:util';

import type { PipelineConfigKey } from './pipeline-config';

import { parseArgs } from 'node:util';

import { ConfigurationError } from '../errors/configuration-error';
import { PIPELINE_CONFIG_KEYS } from './pipeline-config';

const BOOLEAN_KEYS: ReadonlySet<PipelineConfigKey> = new Set([
  'startServer',
  'acceptEmptyPages',
  'markdown',
  'stats',
]);

/** Keys taken from positionals or `--source` instead of their own flag */
const POSITIONAL_KEYS: ReadonlySet<PipelineConfigKey> = new Set([
  'workspace',
  'sources',
]);

export const CLI_USAGE = `Usage: pagemill <workspace> [options]

Workspace is a local directory or s3://bucket/prefix.

Options:
  --source <selector>        PDF/image file, directory, .txt list or s3:// prefix (repeatable)
  --endpoint <url>           Use a running inference endpoint
  --start-server             Launch the inference server (needs --model-path)
  --model <id>               Served model id (default: olmocr)
  --model-path <path>        Weights for --start-server
  --port <n>                 Port for --start-server (default: 30024)
  --workers <n>              Concurrent batches (default: 8)
  --pages-per-group <n>      Target pages per work item (default: 500)
  --max-page-attempts <n>    Inference attempts per page (default: 8)
  --max-batch-attempts <n>   Claims of a failing batch before it is dropped (default: 3)
  --fallback-text <mode>     text-layer | last-response | empty (default: text-layer)
  --markdown                 Also write markdown/<source>.md
  --stats                    Print queue and output totals, then exit
  --log-level <level>        debug | info | warn | error (default: info)
  -h, --help                 Show this help

Every option can also be set as PAGEMILL_<NAME>, e.g. PAGEMILL_MAX_PAGE_ERROR_RATE=0.01.`;

/**
 * `maxPageErrorRate` → `max-page-error-rate`
 */
export function toFlagName(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, '$1-$2').toLowerCase();
}

export interface CliOptions {
  flags: Partial<Record<PipelineConfigKey, unknown>>;
  help: boolean;
}

function parseOrThrow(
  argv: readonly string[],
  options: NonNullable<ParseArgsConfig['options']>,
) {
  try {
    return parseArgs({ args: [...argv], options, allowPositionals: true });
  } catch (error) {
    throw new ConfigurationError(
      error instanceof Error ? error.message : String(error),
      [],
      { cause: error },
    );
  }
}

/**
 * Parse command-line arguments into configuration flags. Values stay
 * strings; the configuration schema coerces them.
 *
 * @throws ConfigurationError for unknown options or extra arguments
 */
export function parseCliOptions(argv: readonly string[]): CliOptions {
  const options: NonNullable<ParseArgsConfig['options']> = {
    help: { type: 'boolean', short: 'h' },
    source: { type: 'string', multiple: true },
  };
  const flagKeys = PIPELINE_CONFIG_KEYS.filter((key) => !POSITIONAL_KEYS.has(key));
  for (const key of flagKeys) {
    options[toFlagName(key)] = {
      type: BOOLEAN_KEYS.has(key) ? 'boolean' : 'string',
    };
  }

  const { values, positionals } = parseOrThrow(argv, options);
  if (positionals.length > 1) {
    throw new ConfigurationError(
      `Unexpected arguments: ${positionals.slice(1).join(' ')}`,
    );
  }

  const flags: Partial<Record<PipelineConfigKey, unknown>> = {
    workspace: positionals[0],
    sources: values.source,
  };
  for (const key of flagKeys) {
    flags[key] = values[toFlagName(key)];
  }

  return { flags, help: values.help === true };
}
