import { availableParallelism } from 'node:os';
import { z } from 'zod/v4';

import { ConfigurationError } from '../errors/configuration-error';

const ENV_PREFIX = 'PAGEMILL_';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off', ''];

/**
 * Boolean accepting the spellings environment variables use
 */
const flag = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  return value;
}, z.boolean());

const positiveInt = z.coerce.number().int().positive();

/**
 * Render subprocess limit: half the cores plus one, at most 32
 */
export function defaultRenderProcesses(): number {
  return Math.min(32, Math.floor(availableParallelism() / 2) + 1);
}

const pipelineConfigObject = z.object({
  /** Local directory or `s3://bucket/prefix` holding queue and results */
  workspace: z.string().min(1),
  /** Selectors to enqueue before processing */
  sources: z.array(z.string().min(1)).default([]),
  workers: positiveInt.default(8),
  /** Base URL of an already running backend */
  endpoint: z.url().optional(),
  /** Launch and supervise a backend process */
  startServer: flag.default(false),
  model: z.string().min(1).default('olmocr'),
  /** Weights for the self-managed backend */
  modelPath: z.string().min(1).optional(),
  port: positiveInt.max(65_535).default(30_024),
  pagesPerGroup: positiveInt.default(500),
  visibilityTimeoutMs: positiveInt.default(15 * 60_000),
  maxPageAttempts: positiveInt.default(8),
  maxBatchAttempts: positiveInt.default(3),
  maxPageErrorRate: z.coerce.number().min(0).max(1).default(0.004),
  maxInFlightRequests: positiveInt.default(64),
  pageConcurrency: positiveInt.default(16),
  maxRenderProcesses: positiveInt.max(32).default(defaultRenderProcesses),
  targetLongestImageDim: positiveInt.default(1024),
  targetAnchorTextLength: z.coerce.number().int().min(0).default(6000),
  modelMaxContext: positiveInt.default(8192),
  maxOutputTokens: positiveInt.default(4500),
  requestTimeoutMs: positiveInt.default(120_000),
  shutdownGracePeriodMs: z.coerce.number().int().min(0).default(30_000),
  fallbackText: z
    .enum(['text-layer', 'last-response', 'empty'])
    .default('text-layer'),
  /** Accept pages whose transcription is empty */
  acceptEmptyPages: flag.default(false),
  /** Mirror each document as markdown */
  markdown: flag.default(false),
  /** Print queue and output totals, then exit */
  stats: flag.default(false),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  apiKey: z.string().min(1).optional(),
  s3Region: z.string().min(1).optional(),
  s3Endpoint: z.url().optional(),
});

export const pipelineConfigSchema = pipelineConfigObject.superRefine(
  (config, ctx) => {
    if (config.stats) return;

    if (config.endpoint && config.startServer) {
      ctx.addIssue({
        code: 'custom',
        path: ['endpoint'],
        message: 'Set either endpoint or startServer, not both',
      });
    } else if (!config.endpoint && !config.startServer) {
      ctx.addIssue({
        code: 'custom',
        path: ['endpoint'],
        message: 'Set endpoint or startServer',
      });
    }

    if (config.startServer && !config.modelPath) {
      ctx.addIssue({
        code: 'custom',
        path: ['modelPath'],
        message: 'Required when startServer is set',
      });
    }
  },
);

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export type PipelineConfigKey = keyof z.input<typeof pipelineConfigObject>;

export const PIPELINE_CONFIG_KEYS = Object.keys(
  pipelineConfigObject.shape,
).filter((key): key is PipelineConfigKey => key in pipelineConfigObject.shape);

/**
 * `maxPageErrorRate` → `PAGEMILL_MAX_PAGE_ERROR_RATE`
 */
export function toEnvName(key: string): string {
  return ENV_PREFIX + key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase();
}

export interface LoadPipelineConfigOptions {
  /** Environment to read `PAGEMILL_*` variables from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Values from the command line; undefined entries are ignored */
  flags?: Partial<Record<PipelineConfigKey, unknown>>;
}

/**
 * Resolve the configuration from defaults, environment and flags, in
 * increasing precedence.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function loadPipelineConfig(
  options: LoadPipelineConfigOptions = {},
): PipelineConfig {
  const env = options.env ?? process.env;
  const raw: Record<string, unknown> = {};

  for (const key of PIPELINE_CONFIG_KEYS) {
    const value = env[toEnvName(key)];
    if (value === undefined) continue;
    raw[key] =
      key === 'sources'
        ? value
            .split(',')
            .map((entry) => entry.trim())
            .filter((entry) => entry.length > 0)
        : value;
  }

  for (const [key, value] of Object.entries(options.flags ?? {})) {
    if (value !== undefined) raw[key] = value;
  }

  const result = pipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      result.error.issues.map((issue) => {
        const path = issue.path.map(String).join('.') || '(root)';
        return `${path}: ${issue.message}`;
      }),
    );
  }
  return result.data;
}
