import type { LoggerMethods } from '@ledgerlens/logger';

import { z } from 'zod';

import { ConfigError } from '../errors/ingestion-error';

const ratio = z.number().min(0).max(1);
const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

/**
 * Ingestion settings with their defaults
 */
export const IngestionConfigSchema = z
  .object({
    /** Folder scanned by `ingestFolder` */
    pdfDir: z.string().min(1).default('./data/pdfs'),
    /** Root directory for figure crops */
    resourcesDir: z.string().min(1).default('./data/resources'),
    /** Level of the logger an IngestionPipeline builds when given none */
    logLevel: z
      .enum(['debug', 'info', 'warn', 'error', 'silent'])
      .default('info'),

    /** Raster resolution; crops scale page points by dpi / 72 */
    dpi: positiveInt.default(100),
    /** 0 reads every page */
    maxPages: nonNegativeInt.default(0),

    ocrConfidenceThreshold: ratio.default(0.4),
    chartOcrConfidenceThreshold: ratio.default(0.3),
    layoutConfidenceThreshold: ratio.default(0.5),

    tableMinRows: positiveInt.default(2),
    tableMinCols: positiveInt.default(2),
    /** Pixels between OCR box centres that still share a row */
    ocrRowTolerance: z.number().positive().default(12),

    layoutFigureMinAreaRatio: ratio.default(0.01),
    figureMinAreaRatio: ratio.default(0.02),
    /** Candidates overlapping by more than this IoU are duplicates */
    figureIouThreshold: ratio.default(0.3),
    drawingMinPaths: positiveInt.default(5),
    /** Points between drawing paths that still merge */
    drawingMergeGap: z.number().nonnegative().default(10),
    minFigureCropPx: nonNegativeInt.default(20),

    textChunkSize: positiveInt.default(450),
    textChunkOverlap: nonNegativeInt.default(50),
    includePageSummary: z.boolean().default(true),
    pageSummaryMaxChars: positiveInt.default(8000),

    minChunkLength: nonNegativeInt.default(30),
    maxChunkLength: positiveInt.default(8000),
    minAlnumRatio: ratio.default(0.3),
    minUniqueWordRatio: ratio.default(0.5),
    qualityTableMinRows: nonNegativeInt.default(2),
    minFigureTextLength: nonNegativeInt.default(10),

    /** Time limit for each OCR, classifier, interpreter or detector call */
    collaboratorTimeoutMs: positiveInt.default(30_000),
    storeMaxAttempts: positiveInt.default(3),
    storeRetryBaseDelayMs: nonNegativeInt.default(200),

    /** Documents processed in parallel by `ingestFolder` */
    concurrency: positiveInt.default(2),
    /** Texts per request of `AiEmbedder.fromConfig` */
    embeddingBatchSize: positiveInt.default(64),
  })
  .refine((config) => config.textChunkOverlap < config.textChunkSize, {
    message: 'textChunkOverlap must be smaller than textChunkSize',
    path: ['textChunkOverlap'],
  })
  .refine((config) => config.minChunkLength <= config.maxChunkLength, {
    message: 'minChunkLength must not exceed maxChunkLength',
    path: ['minChunkLength'],
  });

export type IngestionConfig = z.infer<typeof IngestionConfigSchema>;

export type IngestionConfigInput = z.input<typeof IngestionConfigSchema>;

export const ENV_PREFIX = 'INGEST_';

/**
 * Environment variable for a config key, e.g. `textChunkSize` ->
 * `INGEST_TEXT_CHUNK_SIZE`.
 */
export function toEnvName(key: string): string {
  return `${ENV_PREFIX}${key.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase()}`;
}

function coerce(
  raw: string,
  fallback: string | number | boolean,
  envName: string,
): string | number | boolean {
  const value = raw.trim();
  if (typeof fallback === 'number') {
    const parsed = Number(value);
    if (value === '' || Number.isNaN(parsed)) {
      throw new ConfigError(`${envName} must be a number, got "${raw}"`);
    }
    return parsed;
  }
  if (typeof fallback === 'boolean') {
    switch (value.toLowerCase()) {
      case 'true':
      case '1':
      case 'yes':
        return true;
      case 'false':
      case '0':
      case 'no':
        return false;
      default:
        throw new ConfigError(`${envName} must be a boolean, got "${raw}"`);
    }
  }
  return value;
}

/**
 * Validate a configuration and fill in defaults.
 *
 * @throws {ConfigError} when a value is out of range
 */
export function resolveIngestionConfig(
  input: unknown = {},
  logger?: LoggerMethods,
): IngestionConfig {
  const result = IngestionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      `Invalid ingestion configuration:\n${z.prettifyError(result.error)}`,
      { cause: result.error },
    );
  }

  const config = result.data;
  if (logger) {
    checkIngestionConfig(config, logger);
  }
  return config;
}

/**
 * Warn about valid but lossy combinations of settings.
 */
export function checkIngestionConfig(
  config: IngestionConfig,
  logger: LoggerMethods,
): void {
  if (config.textChunkOverlap < config.minChunkLength) {
    logger.warn(
      `[IngestionConfig] textChunkOverlap (${config.textChunkOverlap}) is below minChunkLength (${config.minChunkLength}); short window tails may be dropped`,
    );
  }
}

/**
 * Read `INGEST_*` variables over the defaults, then apply `overrides`.
 *
 * Values are coerced by the type of the key's default.
 *
 * @example
 * ```typescript
 * const config = loadIngestionConfig(process.env, { maxPages: 10 });
 * ```
 */
export function loadIngestionConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<IngestionConfigInput> = {},
  logger?: LoggerMethods,
): IngestionConfig {
  const defaults = IngestionConfigSchema.parse({});
  const fromEnv: Record<string, string | number | boolean> = {};

  for (const [key, fallback] of Object.entries(defaults)) {
    const envName = toEnvName(key);
    const raw = env[envName];
    if (raw !== undefined) {
      fromEnv[key] = coerce(raw, fallback, envName);
    }
  }

  return resolveIngestionConfig({ ...fromEnv, ...overrides }, logger);
}
