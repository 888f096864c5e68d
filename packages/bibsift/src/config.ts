import { z } from 'zod';
import { EXPORT_FORMATS, type ExportFormat } from './export/types.js';
import { BACKEND_NAMES, type BackendName } from './references/backends/types.js';
import { DEFAULT_QUALITY_INDICATORS } from './references/text-quality.js';
import { getPackageVersion } from './version.js';

const numberFromEnv = (defaultValue: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(defaultValue);

const ratioFromEnv = (defaultValue: number) => z.coerce.number().min(0).max(1).default(defaultValue);

const splitCsv = (value?: string): string[] => {
  if (!value) {
    return [];
  }

  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
};

const csvEnumFromEnv = <T extends string>(options: readonly [T, ...T[]], defaultValue: T[]) =>
  z
    .string()
    .optional()
    .transform((value) => splitCsv(value).map((item) => item.toLowerCase()))
    .pipe(z.array(z.enum(options)))
    .transform((items) => (items.length > 0 ? [...new Set(items)] : defaultValue));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  BIBSIFT_SERVER_NAME: z.string().default('bibsift'),
  BIBSIFT_SERVER_VERSION: z.string().optional(),
  BIBSIFT_BACKENDS: csvEnumFromEnv(BACKEND_NAMES, [...BACKEND_NAMES]),
  BIBSIFT_GROBID_URL: z.string().url().optional(),
  BIBSIFT_OCR_SIDECAR_URL: z.string().url().optional(),
  BIBSIFT_BACKEND_TIMEOUT_MS: numberFromEnv(60000, 1000, 600000),
  BIBSIFT_MAX_FILE_SIZE_MB: numberFromEnv(50, 1, 2048),
  BIBSIFT_MIN_REFERENCE_LENGTH: numberFromEnv(20, 1, 1000),
  BIBSIFT_MIN_CONFIDENCE: ratioFromEnv(0.3),
  BIBSIFT_QUALITY_INDICATORS: z.string().optional(),
  BIBSIFT_OUTPUT_FORMATS: csvEnumFromEnv(EXPORT_FORMATS, ['json', 'csv', 'md', 'txt']),
  BIBSIFT_OUTPUT_DIR: z.string().min(1).default('extracted-references'),
  BIBSIFT_BATCH_CONCURRENCY: numberFromEnv(1, 1, 32)
});

type ParsedEnv = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: ParsedEnv['NODE_ENV'];
  logLevel: ParsedEnv['LOG_LEVEL'];
  serverName: string;
  serverVersion: string;
  backends: BackendName[];
  grobidUrl?: string;
  ocrSidecarUrl?: string;
  backendTimeoutMs: number;
  maxFileSizeMb: number;
  minReferenceLength: number;
  minConfidence: number;
  qualityIndicators: string[];
  outputFormats: ExportFormat[];
  outputDir: string;
  batchConcurrency: number;
}

export const parseConfig = (overrides?: Partial<Record<keyof ParsedEnv, string | number>>): AppConfig => {
  const mergedEnv: Record<string, string | number | undefined> = {
    ...process.env,
    ...(overrides ?? {})
  };

  const env = envSchema.parse(mergedEnv);
  const indicators = splitCsv(env.BIBSIFT_QUALITY_INDICATORS).map((item) => item.toLowerCase());

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    serverName: env.BIBSIFT_SERVER_NAME,
    serverVersion: env.BIBSIFT_SERVER_VERSION ?? getPackageVersion(),
    backends: env.BIBSIFT_BACKENDS,
    grobidUrl: env.BIBSIFT_GROBID_URL,
    ocrSidecarUrl: env.BIBSIFT_OCR_SIDECAR_URL,
    backendTimeoutMs: env.BIBSIFT_BACKEND_TIMEOUT_MS,
    maxFileSizeMb: env.BIBSIFT_MAX_FILE_SIZE_MB,
    minReferenceLength: env.BIBSIFT_MIN_REFERENCE_LENGTH,
    minConfidence: env.BIBSIFT_MIN_CONFIDENCE,
    qualityIndicators: indicators.length > 0 ? indicators : [...DEFAULT_QUALITY_INDICATORS],
    outputFormats: env.BIBSIFT_OUTPUT_FORMATS,
    outputDir: env.BIBSIFT_OUTPUT_DIR,
    batchConcurrency: env.BIBSIFT_BATCH_CONCURRENCY
  };
};
