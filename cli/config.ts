import { z } from 'zod';
import { ConfigError } from './errors';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

// helper: "" en variables de entorno cuenta como no definida
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);

const optStr = z
  .string()
  .optional()
  .transform((v) => (v == null || v.trim() === '' ? undefined : v.trim()));

const envSchema = z.object({
  INVOICE_BUCKET_NAME: z
    .string({ required_error: 'INVOICE_BUCKET_NAME no está configurada.' })
    .trim()
    .min(1, 'INVOICE_BUCKET_NAME no puede estar vacía.'),
  AWS_REGION: optStr,
  TEXTRACT_POLL_INTERVAL_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().nonnegative().default(5000)
  ),
  INVOICE_CONCURRENCY: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(1)
  ),
  LOG_LEVEL: z.preprocess(
    (v) => (typeof v === 'string' ? blankToUndefined(v.trim().toLowerCase()) : v),
    z.enum(LOG_LEVELS).optional()
  ),
});

export interface ExtractorConfig {
  bucketName: string;
  region?: string;
  pollIntervalMs: number;
  concurrency: number;
  /** Sin definir se conserva el nivel con el que arrancó el logger. */
  logLevel?: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ExtractorConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Configuración inválida: ${details}`);
  }

  const { INVOICE_BUCKET_NAME, AWS_REGION, TEXTRACT_POLL_INTERVAL_MS, INVOICE_CONCURRENCY, LOG_LEVEL } = parsed.data;
  return {
    bucketName: INVOICE_BUCKET_NAME,
    region: AWS_REGION,
    pollIntervalMs: TEXTRACT_POLL_INTERVAL_MS,
    concurrency: INVOICE_CONCURRENCY,
    logLevel: LOG_LEVEL,
  };
}
