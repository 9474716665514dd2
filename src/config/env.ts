// src/config/env.ts
// Configuración explícita: se parsea una sola vez al arrancar y se pasa por referencia
// Validación runtime con Zod - sin constantes globales mutables

import { z } from 'zod';
import { ConfigError } from '../utils/errorHandler';

const flag = z
  .enum(['0', '1', 'true', 'false'])
  .default('0')
  .transform(value => value === '1' || value === 'true');

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  PORT: z.coerce.number().int().positive().default(3001),
  UPLOAD_FOLDER: z.string().min(1).default('uploads'),
  OUTPUT_BASE: z.string().min(1).default('qr_output'),
  MAX_WORKERS: z.coerce.number().int().min(1).max(64).default(6),
  MAX_FILE_SIZE_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  REQUIRE_SIGNATURE: flag,
  SIGNATURE_SECRET: z.string().default(''),
  RATE_LIMIT_DELAY_MS: z.coerce.number().min(0).default(10),
  AUDIT_LOG_PATH: z.string().min(1).default('/tmp/generate_audit.jsonl'),
  APP_LOG_PATH: z.string().min(1).default('/tmp/generate.log'),
  MAX_QR_CONTENT_LENGTH: z.coerce.number().int().positive().default(500),
});

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  logLevel: LogLevel;
  port: number;
  uploadFolder: string;
  outputBase: string;
  maxWorkers: number;
  maxFileSizeBytes: number;
  requireSignature: boolean;
  signatureSecret: string;
  rateLimitDelayMs: number;
  auditLogPath: string;
  appLogPath: string;
  maxQrContentLength: number;
}

/** Subconjunto que necesita el orquestador de lotes */
export type BatchConfig = Pick<
  AppConfig,
  'maxWorkers' | 'maxFileSizeBytes' | 'requireSignature' | 'signatureSecret' | 'rateLimitDelayMs' | 'maxQrContentLength'
>;

function defaultLogLevel(nodeEnv: AppConfig['nodeEnv']): LogLevel {
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Construye la configuración a partir del entorno (o de un objeto equivalente en tests).
 * Lanza ConfigError con todas las variables inválidas juntas.
 */
export function loadConfig(input: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuración inválida - ${issues.join('; ')}`, issues);
  }

  const env = parsed.data;
  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL ?? defaultLogLevel(env.NODE_ENV),
    port: env.PORT,
    uploadFolder: env.UPLOAD_FOLDER,
    outputBase: env.OUTPUT_BASE,
    maxWorkers: env.MAX_WORKERS,
    maxFileSizeBytes: env.MAX_FILE_SIZE_BYTES,
    requireSignature: env.REQUIRE_SIGNATURE,
    signatureSecret: env.SIGNATURE_SECRET,
    rateLimitDelayMs: env.RATE_LIMIT_DELAY_MS,
    auditLogPath: env.AUDIT_LOG_PATH,
    appLogPath: env.APP_LOG_PATH,
    maxQrContentLength: env.MAX_QR_CONTENT_LENGTH,
  };
}
