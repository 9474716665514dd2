// src/services/batchService.ts
// Orquestador del lote: valida → (firma) → sandbox → tabla → pool de filas → resumen → ZIP
// Errores de lote se lanzan antes de procesar filas; errores de fila se devuelven como outcome

import { copyFile, mkdir, mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { setTimeout as sleep } from 'timers/promises';
import pLimit from 'p-limit';
import type { Logger } from 'pino';
import type { BatchConfig } from '../config/env';
import { REQUIRED_COLUMNS, type BatchSummary, type RawRow, type RowOutcome, type RowResult } from '../types/index';
import { createZipArchive } from '../utils/archive';
import { InputFileError, SchemaError, SignatureError } from '../utils/errorHandler';
import { normalizeRecord } from '../utils/normalizer';
import { verifyFileSignature } from '../utils/signature';
import { readTable } from '../utils/tableReader';
import { type AuditSink, buildAuditEntry } from './auditSink';
import { validateInputFile } from './inputValidator';
import { writeQrImage } from './qrWriter';

export interface BatchContext {
  config: BatchConfig;
  logger: Logger;
  auditSink: AuditSink;
}

export interface RunBatchOptions {
  /** HMAC-SHA256 hex del archivo; obligatorio si requireSignature está activo */
  signature?: string;
}

/**
 * Unidad de trabajo de una fila: normaliza, escribe el QR y arma la línea de auditoría.
 * No lanza nunca; un fallo inesperado queda como outcome `error`.
 */
export async function processRow(
  rowIndex: number,
  row: RawRow,
  outputRoot: string,
  options: { maxQrContentLength: number },
): Promise<RowResult> {
  let identityDigits = '';
  let familyCardDigits = '';
  let outcome: RowOutcome;

  try {
    const normalized = normalizeRecord(row, options);
    identityDigits = normalized.identityDigits;
    familyCardDigits = normalized.familyCardDigits;
    outcome = normalized.ok ? await writeQrImage(normalized.record, outputRoot) : normalized.outcome;
  } catch (err) {
    outcome = { status: 'error', message: err instanceof Error ? err.message : String(err) };
  }

  return { outcome, audit: buildAuditEntry(rowIndex, identityDigits, familyCardDigits, outcome) };
}

export function summarizeOutcomes(outcomes: RowOutcome[], zipFilename: string): BatchSummary {
  const summary: BatchSummary = { generated: 0, skipped: 0, invalid: 0, errors: [], zipFilename };

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'created':
        summary.generated++;
        break;
      case 'skipped-existing':
        summary.skipped++;
        break;
      case 'invalid':
        summary.invalid++;
        break;
      case 'blocked':
      case 'error':
        summary.errors.push(outcome.message);
        break;
    }
  }

  return summary;
}

export function findMissingColumns(columns: string[]): string[] {
  const present = new Set(columns);
  return REQUIRED_COLUMNS.filter(column => !present.has(column));
}

async function assertSignature(inputPath: string, config: BatchConfig, signature: string | undefined): Promise<void> {
  if (!config.requireSignature) return;

  if (!signature) {
    throw new SignatureError('Se requiere firma del archivo y no fue enviada');
  }
  if (!config.signatureSecret) {
    throw new SignatureError('El servidor no tiene configurado SIGNATURE_SECRET');
  }
  if (!(await verifyFileSignature(inputPath, signature, config.signatureSecret))) {
    throw new SignatureError('Firma del archivo inválida');
  }
}

/**
 * Corre un lote completo sobre `inputPath` escribiendo en `outputRoot`.
 * El ZIP `<outputRoot>.zip` se arma solo después de que terminaron todas las filas.
 */
export async function runBatch(
  inputPath: string,
  outputRoot: string,
  context: BatchContext,
  options: RunBatchOptions = {},
): Promise<BatchSummary> {
  const { config, logger, auditSink } = context;

  if (outputRoot.split(/[\\/]/).includes('..')) {
    throw new InputFileError('InvalidPath', 'Ruta de salida inválida');
  }

  const { format, sizeBytes } = await validateInputFile(inputPath, { maxFileSizeBytes: config.maxFileSizeBytes });
  await assertSignature(inputPath, config, options.signature);

  logger.info({ inputPath, format, sizeBytes, outputRoot }, '📥 Iniciando lote de QR');

  // Se procesa una copia privada del archivo, nunca el original subido
  const sandbox = await mkdtemp(path.join(os.tmpdir(), 'generate_sandbox_'));
  try {
    const sandboxFile = path.join(sandbox, `input${path.extname(inputPath).toLowerCase()}`);
    await copyFile(inputPath, sandboxFile);

    const table = await readTable(sandboxFile);
    const missing = findMissingColumns(table.columns);
    if (missing.length > 0) {
      logger.warn({ missing, columns: table.columns }, '⚠️ Faltan columnas obligatorias');
      throw new SchemaError(missing);
    }

    const root = path.resolve(outputRoot);
    await mkdir(root, { recursive: true });

    const limit = pLimit(config.maxWorkers);
    const outcomes = await Promise.all(
      table.rows.map((row, rowIndex) =>
        limit(async () => {
          if (config.rateLimitDelayMs > 0) {
            await sleep(config.rateLimitDelayMs);
          }
          const { outcome, audit } = await processRow(rowIndex, row, root, config);
          await auditSink.append(audit);

          if (outcome.status === 'error' || outcome.status === 'blocked') {
            logger.error({ rowIndex, status: outcome.status, message: outcome.message }, '❌ Fila con error');
          } else {
            logger.debug({ rowIndex, status: outcome.status }, 'Fila procesada');
          }
          return outcome;
        }),
      ),
    );

    const zipFilename = `${path.basename(root)}.zip`;
    const entries = await createZipArchive(root, path.join(path.dirname(root), zipFilename));
    const summary = summarizeOutcomes(outcomes, zipFilename);

    logger.info({ ...summary, errors: summary.errors.length, rows: table.rows.length, entries }, '🎉 Lote completado');
    await auditSink.append({
      ts: new Date().toISOString(),
      action: 'finished',
      result: { ...summary, errors: summary.errors.length },
    });

    return summary;
  } finally {
    await rm(sandbox, { recursive: true, force: true });
  }
}
