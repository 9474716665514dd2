// src/services/auditSink.ts
// Auditoría append-only (JSON Lines). Nunca guarda NIK ni KK en claro: solo su SHA-256.
// Es best-effort: un fallo de escritura se loguea y el lote sigue.

import { appendFile, mkdir } from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import type { AuditEntry, AuditRecord, RowOutcome } from '../types/index';
import { sha256Hex } from '../utils/signature';

export interface AuditSink {
  append(record: AuditRecord): Promise<void>;
}

function outcomeMessage(outcome: RowOutcome): string {
  switch (outcome.status) {
    case 'created':
      return 'written';
    case 'skipped-existing':
      return 'exists';
    case 'invalid':
    case 'blocked':
      return outcome.reason;
    case 'error':
      return outcome.message;
  }
}

function redact(message: string, secrets: string[]): string {
  return secrets.filter(Boolean).reduce((text, secret) => text.split(secret).join('[redacted]'), message);
}

/** Arma la línea de auditoría de una fila a partir de los dígitos ya extraídos */
export function buildAuditEntry(
  rowIndex: number,
  identityDigits: string,
  familyCardDigits: string,
  outcome: RowOutcome,
  now: Date = new Date(),
): AuditEntry {
  return {
    ts: now.toISOString(),
    rowIndex,
    identityHash: identityDigits ? sha256Hex(identityDigits) : null,
    familyCardHash: familyCardDigits ? sha256Hex(familyCardDigits) : null,
    action: outcome.status,
    message: redact(outcomeMessage(outcome), [identityDigits, familyCardDigits]),
  };
}

export function createFileAuditSink(filePath: string, logger: Logger): AuditSink {
  let ready: Promise<unknown> | undefined;

  return {
    async append(record) {
      try {
        ready ??= mkdir(path.dirname(filePath), { recursive: true });
        await ready;
        await appendFile(filePath, `${JSON.stringify(record)}\n`, 'utf8');
      } catch (err) {
        logger.error({ err, auditLogPath: filePath }, '🚨 No se pudo escribir el log de auditoría');
      }
    },
  };
}

/** Sink en memoria: útil para tests y para correr lotes sin archivo de auditoría */
export class MemoryAuditSink implements AuditSink {
  readonly records: AuditRecord[] = [];

  async append(record: AuditRecord): Promise<void> {
    this.records.push(record);
  }
}
