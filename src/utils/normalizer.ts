// src/utils/normalizer.ts
// Normalización de filas de la planilla → CanonicalRecord
// Los números de identidad se reducen a dígitos; nombres y regiones quedan seguros para el filesystem

import {
  DISTRICT_COLUMN,
  SUBDISTRICT_COLUMN,
  type CanonicalRecord,
  type RawRow,
  type RowOutcome,
} from '../types/index';

/** Largo de NIK y de número de KK. Constante de dominio: no relajar. */
export const ID_NUMBER_LENGTH = 16;

export const DEFAULT_DISTRICT = 'Kecamatan';
export const DEFAULT_SUBDISTRICT = 'Kelurahan';

/**
 * Elimina todo lo que no sea dígito.
 * @example cleanNumber('123-456-789-012-345X') // '123456789012345'
 */
export function cleanNumber(value: string): string {
  return value.replace(/\D/g, '');
}

export function isValidNumber(value: string, length: number = ID_NUMBER_LENGTH): boolean {
  return /^\d+$/.test(value) && value.length === length;
}

function trimUnderscores(value: string): string {
  return value.replace(/^_+|_+$/g, '');
}

/** Token seguro para nombre de archivo: letras, dígitos, punto, guion bajo y guion */
export function sanitizeFilename(name: string): string {
  return trimUnderscores(name.replace(/[^a-zA-Z0-9._-]/g, '_')) || 'file';
}

/** Token seguro para carpeta: sin puntos, así nunca puede formar '..' */
export function sanitizeFolder(name: string): string {
  return trimUnderscores(name.replace(/[^a-zA-Z0-9_-]/g, '_')) || 'folder';
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

function regionLabel(row: RawRow, column: string, fallback: string): string {
  const raw = (row[column] ?? '').trim();
  return sanitizeFolder(raw === '' ? fallback : raw);
}

export interface NormalizeOptions {
  maxQrContentLength: number;
}

export type NormalizeResult =
  | { ok: true; record: CanonicalRecord; identityDigits: string; familyCardDigits: string }
  | {
      ok: false;
      outcome: Extract<RowOutcome, { status: 'invalid' }>;
      identityDigits: string;
      familyCardDigits: string;
    };

/**
 * Valida y sanea una fila. Orden de chequeo: NIK, KK, largo del contenido QR.
 * Los dígitos extraídos se devuelven siempre para que la auditoría pueda hashearlos.
 */
export function normalizeRecord(row: RawRow, options: NormalizeOptions): NormalizeResult {
  const identityDigits = cleanNumber(row['NO IDENTITAS'] ?? '');
  const familyCardDigits = cleanNumber(row['NOMOR KK'] ?? '');
  const digits = { identityDigits, familyCardDigits };

  if (!isValidNumber(identityDigits)) {
    return {
      ok: false,
      outcome: { status: 'invalid', reason: 'invalid_nik', message: `NIK inválido: ${identityDigits}` },
      ...digits,
    };
  }

  if (!isValidNumber(familyCardDigits)) {
    return {
      ok: false,
      outcome: { status: 'invalid', reason: 'invalid_kk', message: `KK inválido: ${familyCardDigits}` },
      ...digits,
    };
  }

  const payload = escapeHtml((row['KODE QR'] ?? '').trim());
  const payloadLength = [...payload].length; // code points, no unidades UTF-16
  if (payloadLength > options.maxQrContentLength) {
    return {
      ok: false,
      outcome: {
        status: 'invalid',
        reason: 'qr_content_too_long',
        message: `Contenido QR demasiado largo (${payloadLength} > ${options.maxQrContentLength})`,
      },
      ...digits,
    };
  }

  return {
    ok: true,
    record: {
      identityNumber: identityDigits,
      familyCardNumber: familyCardDigits,
      name: sanitizeFilename((row['NAMA LENGKAP'] ?? '').replace(/ /g, '_')),
      district: regionLabel(row, DISTRICT_COLUMN, DEFAULT_DISTRICT),
      subdistrict: regionLabel(row, SUBDISTRICT_COLUMN, DEFAULT_SUBDISTRICT),
      payload,
    },
    ...digits,
  };
}
