// src/types/index.ts
// Tipos centrales del dominio - centralizados y reutilizables entre servicios, rutas y scripts

/** Columnas obligatorias de la planilla (nombres exactos, sensibles a mayúsculas) */
export const REQUIRED_COLUMNS = ['NO IDENTITAS', 'NOMOR KK', 'NAMA LENGKAP', 'KODE QR'] as const;

export const DISTRICT_COLUMN = 'KECAMATAN';
export const SUBDISTRICT_COLUMN = 'KELURAHAN';

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

/** Una fila cruda de la planilla: encabezado → texto de la celda */
export type RawRow = Record<string, string>;

export interface Table {
  columns: string[];
  rows: RawRow[];
}

export type InputFormat = 'spreadsheet' | 'text';

/** Registro ya validado y saneado, listo para armar la ruta de destino */
export interface CanonicalRecord {
  identityNumber: string;
  familyCardNumber: string;
  name: string;
  district: string;
  subdistrict: string;
  payload: string;
}

export type InvalidReason = 'invalid_nik' | 'invalid_kk' | 'qr_content_too_long';
export type BlockedReason = 'directory_traversal_detected' | 'file_escape_detected';

export type RowOutcome =
  | { status: 'created'; fileName: string }
  | { status: 'skipped-existing'; fileName: string }
  | { status: 'invalid'; reason: InvalidReason; message: string }
  | { status: 'blocked'; reason: BlockedReason; message: string }
  | { status: 'error'; message: string };

export type RowStatus = RowOutcome['status'];

export interface AuditEntry {
  ts: string;
  rowIndex: number;
  identityHash: string | null;
  familyCardHash: string | null;
  action: RowStatus;
  message: string;
}

/** Cierre del lote en la auditoría: solo contadores, los mensajes de error pueden nombrar archivos */
export interface BatchFinishedEntry {
  ts: string;
  action: 'finished';
  result: Omit<BatchSummary, 'errors'> & { errors: number };
}

export type AuditRecord = AuditEntry | BatchFinishedEntry;

/** Resultado de una unidad de trabajo: el outcome y su línea de auditoría */
export interface RowResult {
  outcome: RowOutcome;
  audit: AuditEntry;
}

export interface BatchSummary {
  generated: number;
  skipped: number;
  invalid: number;
  errors: string[];
  zipFilename: string;
}
