// src/services/inputValidator.ts
// Validación temprana (fail-fast) del archivo subido. Solo lecturas, sin efectos.

import { readFile, stat } from 'fs/promises';
import path from 'path';
import JSZip from 'jszip';
import type { InputFormat } from '../types/index';
import { InputFileError } from '../utils/errorHandler';

export interface InputFileInfo {
  format: InputFormat;
  sizeBytes: number;
}

const SPREADSHEET_EXTENSIONS = new Set(['.xlsx', '.xls']);
const TEXT_EXTENSIONS = new Set(['.csv']);

/** XLSX es un ZIP de XMLs: si JSZip no lo abre, no es una planilla válida (vale también para .xls) */
async function assertZipContainer(buffer: Buffer): Promise<void> {
  try {
    await JSZip.loadAsync(buffer);
  } catch {
    throw new InputFileError('MalformedSpreadsheet', 'Archivo Excel inválido');
  }
}

export async function validateInputFile(
  filePath: string,
  options: { maxFileSizeBytes: number },
): Promise<InputFileInfo> {
  if (filePath.split(/[\\/]/).includes('..')) {
    throw new InputFileError('InvalidPath', 'Ruta de archivo inválida');
  }

  let sizeBytes: number;
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new InputFileError('NotFound', 'Archivo de entrada no encontrado');
    }
    sizeBytes = info.size;
  } catch (err) {
    if (err instanceof InputFileError) throw err;
    throw new InputFileError('NotFound', 'Archivo de entrada no encontrado');
  }

  if (sizeBytes === 0) {
    throw new InputFileError('Empty', 'El archivo está vacío');
  }
  if (sizeBytes > options.maxFileSizeBytes) {
    throw new InputFileError('TooLarge', `El archivo supera el máximo de ${options.maxFileSizeBytes} bytes`);
  }

  const ext = path.extname(filePath).toLowerCase();

  if (SPREADSHEET_EXTENSIONS.has(ext)) {
    await assertZipContainer(await readFile(filePath));
    return { format: 'spreadsheet', sizeBytes };
  }

  // CSV: UTF-8 o, si no, Latin-1 (ver decodeText); Latin-1 acepta cualquier byte.
  // Lo que no sea CSV parseable se rechaza después como MalformedText al leer la tabla.
  if (TEXT_EXTENSIONS.has(ext)) {
    return { format: 'text', sizeBytes };
  }

  throw new InputFileError('UnsupportedFormat', 'Formato de archivo no soportado o peligroso');
}
