// src/utils/tableReader.ts
// Lectura de planillas: XLSX/XLS vía SheetJS, CSV vía csv-parse
// Las celdas se leen con su valor crudo y se pasan a texto acá: un NIK numérico no puede salir en notación científica

import { readFile } from 'fs/promises';
import path from 'path';
import { parse, type Options as CsvOptions } from 'csv-parse';
import * as XLSX from 'xlsx';
import { decodeText } from './encoding';
import { InputFileError } from './errorHandler';
import type { RawRow, Table } from '../types/index';

function toCellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value.toFixed(0) : String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value).trim();
}

function rowsFromMatrix(matrix: unknown[][]): Table {
  const [header, ...body] = matrix;
  if (!header) {
    return { columns: [], rows: [] };
  }

  const columns = header.map(toCellText);
  const rows: RawRow[] = [];

  for (const cells of body) {
    const values = columns.map((_, index) => toCellText(cells[index]));
    if (values.every(value => value === '')) continue; // fila vacía

    const row: RawRow = {};
    columns.forEach((column, index) => {
      if (column !== '') row[column] = values[index];
    });
    rows.push(row);
  }

  return { columns: columns.filter(column => column !== ''), rows };
}

export function readSpreadsheet(buffer: Buffer): Table {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new InputFileError('MalformedSpreadsheet', `No se pudo leer la planilla: ${detail}`);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    return { columns: [], rows: [] };
  }

  // header: 1 → matriz cruda; raw: true → número/fecha/texto tal cual, sin el formato General de Excel
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: true, defval: '' });
  return rowsFromMatrix(matrix);
}

const CSV_OPTIONS: CsvOptions = {
  skip_empty_lines: true,
  relax_column_count: true,
  trim: true,
};

export function parseCsvText(text: string): Promise<Table> {
  return new Promise((resolve, reject) => {
    parse(text, CSV_OPTIONS, (err, records: unknown) => {
      if (err) {
        reject(new InputFileError('MalformedText', `CSV inválido: ${err.message}`));
        return;
      }
      const matrix = Array.isArray(records) ? records.filter((record): record is unknown[] => Array.isArray(record)) : [];
      resolve(rowsFromMatrix(matrix));
    });
  });
}

export async function readCsv(buffer: Buffer): Promise<Table> {
  const { text } = decodeText(buffer);
  return parseCsvText(text);
}

/** Lee la tabla completa según la extensión del archivo */
export async function readTable(filePath: string): Promise<Table> {
  const buffer = await readFile(filePath);
  const ext = path.extname(filePath).toLowerCase();

  if (ext === '.xlsx' || ext === '.xls') {
    return readSpreadsheet(buffer);
  }
  if (ext === '.csv') {
    return readCsv(buffer);
  }
  throw new InputFileError('UnsupportedFormat', `Formato de archivo no soportado: ${ext || '(sin extensión)'}`);
}
