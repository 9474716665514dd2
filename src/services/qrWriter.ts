// src/services/qrWriter.ts
// Render + escritura de un QR por registro canónico
// Idempotente: si el PNG ya existe se informa como salteado y no se regenera

import { randomUUID } from 'crypto';
import { access, link, mkdir, rm, writeFile } from 'fs/promises';
import path from 'path';
import QRCode from 'qrcode';
import sharp from 'sharp';
import type { CanonicalRecord, RowOutcome } from '../types/index';
import { sanitizeFilename } from '../utils/normalizer';

/** Parámetros fijos del símbolo: corrección H, 10 px por módulo, borde de 4 módulos, escala ×6 */
export const QR_IMAGE_OPTIONS = {
  errorCorrectionLevel: 'H',
  moduleSize: 10,
  border: 4,
  upscale: 6,
} as const;

/** true si `target` queda dentro de `root` (comparación léxica sobre rutas resueltas) */
export function isInsideRoot(root: string, target: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(target));
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

export function destinationFor(record: CanonicalRecord, outputRoot: string): { folder: string; fileName: string; filePath: string } {
  const folder = path.join(path.resolve(outputRoot), record.district, record.subdistrict);
  const fileName = sanitizeFilename(`${record.identityNumber}-${record.familyCardNumber}-${record.name}.png`);
  return { folder, fileName, filePath: path.join(folder, fileName) };
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/** PNG RGB del contenido, ya escalado con Lanczos */
export async function renderQrPng(payload: string): Promise<Buffer> {
  const base = await QRCode.toBuffer(payload, {
    type: 'png',
    errorCorrectionLevel: QR_IMAGE_OPTIONS.errorCorrectionLevel,
    scale: QR_IMAGE_OPTIONS.moduleSize,
    margin: QR_IMAGE_OPTIONS.border,
    color: { dark: '#000000ff', light: '#ffffffff' },
  });

  const { width, height } = await sharp(base).metadata();
  if (!width || !height) {
    throw new Error('No se pudo leer el tamaño del QR generado');
  }

  return sharp(base)
    .removeAlpha()
    .toColourspace('srgb')
    .resize(width * QR_IMAGE_OPTIONS.upscale, height * QR_IMAGE_OPTIONS.upscale, { kernel: sharp.kernel.lanczos3 })
    .png({ compressionLevel: 9 })
    .toBuffer();
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * Escribe en un temporal hermano y lo publica con link(): atómico y sin pisar un archivo existente.
 * @returns false si otro proceso publicó el mismo archivo antes
 */
async function publishAtomically(filePath: string, data: Buffer): Promise<boolean> {
  const tmpPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    await writeFile(tmpPath, data);
    await link(tmpPath, filePath);
    return true;
  } catch (err) {
    if (isErrnoCode(err, 'EEXIST')) return false;
    throw err;
  } finally {
    // También si writeFile falló a mitad: un .tmp parcial no puede terminar en el ZIP
    await rm(tmpPath, { force: true });
  }
}

/**
 * Genera el PNG de un registro canónico bajo `<root>/<kecamatan>/<kelurahan>/`.
 * Nunca lanza: cualquier fallo se devuelve como outcome `error`.
 */
export async function writeQrImage(record: CanonicalRecord, outputRoot: string): Promise<RowOutcome> {
  const { folder, fileName, filePath } = destinationFor(record, outputRoot);

  // Chequeo duro antes de tocar el disco
  if (!isInsideRoot(outputRoot, folder)) {
    return { status: 'blocked', reason: 'directory_traversal_detected', message: 'Ruta de carpeta ilegal detectada' };
  }
  if (!isInsideRoot(outputRoot, filePath)) {
    return { status: 'blocked', reason: 'file_escape_detected', message: 'Ruta de archivo ilegal detectada' };
  }

  try {
    await mkdir(folder, { recursive: true });

    if (await exists(filePath)) {
      return { status: 'skipped-existing', fileName };
    }

    const png = await renderQrPng(record.payload);
    const published = await publishAtomically(filePath, png);
    return published ? { status: 'created', fileName } : { status: 'skipped-existing', fileName };
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    return { status: 'error', message: `Error generando ${fileName}: ${detail}` };
  }
}
