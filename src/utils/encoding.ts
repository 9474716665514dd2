// src/utils/encoding.ts
import * as iconv from 'iconv-lite';

export type TextEncoding = 'utf8' | 'utf8-sig' | 'latin1';

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

/** UTF-8 estricto: la decodificación tiene que volver a producir exactamente los mismos bytes */
export function isStrictUtf8(buffer: Buffer): boolean {
  const text = iconv.decode(buffer, 'utf8', { stripBOM: false });
  return iconv.encode(text, 'utf8').equals(buffer);
}

/**
 * Decodifica texto de planilla: UTF-8 (con o sin BOM) y, si los bytes no son UTF-8 válido, Latin-1.
 * Latin-1 nunca falla: cada byte es un carácter.
 */
export function decodeText(buffer: Buffer): { text: string; encoding: TextEncoding } {
  if (buffer.subarray(0, 3).equals(UTF8_BOM)) {
    return { text: iconv.decode(buffer.subarray(3), 'utf8'), encoding: 'utf8-sig' };
  }
  if (isStrictUtf8(buffer)) {
    return { text: iconv.decode(buffer, 'utf8'), encoding: 'utf8' };
  }
  return { text: iconv.decode(buffer, 'latin1'), encoding: 'latin1' };
}
