// src/utils/archive.ts
// ZIP del árbol de salida. Se arma recién cuando todas las filas terminaron de escribir.

import { createWriteStream } from 'fs';
import { readdir } from 'fs/promises';
import path from 'path';
import archiver from 'archiver';

/** Archivos regulares bajo `root`, con rutas relativas en formato POSIX y orden estable */
export async function listFiles(root: string): Promise<string[]> {
  const entries = await readdir(root, { recursive: true, withFileTypes: true });
  return entries
    .filter(entry => entry.isFile())
    .map(entry => path.relative(root, path.join(entry.parentPath ?? entry.path, entry.name)).split(path.sep).join('/'))
    .sort();
}

/**
 * Comprime cada archivo de `sourceDir` en `targetPath`.
 * @returns cantidad de entradas escritas
 */
export async function createZipArchive(sourceDir: string, targetPath: string): Promise<number> {
  const files = await listFiles(sourceDir);

  await new Promise<void>((resolve, reject) => {
    const output = createWriteStream(targetPath);
    const archive = archiver('zip', { zlib: { level: 9 } });

    output.on('close', () => resolve());
    output.on('error', (err: Error) => reject(err));
    archive.on('error', (err: Error) => reject(err));

    archive.pipe(output);

    for (const name of files) {
      archive.file(path.join(sourceDir, name), { name });
    }

    archive.finalize().catch(reject);
  });

  return files.length;
}
