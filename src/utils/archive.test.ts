import { mkdir, mkdtemp, readFile, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import JSZip from 'jszip';
import { describe, expect, it } from 'vitest';
import { createZipArchive, listFiles } from './archive';

describe('createZipArchive', () => {
  it('stores every regular file with paths relative to the source directory', async () => {
    const base = await mkdtemp(join(tmpdir(), 'archive-'));
    const source = join(base, 'lote');
    await mkdir(join(source, 'Kecamatan', 'Kelurahan'), { recursive: true });
    await mkdir(join(source, 'vacia'), { recursive: true });
    await writeFile(join(source, 'Kecamatan', 'Kelurahan', 'a.png'), 'a');
    await writeFile(join(source, 'b.png'), 'bb');

    const count = await createZipArchive(source, join(base, 'lote.zip'));

    expect(count).toBe(2);
    expect(await listFiles(source)).toEqual(['Kecamatan/Kelurahan/a.png', 'b.png']);

    const zip = await JSZip.loadAsync(await readFile(join(base, 'lote.zip')));
    const names = Object.values(zip.files)
      .filter(entry => !entry.dir)
      .map(entry => entry.name)
      .sort();
    expect(names).toEqual(['Kecamatan/Kelurahan/a.png', 'b.png']);
    await expect(zip.file('b.png')?.async('string')).resolves.toBe('bb');
  });

  it('produces an empty archive for an empty directory', async () => {
    const base = await mkdtemp(join(tmpdir(), 'archive-'));
    await mkdir(join(base, 'vacio'));

    await expect(createZipArchive(join(base, 'vacio'), join(base, 'vacio.zip'))).resolves.toBe(0);
  });
});
