import { mkdtemp, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { beforeEach, describe, expect, it } from 'vitest';
import * as XLSX from 'xlsx';
import { validateInputFile } from './inputValidator';

const options = { maxFileSizeBytes: 1024 * 1024 };

describe('validateInputFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'input-validator-'));
  });

  const fixture = async (name: string, content: string | Buffer): Promise<string> => {
    const filePath = join(dir, name);
    await writeFile(filePath, content);
    return filePath;
  };

  it('accepts a readable CSV as text', async () => {
    const filePath = await fixture('lote.csv', 'NO IDENTITAS,NOMOR KK\n');

    await expect(validateInputFile(filePath, options)).resolves.toEqual({ format: 'text', sizeBytes: 22 });
  });

  it('accepts a Latin-1 CSV', async () => {
    const filePath = await fixture('latin.csv', Buffer.from('NAMA\nJos\xe9\n', 'latin1'));

    await expect(validateInputFile(filePath, options)).resolves.toMatchObject({ format: 'text' });
  });

  it('accepts an XLSX workbook as spreadsheet', async () => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet([['A'], ['1']]), 'Data');
    const filePath = await fixture('lote.xlsx', XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));

    await expect(validateInputFile(filePath, options)).resolves.toMatchObject({ format: 'spreadsheet' });
  });

  it('fails with NotFound for a missing file', async () => {
    await expect(validateInputFile(join(dir, 'missing.csv'), options)).rejects.toMatchObject({
      code: 'NotFound',
      statusCode: 400,
    });
  });

  it('fails with Empty for a zero-byte file', async () => {
    const filePath = await fixture('empty.csv', '');

    await expect(validateInputFile(filePath, options)).rejects.toMatchObject({ code: 'Empty' });
  });

  it('fails with TooLarge over the ceiling', async () => {
    const filePath = await fixture('big.csv', '0123456789');

    await expect(validateInputFile(filePath, { maxFileSizeBytes: 4 })).rejects.toMatchObject({
      code: 'TooLarge',
      statusCode: 413,
    });
  });

  it('fails with MalformedSpreadsheet for an .xls that is not a zip container', async () => {
    const oleHeader = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);
    const filePath = await fixture('a.xls', Buffer.concat([oleHeader, Buffer.alloc(100)]));

    await expect(validateInputFile(filePath, options)).rejects.toMatchObject({
      code: 'MalformedSpreadsheet',
      message: 'Archivo Excel inválido',
    });
  });

  it('fails with MalformedSpreadsheet when an .xlsx is not a zip container', async () => {
    const filePath = await fixture('fake.xlsx', 'this is not a workbook');

    await expect(validateInputFile(filePath, options)).rejects.toMatchObject({ code: 'MalformedSpreadsheet' });
  });

  it('accepts any byte sequence behind a .csv name, since Latin-1 decodes it', async () => {
    const filePath = await fixture('binary.csv', Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x00, 0x00, 0x01]));

    await expect(validateInputFile(filePath, options)).resolves.toEqual({ format: 'text', sizeBytes: 7 });
  });

  it('fails with UnsupportedFormat for other extensions', async () => {
    const filePath = await fixture('script.sh', 'echo hi');

    await expect(validateInputFile(filePath, options)).rejects.toMatchObject({ code: 'UnsupportedFormat' });
  });

  it('rejects paths with parent-directory segments before touching the disk', async () => {
    await expect(validateInputFile(`${dir}/../lote.csv`, options)).rejects.toMatchObject({ code: 'InvalidPath' });
  });
});
