import { existsSync } from 'fs';
import { mkdir, mkdtemp, readFile, readdir, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import QRCode from 'qrcode';
import sharp from 'sharp';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { CanonicalRecord } from '../types/index';
import { listFiles } from '../utils/archive';
import { QR_IMAGE_OPTIONS, destinationFor, isInsideRoot, writeQrImage } from './qrWriter';

// writeFile pasa al real salvo donde un test simula un disco lleno
vi.mock('fs/promises', async importOriginal => {
  const actual = await importOriginal<typeof import('fs/promises')>();
  return { ...actual, writeFile: vi.fn(actual.writeFile) };
});

const record: CanonicalRecord = {
  identityNumber: '1234567890123455',
  familyCardNumber: '3201234567890001',
  name: 'Siti_Aminah',
  district: 'Kecamatan',
  subdistrict: 'Kelurahan',
  payload: 'HELLO',
};

const FILE_NAME = '1234567890123455-3201234567890001-Siti_Aminah.png';

describe('isInsideRoot', () => {
  it('accepts paths strictly below the root', () => {
    expect(isInsideRoot('/srv/out', '/srv/out/a/b.png')).toBe(true);
  });

  it('rejects the root itself, siblings and traversal', () => {
    expect(isInsideRoot('/srv/out', '/srv/out')).toBe(false);
    expect(isInsideRoot('/srv/out', '/srv/outside/a.png')).toBe(false);
    expect(isInsideRoot('/srv/out', '/srv/out/../etc/passwd')).toBe(false);
  });
});

describe('destinationFor', () => {
  it('places the image under <root>/<district>/<subdistrict>', () => {
    expect(destinationFor(record, '/srv/out')).toEqual({
      folder: '/srv/out/Kecamatan/Kelurahan',
      fileName: FILE_NAME,
      filePath: `/srv/out/Kecamatan/Kelurahan/${FILE_NAME}`,
    });
  });
});

describe('writeQrImage', () => {
  let base: string;
  let root: string;

  beforeEach(async () => {
    base = await mkdtemp(join(tmpdir(), 'qr-writer-'));
    root = join(base, 'nested', 'out');
  });

  it('renders an upscaled RGB PNG and reports it as created', async () => {
    const outcome = await writeQrImage(record, root);

    expect(outcome).toEqual({ status: 'created', fileName: FILE_NAME });

    const modules = QRCode.create('HELLO', { errorCorrectionLevel: 'H' }).modules.size;
    const expectedSide = (modules + QR_IMAGE_OPTIONS.border * 2) * QR_IMAGE_OPTIONS.moduleSize * QR_IMAGE_OPTIONS.upscale;
    const meta = await sharp(join(root, 'Kecamatan', 'Kelurahan', FILE_NAME)).metadata();

    expect(meta.format).toBe('png');
    expect(meta.width).toBe(expectedSide);
    expect(meta.height).toBe(expectedSide);
    expect(meta.hasAlpha).toBe(false);
  });

  it('leaves no temporary files behind', async () => {
    await writeQrImage(record, root);

    expect(await readdir(join(root, 'Kecamatan', 'Kelurahan'))).toEqual([FILE_NAME]);
  });

  it('skips an existing image without rewriting it', async () => {
    await writeQrImage(record, root);
    const filePath = join(root, 'Kecamatan', 'Kelurahan', FILE_NAME);
    const before = await readFile(filePath);
    const mtimeBefore = (await stat(filePath)).mtimeMs;

    const outcome = await writeQrImage({ ...record, payload: 'OTHER' }, root);

    expect(outcome).toEqual({ status: 'skipped-existing', fileName: FILE_NAME });
    expect((await readFile(filePath)).equals(before)).toBe(true);
    expect((await stat(filePath)).mtimeMs).toBe(mtimeBefore);
  });

  it('blocks a record whose folder escapes the root and writes nothing', async () => {
    const outcome = await writeQrImage({ ...record, district: '../../escape' }, root);

    expect(outcome).toEqual({
      status: 'blocked',
      reason: 'directory_traversal_detected',
      message: 'Ruta de carpeta ilegal detectada',
    });
    expect(existsSync(join(base, 'escape'))).toBe(false);
    expect(existsSync(root)).toBe(false);
  });

  it('returns an error outcome instead of throwing when the folder cannot be created', async () => {
    await mkdir(root, { recursive: true });
    await writeFile(join(root, 'Kecamatan'), 'not a directory');

    const outcome = await writeQrImage(record, root);

    expect(outcome.status).toBe('error');
    if (outcome.status !== 'error') return;
    expect(outcome.message.startsWith(`Error generando ${FILE_NAME}: `)).toBe(true);
  });

  it('removes the partial temporary file when writing the image fails', async () => {
    const actualFs = await vi.importActual<typeof import('fs/promises')>('fs/promises');
    vi.mocked(writeFile).mockImplementationOnce(async file => {
      await actualFs.writeFile(file, 'partial');
      throw Object.assign(new Error('ENOSPC: no space left on device'), { code: 'ENOSPC' });
    });

    const outcome = await writeQrImage(record, root);

    expect(outcome).toEqual({
      status: 'error',
      message: `Error generando ${FILE_NAME}: ENOSPC: no space left on device`,
    });
    expect(await listFiles(root)).toEqual([]);
  });
});
