// src/controllers/generateController.ts
import path from 'path';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { AppConfig } from '../config/env';
import { runBatch, type BatchContext } from '../services/batchService';
import { isInsideRoot } from '../services/qrWriter';
import { NotFoundError, ValidationError } from '../utils/errorHandler';
import { sanitizeFilename } from '../utils/normalizer';

export interface GenerateControllerDeps extends BatchContext {
  config: AppConfig;
}

// Campo de formulario vacío = sin firma
const SignatureSchema = z.preprocess(
  value => (value === '' ? undefined : value),
  z
    .string()
    .trim()
    .regex(/^[0-9a-fA-F]{64}$/, 'La firma debe ser HMAC-SHA256 en hex')
    .optional(),
);

const DownloadParamsSchema = z.object({
  filename: z.string().min(1).max(255),
});

function signatureFrom(req: Request): unknown {
  const fromBody: unknown = req.body?.signature;
  return fromBody ?? req.get('x-file-signature');
}

export class GenerateController {
  constructor(private readonly deps: GenerateControllerDeps) {}

  /**
   * Recibe la planilla (multer ya la guardó en UPLOAD_FOLDER) y corre el lote.
   * La carpeta de salida lleva el nombre del archivo sin extensión.
   */
  generate = async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        throw new ValidationError('No se subió ningún archivo');
      }

      const parsedSignature = SignatureSchema.safeParse(signatureFrom(req));
      if (!parsedSignature.success) {
        throw new ValidationError(parsedSignature.error.issues[0]?.message ?? 'Firma inválida');
      }

      const importName = path.parse(req.file.filename).name;
      const outputFolder = path.join(this.deps.config.outputBase, importName);

      this.deps.logger.info({ file: req.file.filename, size: req.file.size, outputFolder }, '📤 Archivo recibido');

      const result = await runBatch(req.file.path, outputFolder, this.deps, { signature: parsedSignature.data });

      res.json({
        success: true,
        result,
        outputFolder,
        zipFilename: result.zipFilename,
      });
    } catch (err: unknown) {
      next(err); // Delega a handler global
    }
  };

  /** Descarga como adjunto un archivo de OUTPUT_BASE (típicamente el ZIP del lote) */
  download = (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = DownloadParamsSchema.safeParse(req.params);
      if (!params.success) {
        throw new ValidationError('Nombre de archivo inválido');
      }

      const root = path.resolve(this.deps.config.outputBase);
      const target = path.resolve(root, params.data.filename);
      if (!isInsideRoot(root, target)) {
        throw new ValidationError('Nombre de archivo inválido');
      }

      res.download(target, sanitizeFilename(path.basename(target)), err => {
        if (!err) return;
        if (res.headersSent) {
          this.deps.logger.error({ err, target }, '❌ Descarga interrumpida');
          return;
        }
        next(new NotFoundError('Archivo no encontrado'));
      });
    } catch (err: unknown) {
      next(err);
    }
  };
}
