// src/routes/generateRoutes.ts
import { mkdirSync } from 'fs';
import { Router } from 'express';
import multer from 'multer';
import { GenerateController, type GenerateControllerDeps } from '../controllers/generateController';
import { sanitizeFilename } from '../utils/normalizer';

export function createGenerateRoutes(deps: GenerateControllerDeps): Router {
  const router = Router();
  const controller = new GenerateController(deps);

  mkdirSync(deps.config.uploadFolder, { recursive: true });

  const upload = multer({
    storage: multer.diskStorage({
      destination: deps.config.uploadFolder,
      filename: (_req, file, cb) => cb(null, sanitizeFilename(file.originalname)),
    }),
    limits: { fileSize: deps.config.maxFileSizeBytes, files: 1 },
  });

  router.post('/generate', upload.single('file'), controller.generate);
  router.get('/download/:filename', controller.download);

  return router;
}
