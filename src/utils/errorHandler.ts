// src/utils/errorHandler.ts
// Familia AppError: cada error de negocio lleva su statusCode HTTP
// Los errores de lote (archivo, firma, columnas) se lanzan antes de procesar cualquier fila

import type { Request, Response, NextFunction } from 'express';
import { MulterError } from 'multer';
import type { Logger } from 'pino';

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, statusCode = 400) {
    super(message, statusCode);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 500);
  }
}

export type InputFileErrorCode =
  | 'InvalidPath'
  | 'NotFound'
  | 'Empty'
  | 'TooLarge'
  | 'MalformedSpreadsheet'
  | 'MalformedText'
  | 'UnsupportedFormat';

/** Archivo de entrada ausente, vacío, demasiado grande o mal formado */
export class InputFileError extends ValidationError {
  constructor(
    public readonly code: InputFileErrorCode,
    message: string,
  ) {
    super(message, code === 'TooLarge' ? 413 : 400);
  }
}

/** Faltan columnas obligatorias: se rechaza el lote completo */
export class SchemaError extends AppError {
  readonly code = 'MissingColumns';

  constructor(public readonly missingColumns: string[]) {
    super(`Faltan columnas obligatorias: ${missingColumns.join(', ')}`, 422);
  }
}

export class SignatureError extends ForbiddenError {}

interface ErrorBody {
  error: string;
  code?: string;
  details?: unknown;
}

/**
 * Middleware global de errores para Express.
 * AppError → su status; límite de multer → 413; el resto → 500 con log.
 */
export function createErrorMiddleware(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof AppError) {
      const body: ErrorBody = { error: err.message };
      if (err instanceof InputFileError || err instanceof SchemaError) {
        body.code = err.code;
      }
      if (err instanceof SchemaError) {
        body.details = err.missingColumns;
      }
      logger.warn({ path: req.path, status: err.statusCode, err: err.message }, '⚠️ Solicitud rechazada');
      return res.status(err.statusCode).json(body);
    }

    if (err instanceof MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      return res.status(status).json({ error: err.message, code: err.code } satisfies ErrorBody);
    }

    logger.error({ err, path: req.path }, '❌ Error no manejado');
    return res.status(500).json({ error: 'Error interno del servidor' } satisfies ErrorBody);
  };
}
