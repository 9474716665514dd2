// src/utils/logger.ts
// Logger centralizado con Pino - Estructurado, bajo overhead, type-safe nativo
// Transport condicional: pretty en dev, JSON crudo en prod, silencio en tests
// El canal de diagnóstico (APP_LOG_PATH) se agrega como target de archivo

import pino, { type Logger, type TransportTargetOptions } from 'pino';
import type { LogLevel } from '../config/env';

export interface LoggerOptions {
  level?: LogLevel;
  /** Archivo de diagnóstico; se crea el directorio si no existe */
  filePath?: string;
  nodeEnv?: string;
}

function resolveLevel(nodeEnv: string | undefined): LogLevel {
  if (nodeEnv === 'test') return 'silent';
  return nodeEnv === 'production' ? 'info' : 'debug'; // Menos verbose en prod
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const nodeEnv = options.nodeEnv ?? process.env.NODE_ENV;
  const level = options.level ?? resolveLevel(nodeEnv);

  const baseConfig = {
    level,
    timestamp: pino.stdTimeFunctions.isoTime, // Timestamp normalizado ISO
  };

  if (level === 'silent' || nodeEnv === 'test') {
    return pino({ ...baseConfig, enabled: level !== 'silent' });
  }

  const targets: TransportTargetOptions[] = [
    nodeEnv === 'production'
      ? { target: 'pino/file', level, options: { destination: 1 } } // stdout JSON
      : {
          target: 'pino-pretty',
          level,
          options: {
            colorize: true,
            translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
          },
        },
  ];

  if (options.filePath) {
    targets.push({ target: 'pino/file', level, options: { destination: options.filePath, mkdir: true } });
  }

  return pino(baseConfig, pino.transport({ targets }));
}

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function parseLevel(raw: string | undefined): LogLevel | undefined {
  return LEVELS.find(candidate => candidate === raw);
}

// Logger por defecto para lo que corre antes de tener AppConfig (arranque, scripts)
const logger = createLogger({ level: parseLevel(process.env.LOG_LEVEL) });

export default logger;
