// scripts/generate-batch.ts
// Generador de QR por lote desde la línea de comandos, sin pasar por la API
// Uso: npm run generate -- <planilla.xlsx|csv> [carpeta_salida]

import path from 'path';
import 'dotenv/config'; // Carga automática de .env (necesario en scripts standalone)
import { loadConfig } from '../src/config/env';
import { createFileAuditSink } from '../src/services/auditSink';
import { runBatch } from '../src/services/batchService';
import { AppError } from '../src/utils/errorHandler';
import { createLogger } from '../src/utils/logger';

async function main(): Promise<number> {
  const [inputPath, outputArg] = process.argv.slice(2);
  if (!inputPath) {
    console.error('Uso: npm run generate -- <planilla.xlsx|csv> [carpeta_salida]');
    return 1;
  }

  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, filePath: config.appLogPath, nodeEnv: config.nodeEnv });
  const outputFolder = outputArg ?? path.join(config.outputBase, path.parse(inputPath).name);

  console.log(`🚀 Generando QR desde "${inputPath}"`);
  console.log(`📁 Carpeta de salida: ${path.resolve(outputFolder)}\n`);

  const result = await runBatch(inputPath, outputFolder, {
    config,
    logger,
    auditSink: createFileAuditSink(config.auditLogPath, logger),
  });

  console.log(`🎉 ¡Generación completada!`);
  console.log(`   Generados: ${result.generated}`);
  console.log(`   Salteados (ya existían): ${result.skipped}`);
  console.log(`   Inválidos: ${result.invalid}`);
  for (const message of result.errors) {
    console.log(`   ❌ ${message}`);
  }
  console.log(`📦 ZIP: ${path.join(path.dirname(path.resolve(outputFolder)), result.zipFilename)}`);
  return 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    const message = e instanceof AppError ? e.message : e;
    console.error('❌ Error crítico durante generación:', message);
    process.exitCode = 1;
  });
