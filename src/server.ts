// src/server.ts
import 'dotenv/config'; // Carga automática de .env
import { createApp } from './app';
import { loadConfig } from './config/env';
import { createFileAuditSink } from './services/auditSink';
import bootLogger, { createLogger } from './utils/logger';

function main(): void {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, filePath: config.appLogPath, nodeEnv: config.nodeEnv });
  const auditSink = createFileAuditSink(config.auditLogPath, logger);

  const app = createApp({ config, logger, auditSink });

  app.listen(config.port, '0.0.0.0', () => {
    logger.info(
      { port: config.port, outputBase: config.outputBase, maxWorkers: config.maxWorkers },
      `🚀 Servidor backend corriendo en puerto ${config.port}`,
    );
  });
}

try {
  main();
} catch (err) {
  bootLogger.fatal({ err }, '🚨 Error crítico al iniciar el servidor');
  process.exit(1);
}
