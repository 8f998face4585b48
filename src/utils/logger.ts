/**
 * Logging Utilities
 *
 * Structured pino loggers writing JSON lines to ./logs, one file per area
 * so terminal output stays reserved for the research report.
 */
import pino, { type Logger } from 'pino';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';

const LOG_DIR = join(process.cwd(), 'logs');

function createLogger(name: string): Logger {
  if (!existsSync(LOG_DIR)) {
    mkdirSync(LOG_DIR, { recursive: true });
  }

  return pino(
    {
      name,
      level: process.env['LOG_LEVEL'] ?? 'debug',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({
      dest: join(LOG_DIR, `${name}.log`),
      sync: false,
    })
  );
}

export const cliLogger = createLogger('cli');
export const agentLogger = createLogger('agent');
export const toolLogger = createLogger('tools');
export const uiLogger = createLogger('ui');

export function setupErrorHandlers(logger: Logger): void {
  process.on('uncaughtException', (error) => {
    logger.fatal({ error: error.message, stack: error.stack }, 'Uncaught exception');
    // Give time for log to flush
    setTimeout(() => process.exit(1), 100);
  });

  process.on('unhandledRejection', (reason) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.error({ error: error.message, stack: error.stack }, 'Unhandled rejection');
  });
}
