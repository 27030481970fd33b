import winston from 'winston';
import path from 'path';

/**
 * Logger Configuration
 *
 * Structured logging for the compliance screening run
 */

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level}] ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`;
    }
    return msg;
  })
);

/**
 * Create a logger instance
 * @param component Component name (e.g., 'GlossaryLoader', 'OllamaBackend')
 */
export function createLogger(component: string): winston.Logger {
  // LOG_SILENT keeps test runs quiet and stops them from writing logs/
  const silent = process.env.LOG_SILENT === 'true';

  const fileTransports = silent
    ? []
    : [
        // File output - all logs
        new winston.transports.File({
          filename: path.join(process.cwd(), 'logs', 'combined.log'),
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
        // File output - errors only
        new winston.transports.File({
          filename: path.join(process.cwd(), 'logs', 'error.log'),
          level: 'error',
          maxsize: 5242880, // 5MB
          maxFiles: 5,
        }),
      ];

  return winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: logFormat,
    defaultMeta: { component },
    transports: [
      // Console output
      new winston.transports.Console({
        format: consoleFormat,
        silent,
      }),
      ...fileTransports,
    ],
  });
}

/**
 * Default logger instance
 */
export const logger = createLogger('App');

/**
 * Helper to log events of one screening run with consistent formatting
 */
export class RunLogger {
  private logger: winston.Logger;
  private runId: string;
  private context: object;

  /**
   * @param context Fields attached to every entry (e.g. input and output paths)
   */
  constructor(runId: string, context: object = {}, logger?: winston.Logger) {
    this.runId = runId;
    this.context = context;
    this.logger = logger ?? createLogger(`Run:${runId}`);
  }

  /**
   * Same run, with extra fields on every entry
   */
  withContext(context: object): RunLogger {
    return new RunLogger(this.runId, { ...this.context, ...context }, this.logger);
  }

  info(message: string, metadata?: object) {
    this.logger.info(message, { runId: this.runId, ...this.context, ...metadata });
  }

  error(message: string, error?: Error | unknown, metadata?: object) {
    this.logger.error(message, {
      runId: this.runId,
      ...this.context,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
      ...metadata,
    });
  }

  warn(message: string, metadata?: object) {
    this.logger.warn(message, { runId: this.runId, ...this.context, ...metadata });
  }

  started(metadata?: object) {
    this.info('Run started', metadata);
  }

  completed(metadata?: object) {
    this.info('Run completed', metadata);
  }

  failed(error: Error | unknown, metadata?: object) {
    this.error('Run failed', error, metadata);
  }
}
