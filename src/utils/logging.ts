import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';

class LoggingConfig {
  private logLevel: string;
  private maxSize: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private writeFiles: boolean;
  private silent: boolean;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const isTest = env.NODE_ENV === 'test';

    this.logLevel = (env.LOG_LEVEL || 'info').toLowerCase();
    this.maxSize = '10m';
    this.retention = '30d';
    this.compression = true;
    this.logDir = env.LOG_DIR || path.join(process.cwd(), 'logs');

    // Tests stay quiet and leave no files behind unless a level is asked for
    this.writeFiles = !isTest;
    this.silent = isTest && !env.LOG_LEVEL;

    if (this.writeFiles && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.colorize({ all: true }),
      winston.format.printf((info) => {
        const { timestamp, level, message, stack, ...meta } = info;
        const stackStr = stack ? `\n${String(stack)}` : '';
        const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
      })
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => {
        const { timestamp, level, message, stack, ...meta } = info;
        const stackStr = stack ? `\nStack: ${String(stack)}` : '';
        const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
      })
    );
  }

  private createRotatingFile(name: string, level?: string): DailyRotateFile {
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: 'YYYY-MM-DD',
      maxSize: this.maxSize,
      maxFiles: this.retention,
      zippedArchive: this.compression,
      format: this.createFileFormat(),
      ...(level ? { level } : {}),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
      silent: this.silent,
    });

    logger.add(new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
    }));

    if (this.writeFiles) {
      logger.add(this.createRotatingFile('sys'));
      logger.add(this.createRotatingFile('error', 'error'));
      // Every level, including debug output filtered out of the console
      logger.add(this.createRotatingFile('combined', 'silly'));
    }

    return logger;
  }
}

export const loggingConfig = new LoggingConfig();

export const logger = loggingConfig.setupLogging();

export { LoggingConfig };

/**
 * Child logger tagged with the component that writes through it.
 */
export const getLogger = (component: string): winston.Logger => logger.child({ component });

export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}
