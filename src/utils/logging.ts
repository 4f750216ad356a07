import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { loggingConfig as settings } from '../connections/config/app.config';

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private toFile: boolean;
  private silent: boolean;

  constructor() {
    this.logLevel = settings.level;
    this.rotation = '10MB';
    this.retention = '30 days';
    this.compression = true;
    this.logDir = path.resolve(settings.dir);
    this.toFile = settings.toFile;
    this.silent = settings.silent;

    if (this.toFile && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const stackStr = stack ? `\n${stackPrefix}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${timestamp} | ${level} | ${message}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.colorize({ all: true }),
      winston.format.printf(info => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf(info => this.formatLine(info, 'Stack: '))
    );
  }

  private parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
      return { maxSize: rotation.replace(/B$/, '').toLowerCase() };
    } else if (rotation.includes('day') || rotation.includes('hour')) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10m' };
  }

  private parseRetention(retention: string): string {
    // "30 days" -> "30d"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const [, num, unit] = match;
      if (unit.toLowerCase().startsWith('d')) return `${num}d`;
      if (unit.toLowerCase().startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private createFileTransport(name: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.rotation);

    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.parseRetention(this.retention),
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
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

    if (this.toFile) {
      logger.add(this.createFileTransport('sys'));
      logger.add(this.createFileTransport('error', 'error'));
      // every level, including debug/silly
      logger.add(this.createFileTransport('combined', 'silly'));
    }

    return logger;
  }

  getLogger(name?: string): winston.Logger {
    const logger = this.setupLogging();
    if (name) {
      return logger.child({ name });
    }
    return logger;
  }
}

export const loggingConfig = new LoggingConfig();

export const logger = loggingConfig.setupLogging();

export { LoggingConfig };

export function auditLog(event: string, details: Record<string, unknown> = {}): void {
  logger.info(`[AUDIT] ${event}`, details);
}
