import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

export interface LoggerConfig {
  level?: string;
  format?: winston.Logform.Format;
  transports?: winston.transport[];
  filename?: string;
  maxSize?: string;
  maxFiles?: string;
  datePattern?: string;
}

function createWinstonLogger(config: LoggerConfig): winston.Logger {
  const defaultTransports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
      )
    })
  ];

  if (config.filename) {
    const rotateTransport = new DailyRotateFile({
      filename: config.filename,
      datePattern: config.datePattern || 'YYYY-MM-DD',
      maxSize: config.maxSize || '20m',
      maxFiles: config.maxFiles || '14d',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      )
    });
    defaultTransports.push(rotateTransport);
  }

  return winston.createLogger({
    level: config.level || process.env.LIGHT_SOURCE_LOG_LEVEL || 'info',
    format: config.format || winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    defaultMeta: { service: 'light-source-controller' },
    transports: config.transports || defaultTransports
  });
}

export class Logger {
  private readonly logger: winston.Logger;
  private readonly config: LoggerConfig;
  private context: Record<string, unknown> = {};

  constructor(config: LoggerConfig = {}, logger?: winston.Logger) {
    this.config = config;
    this.logger = logger ?? createWinstonLogger(config);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, { ...this.context, ...meta });
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, { ...this.context, ...meta });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, { ...this.context, ...meta });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, { ...this.context, ...meta });
  }

  // Shares transports with the parent
  child(context: Record<string, unknown>): Logger {
    const child = new Logger(this.config, this.logger);
    child.context = { ...this.context, ...context };
    return child;
  }
}

export default Logger;
