import config from '../config/config';
import { LogContext, LogLevel } from '../types/global-interface';
import winston from 'winston';


class Logger {
  private static instance: Logger;
  private winston: winston.Logger;

  private constructor() {
    this.winston = this.createLogger();
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  private createLogger(): winston.Logger {
    const logFormat = winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
      winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
        let log = `${timestamp} [${level.toUpperCase()}]: ${message}`;

        if (Object.keys(meta).length > 0) {
          log += ` ${JSON.stringify(meta)}`;
        }

        if (stack) {
          log += `\n${stack}`;
        }

        return log;
      })
    );

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: config.isDevelopment()
          ? winston.format.combine(
              winston.format.colorize(),
              winston.format.simple()
            )
          : logFormat
      })
    ];

    if (config.isProduction()) {
      transports.push(
        new winston.transports.File({
          filename: 'logs/error.log',
          level: 'error',
          format: logFormat
        }),
        new winston.transports.File({
          filename: 'logs/combined.log',
          format: logFormat
        })
      );
    }

    return winston.createLogger({
      level: config.isDevelopment() ? 'debug' : 'info',
      format: logFormat,
      transports,
      silent: config.isTest(),
      exceptionHandlers: config.isProduction()
        ? [new winston.transports.File({ filename: 'logs/exceptions.log' })]
        : undefined,
      rejectionHandlers: config.isProduction()
        ? [new winston.transports.File({ filename: 'logs/rejections.log' })]
        : undefined
    });
  }

  private formatContext(context?: LogContext): Record<string, unknown> {
    if (!context) return {};

    return Object.entries(context).reduce<Record<string, unknown>>(
      (acc, [key, value]) => {
        if (value !== undefined && value !== null) {
          acc[key] = value;
        }
        return acc;
      },
      {}
    );
  }

  public error(message: string, error?: Error, context?: LogContext): void {
    this.winston.error(message, {
      ...this.formatContext(context),
      error: error ? {
        name: error.name,
        message: error.message,
        stack: error.stack
      } : undefined
    });
  }

  public warn(message: string, context?: LogContext): void {
    this.winston.warn(message, this.formatContext(context));
  }

  public info(message: string, context?: LogContext): void {
    this.winston.info(message, this.formatContext(context));
  }

  public debug(message: string, context?: LogContext): void {
    this.winston.debug(message, this.formatContext(context));
  }

  public log(level: LogLevel, message: string, context?: LogContext): void {
    this.winston.log(level, message, this.formatContext(context));
  }

  public caseStatusCall(serialNumber: string, success: boolean, responseTime?: number): void {
    this.info('Case status API call completed', {
      action: 'case_status_call',
      serialNumber,
      success,
      responseTime
    });
  }

  public oppositionScraped(oppositionNumber: string, marks: number, failures: number, duration: number): void {
    this.info('Opposition scraped', {
      action: 'opposition_scraped',
      oppositionNumber,
      marks,
      failures,
      duration
    });
  }

  public markClassified(serialNumber: string, markType: number, strategy: string): void {
    this.debug('Mark classified', {
      action: 'mark_classified',
      serialNumber,
      markType,
      strategy
    });
  }

  public batchProgress(jobId: string, progress: number, message: string): void {
    this.debug(message, {
      action: 'batch_progress',
      jobId,
      progress: Math.round(progress * 100)
    });
  }
}

export const logger = Logger.getInstance();
export default logger;
