import path from 'path';
import { createLogger, format, transports, Logger } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { Injectable } from '@nestjs/common';
import { ILogger } from './ILogger';

export interface WinstonLoggerOptions {
    level?: string;
    logDir?: string;
    /** Disables the rotating file transport, e.g. for one-shot scripts. */
    consoleOnly?: boolean;
}

@Injectable()
export class WinstonLogger implements ILogger {
    private logger: Logger;

    constructor(options: WinstonLoggerOptions = {}) {
        const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
        const logDir = options.logDir ?? process.env.LOG_DIR ?? 'logs';

        const fileTransports = options.consoleOnly ? [] : [
            new DailyRotateFile({
                filename: path.join(logDir, 'mail-draft-assistant-%DATE%.log'),
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '10m',
                maxFiles: 5,
                format: format.json()
            })
        ];

        this.logger = createLogger({
            level,
            format: format.combine(
                format.timestamp(),
                format.errors({ stack: true }),
                format.printf(({ timestamp, level, message, meta }) => {
                    const metaStr = meta ? ` ${JSON.stringify(meta)}` : '';
                    return `${timestamp} [${level}]: ${message}${metaStr}`;
                })
            ),
            transports: [
                new transports.Console({
                    format: format.combine(
                        format.colorize(),
                        format.simple()
                    )
                }),
                ...fileTransports
            ]
        });
    }

    debug(message: string, meta?: Record<string, unknown>): void {
        this.logger.debug(message, { meta });
    }

    info(message: string, meta?: Record<string, unknown>): void {
        this.logger.info(message, { meta });
    }

    warn(message: string, meta?: Record<string, unknown>): void {
        this.logger.warn(message, { meta });
    }

    error(message: string, meta?: Record<string, unknown>): void {
        this.logger.error(message, { meta });
    }
}
