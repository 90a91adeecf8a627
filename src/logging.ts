import winston from 'winston';
import { PROGRAM_NAME } from '@/constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const createLogger = (level: LogLevel = 'info'): winston.Logger => {
    let format = winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const { service: _service, ...rest } = meta;
            const metaStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
            return `${timestamp} ${level}: ${String(message)}${metaStr}`;
        }),
    );

    if (level === 'info') {
        format = winston.format.combine(
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ message }) => String(message)),
        );
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            new winston.transports.Console({
                stderrLevels: ['error', 'warn', 'debug', 'verbose', 'silly'],
            }),
        ],
    });
};

let logger = createLogger();

export const setLogLevel = (level: LogLevel): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
