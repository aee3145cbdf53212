import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const createLogger = (level: LogLevel): winston.Logger => {
    // info keeps the console clean; the chattier levels get timestamps and metadata
    const format = level === 'info' || level === 'warn' || level === 'error'
        ? winston.format.combine(
            winston.format.splat(),
            winston.format.printf(({ message }) => String(message)),
        )
        : winston.format.combine(
            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            winston.format.splat(),
            winston.format.printf(({ timestamp, level: logLevel, message, ...meta }) => {
                const rest = Object.fromEntries(
                    Object.entries(meta).filter(([key]) => key !== 'service'),
                );
                const metaStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
                return `${String(timestamp)} ${logLevel}: ${String(message)}${metaStr}`;
            }),
        );

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            new winston.transports.Console({ stderrLevels: ['error'] }),
        ],
    });
};

let logger: winston.Logger = createLogger('info');

export const setLogLevel = (level: LogLevel): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
