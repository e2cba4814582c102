// src/utils/logger.ts
import winston from 'winston';
import config from '../config/index.js';

const { combine, timestamp, colorize, printf, errors } = winston.format;

const lineFormat = printf(({ level, message, timestamp: time, context, stack }) => {
    const scope = typeof context === 'string' ? ` [${context}]` : '';
    const trace = typeof stack === 'string' ? `\n${stack}` : '';
    return `${String(time)}${scope} ${level}: ${String(message)}${trace}`;
});

/**
 * Root logger. Everything goes to stderr so stdout stays free for command output.
 */
export const logger = winston.createLogger({
    level: config.logLevel,
    format: combine(errors({ stack: true }), timestamp()),
    transports: [
        new winston.transports.Console({
            stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
            format: combine(colorize(), lineFormat),
        }),
    ],
});

export function createContextLogger(context: string): winston.Logger {
    return logger.child({ context });
}

export default logger;
