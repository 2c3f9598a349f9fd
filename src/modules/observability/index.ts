import winston from 'winston';
import 'winston-daily-rotate-file';
import type { Config } from '../../config';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LoggerOptions = {
    level?: string;
    file?: Config['logging']['file'];
};

function buildTransports(options: LoggerOptions): winston.transport[] {
    // Console goes to stderr so CLI output on stdout stays parseable
    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: winston.format.simple(),
            stderrLevels: [...LOG_LEVELS],
        }),
    ];

    if (options.file?.enabled) {
        transports.push(new winston.transports.DailyRotateFile({
            filename: `${options.file.directory}/it-fiscal-%DATE%.log`,
            datePattern: 'YYYY-MM-DD',
            zippedArchive: true,
            maxSize: '20m',
            maxFiles: options.file.max_files,
        }));
    }
    return transports;
}

export function createLogger(options: LoggerOptions = {}): winston.Logger {
    return winston.createLogger({
        level: options.level ?? 'warn',
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json()
        ),
        transports: buildTransports(options),
    });
}

/**
 * Shared logger. Starts at `warn` with console only; the CLI calls
 * configureLogger() once the config is loaded.
 */
export const logger = createLogger();

export function configureLogger(logging: Config['logging']): void {
    logger.configure({
        level: logging.level,
        format: winston.format.combine(
            winston.format.timestamp(),
            winston.format.json()
        ),
        transports: buildTransports({ level: logging.level, file: logging.file }),
    });
}
