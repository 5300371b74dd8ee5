import * as winston from 'winston';
import chalk from 'chalk';
import * as fs from 'fs';
import * as path from 'path';

// Winston logger configuration
const logLevels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    verbose: 4,
    debug: 5,
    silly: 6,
};

export type LogLevel = keyof typeof logLevels;

// Available chalk colors for message formatting
const CHALK_COLORS = [
    'red',
    'green',
    'yellow',
    'blue',
    'magenta',
    'cyan',
    'white',
    'gray',
    'redBright',
    'greenBright',
    'yellowBright',
    'blueBright',
    'cyanBright',
] as const;

export type ChalkColor = (typeof CHALK_COLORS)[number];

function isChalkColor(value: unknown): value is ChalkColor {
    return typeof value === 'string' && (CHALK_COLORS as readonly string[]).includes(value);
}

function isLogLevel(value: string): value is LogLevel {
    return Object.keys(logLevels).includes(value);
}

// Custom format for console output
const consoleFormat = winston.format.printf(({ level, message, timestamp, color }) => {
    const levelColorMap: Record<string, (text: string) => string> = {
        error: chalk.red,
        warn: chalk.yellow,
        info: chalk.blue,
        http: chalk.cyan,
        verbose: chalk.magenta,
        debug: chalk.gray,
        silly: chalk.gray.dim,
    };

    const colorize = levelColorMap[level] ?? chalk.white;
    const text = String(message);
    const formattedMessage = isChalkColor(color) ? chalk[color](text) : text;

    return `${chalk.dim(String(timestamp))} ${colorize(level.toUpperCase())}: ${formattedMessage}`;
});

/**
 * Redact credentials before they reach any transport. Connector tokens travel through
 * config objects that are sometimes logged whole, so masking is on unless
 * PULSEBOARD_REDACT_SECRETS=false.
 */
const SENSITIVE_KEYS = ['apiKey', 'password', 'secret', 'token'];
const MASK_REGEX = new RegExp(
    `(${SENSITIVE_KEYS.join('|')})(["']?\\s*[:=]\\s*)(["'])?.*?\\3(?=[,}\\s]|$)`,
    'gi'
);

export function maskSecrets(text: string): string {
    return text.replace(MASK_REGEX, '$1$2$3[REDACTED]$3');
}

const maskFormat = winston.format((info) => {
    if (process.env.PULSEBOARD_REDACT_SECRETS !== 'false' && typeof info.message === 'string') {
        info.message = maskSecrets(info.message);
    }
    return info;
});

export interface LoggerOptions {
    level?: LogLevel;
    silent?: boolean;
    logToConsole?: boolean;
    customLogPath?: string;
}

export type LogMeta = Record<string, unknown> | Error;

// Helper to get default log level from environment or fallback to 'info'
const getDefaultLogLevel = (): LogLevel => {
    const envLevel = process.env.PULSEBOARD_LOG_LEVEL?.toLowerCase();
    if (envLevel && isLogLevel(envLevel)) {
        return envLevel;
    }
    return 'info';
};

export class Logger {
    private logger: winston.Logger;
    private logFilePath: string | null = null;
    private logToConsole = true;

    constructor(private readonly options: LoggerOptions = {}) {
        this.logger = winston.createLogger({
            levels: logLevels,
            silent: options.silent ?? false,
            format: winston.format.combine(
                winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                maskFormat(),
                winston.format.errors({ stack: true }),
                winston.format.splat(),
                winston.format.json()
            ),
        });
        this.reconfigure();
    }

    /**
     * Re-read PULSEBOARD_LOG_LEVEL, PULSEBOARD_LOG_TO_CONSOLE and PULSEBOARD_LOG_FILE and
     * rebuild the transports. Constructor options still take precedence.
     *
     * The shared `logger` is created on import, before the CLI has applied `.env` files,
     * so the CLI calls this once the environment is final.
     */
    reconfigure(): void {
        this.logToConsole =
            this.options.logToConsole ?? process.env.PULSEBOARD_LOG_TO_CONSOLE !== 'false';
        this.logFilePath = this.options.customLogPath ?? process.env.PULSEBOARD_LOG_FILE ?? null;
        this.logger.level = this.options.level ?? getDefaultLogLevel();

        for (const transport of [...this.logger.transports]) {
            this.logger.remove(transport);
            transport.close?.();
        }
        for (const transport of this.createTransports()) {
            this.logger.add(transport);
        }
    }

    private consoleTransport(): winston.transport {
        return new winston.transports.Console({
            // Keep stdout free for command output (`OK <version>`, `report --format json`)
            stderrLevels: Object.keys(logLevels),
            format: winston.format.combine(
                winston.format.timestamp({ format: 'HH:mm:ss' }),
                maskFormat(),
                consoleFormat
            ),
        });
    }

    private createTransports(): winston.transport[] {
        const transports: winston.transport[] = [];

        if (this.logToConsole) {
            transports.push(this.consoleTransport());
        }

        if (this.logFilePath) {
            try {
                fs.mkdirSync(path.dirname(this.logFilePath), { recursive: true });

                transports.push(
                    new winston.transports.File({
                        filename: this.logFilePath,
                        format: winston.format.combine(
                            winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
                            maskFormat(),
                            winston.format.errors({ stack: true }),
                            winston.format.json()
                        ),
                        maxsize: 10 * 1024 * 1024, // 10MB
                        maxFiles: 7,
                        tailable: true,
                    })
                );
            } catch (error) {
                // If file logging fails, fall back to console
                console.error(
                    `Failed to initialize file logging: ${error}. Falling back to console.`
                );
                if (!this.logToConsole) {
                    this.logToConsole = true;
                    transports.push(this.consoleTransport());
                }
            }
        }

        // Ensure at least one transport exists (console fallback)
        if (transports.length === 0) {
            this.logToConsole = true;
            transports.push(this.consoleTransport());
        }

        return transports;
    }

    private write(level: LogLevel, message: string, meta?: LogMeta, color?: ChalkColor) {
        // Error objects go through as-is so winston keeps the stack
        if (meta instanceof Error) {
            this.logger.log(level, message, meta);
        } else {
            this.logger.log(level, message, { ...meta, color });
        }
    }

    error(message: string, meta?: LogMeta, color?: ChalkColor) {
        this.write('error', message, meta, color);
    }

    warn(message: string, meta?: LogMeta, color?: ChalkColor) {
        this.write('warn', message, meta, color);
    }

    info(message: string, meta?: LogMeta, color?: ChalkColor) {
        this.write('info', message, meta, color);
    }

    http(message: string, meta?: LogMeta, color?: ChalkColor) {
        this.write('http', message, meta, color);
    }

    verbose(message: string, meta?: LogMeta, color?: ChalkColor) {
        this.write('verbose', message, meta, color);
    }

    debug(message: string | object, meta?: LogMeta, color?: ChalkColor) {
        const formattedMessage =
            typeof message === 'string' ? message : JSON.stringify(message, null, 2);
        this.write('debug', formattedMessage, meta, color);
    }

    silly(message: string, meta?: LogMeta, color?: ChalkColor) {
        this.write('silly', message, meta, color);
    }

    setLevel(level: string) {
        const normalized = level.toLowerCase();
        if (!isLogLevel(normalized)) {
            this.warn(`Invalid log level '${level}', keeping '${this.logger.level}'`);
            return;
        }
        this.logger.level = normalized;
    }

    getLevel(): string {
        return this.logger.level;
    }

    getLogFilePath(): string | null {
        return this.logFilePath;
    }
}

export const logger = new Logger();
