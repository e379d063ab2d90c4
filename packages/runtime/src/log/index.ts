import pino from 'pino';
import type { LogLevel, LoggerConfig, Logger } from './types.js';

export type { LogLevel, LoggerConfig, Logger } from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal', 'silent'];

let logger: pino.Logger | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Level used until initializeLogger is called, taken from TIERCACHE_LOG_LEVEL
 */
export function defaultLogLevel(): LogLevel {
	const fromEnv = process.env.TIERCACHE_LOG_LEVEL?.toLowerCase();
	return isLogLevel(fromEnv) ? fromEnv : 'info';
}

function createLogger(config: LoggerConfig): pino.Logger {
	const options: pino.LoggerOptions = {
		level: config.level,
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => {
				return { level: label };
			},
		},
		redact: {
			paths: config.redact ?? ['password', '*.password', 'options.password'],
			censor: '[REDACTED]',
		},
	};

	if (config.pretty) {
		return pino({
			...options,
			transport: {
				target: 'pino-pretty',
				options: {
					colorize: true,
					translateTime: 'SYS:standard',
					ignore: 'pid,hostname',
				},
			},
		});
	}
	if (config.destination && config.destination !== 'stdout') {
		return pino(options, pino.destination(config.destination));
	}
	return pino(options);
}

/**
 * Initializes the logger with configuration
 */
export function initializeLogger(config?: LoggerConfig): void {
	logger = createLogger(config ?? { level: defaultLogLevel() });
}

function getLogger(): pino.Logger {
	if (!logger) {
		logger = createLogger({ level: defaultLogLevel() });
	}
	return logger;
}

function wrap(resolve: () => pino.Logger): Logger {
	return {
		info(message: string, data?: unknown): void {
			if (data) {
				resolve().info(data, message);
			} else {
				resolve().info(message);
			}
		},
		warn(message: string, data?: unknown): void {
			if (data) {
				resolve().warn(data, message);
			} else {
				resolve().warn(message);
			}
		},
		error(message: string, data?: unknown): void {
			if (data) {
				resolve().error(data, message);
			} else {
				resolve().error(message);
			}
		},
		debug(message: string, data?: unknown): void {
			if (data) {
				resolve().debug(data, message);
			} else {
				resolve().debug(message);
			}
		},
		fatal(message: string, data?: unknown): void {
			if (data) {
				resolve().fatal(data, message);
			} else {
				resolve().fatal(message);
			}
		},
		/**
		 * Creates a child logger with additional context
		 */
		child(bindings: Record<string, unknown>): Logger {
			const childLogger = resolve().child(bindings);
			return wrap(() => childLogger);
		},
	};
}

export const log: Logger = wrap(getLogger);

/**
 * Shuts down the logger (for cleanup in tests)
 */
export function shutdownLogger(): void {
	logger = null;
}
