import pino from 'pino';
import type { LogLevel, LoggerConfig, Logger } from './types.js';

export type { LogLevel, LoggerConfig, Logger } from './types.js';

let logger: pino.Logger | null = null;

const DEFAULT_REDACT = ['password', '*.password', 'redis.password', 'authorization'];

/**
 * Initializes the logger with configuration
 */
export function initializeLogger(config?: LoggerConfig): pino.Logger {
	const options: pino.LoggerOptions = {
		level: config?.level ?? 'info',
		timestamp: pino.stdTimeFunctions.isoTime,
		formatters: {
			level: (label) => {
				return { level: label };
			},
		},
		redact: {
			paths: config?.redact ?? DEFAULT_REDACT,
			censor: '[REDACTED]',
		},
	};

	if (config?.pretty) {
		logger = pino({
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
	} else if (config?.destination === 'stderr') {
		logger = pino(options, pino.destination(2));
	} else if (config?.destination && config.destination !== 'stdout') {
		logger = pino(options, pino.destination(config.destination));
	} else {
		logger = pino(options);
	}
	return logger;
}

/**
 * Gets or initializes the logger
 */
function getLogger(): pino.Logger {
	return logger ?? initializeLogger({ level: 'info', pretty: false });
}

type Level = Exclude<LogLevel, 'silent'>;

function write(target: pino.Logger, level: Level, message: string, data?: unknown): void {
	if (data) {
		target[level](data, message);
	} else {
		target[level](message);
	}
}

/**
 * Child loggers resolve the root lazily so that a later `initializeLogger`
 * call (tests, CLI flags) still takes effect for module-level children.
 */
function createLogger(resolve: () => pino.Logger): Logger {
	return {
		info: (message, data) => write(resolve(), 'info', message, data),
		warn: (message, data) => write(resolve(), 'warn', message, data),
		error: (message, data) => write(resolve(), 'error', message, data),
		debug: (message, data) => write(resolve(), 'debug', message, data),
		fatal: (message, data) => write(resolve(), 'fatal', message, data),
		child: (bindings) => {
			let cached: { root: pino.Logger; child: pino.Logger } | null = null;
			return createLogger(() => {
				const root = resolve();
				if (!cached || cached.root !== root) {
					cached = { root, child: root.child(bindings) };
				}
				return cached.child;
			});
		},
	};
}

export const log: Logger = createLogger(getLogger);

/**
 * Shuts down the logger (for cleanup in tests)
 */
export function shutdownLogger(): void {
	logger = null;
}
