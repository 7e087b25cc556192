/**
 * Log API Types
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
	level: LogLevel;
	pretty?: boolean;
	/** `stdout` (default), `stderr`, or a file path */
	destination?: string;
	redact?: string[];
}

export interface Logger {
	info(message: string, data?: unknown): void;
	warn(message: string, data?: unknown): void;
	error(message: string, data?: unknown): void;
	debug(message: string, data?: unknown): void;
	fatal(message: string, data?: unknown): void;
	child(bindings: Record<string, unknown>): Logger;
}
