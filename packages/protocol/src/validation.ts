/**
 * Error classes for configuration and backend initialization
 */

export type ConfigErrorCode =
	| 'FILE_NOT_FOUND'
	| 'UNSUPPORTED_FORMAT'
	| 'PARSE_ERROR'
	| 'VALIDATION_ERROR';

export class ConfigLoadError extends Error {
	constructor(
		message: string,
		public readonly code: ConfigErrorCode,
		public readonly path?: string,
		cause?: unknown
	) {
		super(message, { cause });
		this.name = 'ConfigLoadError';
	}
}

export class ConfigValidationError extends Error {
	constructor(
		message: string,
		public readonly field: string,
		public readonly value: unknown
	) {
		super(message);
		this.name = 'ConfigValidationError';
	}
}

/**
 * Raised when a backend cannot be constructed (unreachable store, bad
 * connection string, unusable directory). The cache manager converts it into
 * a no-op fallback.
 */
export class CacheInitError extends Error {
	constructor(
		message: string,
		public readonly backend: string,
		cause?: unknown
	) {
		super(message, { cause });
		this.name = 'CacheInitError';
	}
}
