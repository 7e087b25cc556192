/**
 * Raised when the EPSS API answers with a non-2xx status
 */
export class EpssApiError extends Error {
	constructor(
		message: string,
		public readonly status: number,
		public readonly url: string
	) {
		super(message);
		this.name = 'EpssApiError';
	}
}

/**
 * Raised when the response body is not a JSON object
 */
export class EpssResponseError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, { cause });
		this.name = 'EpssResponseError';
	}
}
