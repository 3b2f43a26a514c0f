/**
 * Shared error types
 */

/**
 * Invalid configuration: fatal at load or construction time, never raised per request
 */
export class ConfigError extends Error {
	constructor(message: string, public readonly cause?: Error) {
		super(message);
		this.name = 'ConfigError';
		Error.captureStackTrace?.(this, ConfigError);
	}
}

/**
 * Index/store query failure
 */
export class SearchError extends Error {
	constructor(message: string, public readonly cause?: Error) {
		super(message);
		this.name = 'SearchError';
		Error.captureStackTrace?.(this, SearchError);
	}
}

/**
 * External API call failure (embedding, rerank, chat)
 */
export class ApiError extends Error {
	constructor(
		message: string,
		public readonly statusCode?: number,
		public readonly cause?: Error,
	) {
		super(message);
		this.name = 'ApiError';
		Error.captureStackTrace?.(this, ApiError);
	}
}

export class RateLimitError extends Error {
	constructor(
		message: string,
		public readonly retryAfter?: number,
	) {
		super(message);
		this.name = 'RateLimitError';
		Error.captureStackTrace?.(this, RateLimitError);
	}
}

/**
 * An external call exceeded its own deadline
 */
export class TimeoutError extends Error {
	constructor(
		public readonly operation: string,
		public readonly timeoutMs: number,
	) {
		super(`${operation} timed out after ${timeoutMs}ms`);
		this.name = 'TimeoutError';
		Error.captureStackTrace?.(this, TimeoutError);
	}
}

/**
 * Embedding vector length differs from the configured dimension.
 * Vectors are never truncated or padded.
 */
export class EmbeddingDimensionError extends Error {
	constructor(
		public readonly expected: number,
		public readonly actual: number,
	) {
		super(`Embedding dimension mismatch: expected ${expected}, got ${actual}`);
		this.name = 'EmbeddingDimensionError';
		Error.captureStackTrace?.(this, EmbeddingDimensionError);
	}
}

/** fs error for a missing file or directory */
export function isNotFoundError(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
