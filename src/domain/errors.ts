/**
 * Error taxonomy for the retrieval and generation pipeline.
 *
 * Every error carries a stable `code` so callers can tell failures apart
 * without matching on messages.
 */

export type QuizForgeErrorCode =
	| 'EMPTY_CORPUS'
	| 'NOT_FITTED'
	| 'CORRUPT_STATE'
	| 'INVALID_CONFIG'
	| 'MODEL_UNAVAILABLE';

/**
 * Base class for all pipeline errors
 */
export class QuizForgeError extends Error {
	readonly code: QuizForgeErrorCode;
	/** Whether repeating the same request may succeed */
	readonly retriable: boolean;

	constructor(code: QuizForgeErrorCode, message: string, options?: { cause?: unknown; retriable?: boolean }) {
		super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
		this.name = 'QuizForgeError';
		this.code = code;
		this.retriable = options?.retriable ?? false;
	}
}

/**
 * Raised when fitting a vector index on zero chunks
 */
export class EmptyCorpusError extends QuizForgeError {
	constructor(message = 'Cannot fit a vector index on an empty corpus') {
		super('EMPTY_CORPUS', message);
		this.name = 'EmptyCorpusError';
	}
}

/**
 * Raised when querying or persisting an index that has not been fit
 */
export class NotFittedError extends QuizForgeError {
	constructor(message = 'Vector index is not fitted yet. Call fit() first.') {
		super('NOT_FITTED', message);
		this.name = 'NotFittedError';
	}
}

/**
 * Raised when persisted index artifacts are missing or inconsistent
 */
export class CorruptStateError extends QuizForgeError {
	constructor(message: string, cause?: unknown) {
		super('CORRUPT_STATE', message, { cause });
		this.name = 'CorruptStateError';
	}
}

/**
 * Raised before any work starts when a generation config or settings value is invalid
 */
export class InvalidConfigError extends QuizForgeError {
	readonly issues: string[];

	constructor(issues: string[]) {
		super('INVALID_CONFIG', `Invalid configuration: ${issues.join('; ')}`);
		this.name = 'InvalidConfigError';
		this.issues = issues;
	}
}

/**
 * Raised when the model backend is unreachable or does not answer in time
 */
export class ModelUnavailableError extends QuizForgeError {
	constructor(message: string, cause?: unknown) {
		super('MODEL_UNAVAILABLE', message, { cause, retriable: true });
		this.name = 'ModelUnavailableError';
	}
}

/**
 * Narrow an unknown thrown value to a pipeline error
 */
export function isQuizForgeError(error: unknown): error is QuizForgeError {
	return error instanceof QuizForgeError;
}
