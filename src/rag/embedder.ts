/**
 * Embedding clients
 *
 * EmbeddingClient is what the engine depends on; VoyageEmbedder wraps the
 * voyageai SDK with batching by estimated tokens, rate limiting and retry
 * with exponential backoff. Vectors of the wrong length are rejected, never
 * truncated or padded.
 *
 * A call's signal reaches the HTTP request, the rate-limiter wait and the
 * backoff sleep; once it aborts no further attempt starts.
 */

import { VoyageAIClient } from 'voyageai';
import { RateLimiter } from '../shared/rate-limiter.js';
import { ApiError, ConfigError, EmbeddingDimensionError, RateLimitError } from '../shared/errors.js';
import { abortReason, sleep, withTimeout } from '../shared/async.js';
import { Logger, errorMessage } from '../shared/logger.js';

export interface EmbedResult {
	text: string;
	embedding: number[];
	/** Estimated tokens */
	tokens: number;
}

export interface EmbedCallOptions {
	signal?: AbortSignal;
}

export interface EmbeddingClient {
	readonly model: string;
	readonly dimension: number;
	embed(text: string, options?: EmbedCallOptions): Promise<number[]>;
	embedBatch(texts: string[], options?: EmbedCallOptions): Promise<EmbedResult[]>;
}

/** The part of VoyageAIClient the embedder calls */
export interface VoyageEmbedApi {
	embed(
		request: { input: string[]; model: string },
		requestOptions: { timeoutInSeconds: number; maxRetries: number; abortSignal?: AbortSignal },
	): Promise<{ data?: Array<{ embedding?: number[] }> }>;
}

/** Output dimension of known Voyage models */
export const VOYAGE_MODEL_DIMENSIONS: Readonly<Record<string, number>> = {
	'voyage-3': 1024,
	'voyage-3-large': 1024,
	'voyage-3-lite': 512,
	'voyage-multilingual-2': 1024,
	'voyage-finance-2': 1024,
	'voyage-law-2': 1024,
	'voyage-code-2': 1536,
	'voyage-code-3': 1024,
	'voyage-large-2': 1536,
	'voyage-2': 1024,
};

/** Voyage per-batch token cap is 120k; keep half as margin for estimation error */
const MAX_BATCH_TOKENS = 60_000;

/**
 * Rough token estimate: 2.5 chars/token for Latin text and code, 1.5 for CJK
 */
export function estimateTokens(text: string): number {
	const cjkChars = (text.match(/[\u3040-\u30ff\u4e00-\u9fff\uac00-\ud7af]/g) ?? []).length;
	const otherChars = text.length - cjkChars;
	return Math.ceil(cjkChars / 1.5 + otherChars / 2.5);
}

/**
 * @throws EmbeddingDimensionError
 */
export function assertDimension(vector: readonly number[], expected: number): void {
	if (vector.length !== expected) {
		throw new EmbeddingDimensionError(expected, vector.length);
	}
}

/**
 * Embed one query under its own deadline and check its length. The deadline
 * aborts the client call.
 * @throws TimeoutError | EmbeddingDimensionError | whatever the client throws
 */
export async function embedQuery(
	embedder: EmbeddingClient,
	text: string,
	timeoutMs: number,
): Promise<number[]> {
	const vector = await withTimeout(`embed(${embedder.model})`, timeoutMs, signal => embedder.embed(text, { signal }));
	assertDimension(vector, embedder.dimension);
	return vector;
}

export interface EmbedderConfig {
	apiKey: string;
	model: string;
	dimension: number;
	batchSize: number;
	/** SDK timeout of a single attempt */
	attemptTimeoutMs?: number;
	maxRetries?: number;
	/** Initial backoff (ms), doubled per attempt */
	retryDelay?: number;
	rateLimiter?: RateLimiter;
	/** Defaults to a VoyageAIClient for apiKey */
	client?: VoyageEmbedApi;
	logger?: Logger;
}

export class VoyageEmbedder implements EmbeddingClient {
	readonly model: string;
	readonly dimension: number;
	private readonly client: VoyageEmbedApi;
	private readonly batchSize: number;
	private readonly attemptTimeoutMs: number;
	private readonly maxRetries: number;
	private readonly retryDelay: number;
	private readonly rateLimiter: RateLimiter | undefined;
	private readonly logger: Logger;

	constructor(config: EmbedderConfig) {
		this.client = config.client ?? new VoyageAIClient({ apiKey: config.apiKey });
		this.model = config.model;
		this.dimension = config.dimension;
		this.batchSize = config.batchSize;
		this.attemptTimeoutMs = config.attemptTimeoutMs ?? 5_000;
		this.maxRetries = config.maxRetries ?? 3;
		this.retryDelay = config.retryDelay ?? 1000;
		this.rateLimiter = config.rateLimiter;
		this.logger = config.logger ?? new Logger();
	}

	async embed(text: string, options: EmbedCallOptions = {}): Promise<number[]> {
		const [result] = await this.embedBatch([text], options);
		if (!result) {
			throw new ApiError('Voyage returned no embedding');
		}
		return result.embedding;
	}

	/**
	 * Embed many texts, split into batches by count and estimated tokens
	 */
	async embedBatch(texts: string[], options: EmbedCallOptions = {}): Promise<EmbedResult[]> {
		if (texts.length === 0) {
			return [];
		}

		const allResults: EmbedResult[] = [];
		let batch: string[] = [];
		let batchTokens = 0;

		for (const text of texts) {
			const tokens = estimateTokens(text);

			if (batch.length > 0 && (batchTokens + tokens > MAX_BATCH_TOKENS || batch.length >= this.batchSize)) {
				allResults.push(...await this.embedBatchWithRetry(batch, options.signal));
				batch = [];
				batchTokens = 0;
			}

			batch.push(text);
			batchTokens += tokens;
		}

		if (batch.length > 0) {
			allResults.push(...await this.embedBatchWithRetry(batch, options.signal));
		}

		return allResults;
	}

	private async embedBatchWithRetry(texts: string[], signal: AbortSignal | undefined, attempt = 1): Promise<EmbedResult[]> {
		try {
			signal?.throwIfAborted();
			const totalTokens = texts.reduce((sum, text) => sum + estimateTokens(text), 0);
			await this.rateLimiter?.acquire(totalTokens, signal);

			this.logger.debug(`Embedding ${texts.length} texts, ~${totalTokens} tokens`);

			const response = await this.client.embed(
				{ input: texts, model: this.model },
				{ timeoutInSeconds: Math.ceil(this.attemptTimeoutMs / 1000), maxRetries: 0, abortSignal: signal },
			);

			const embeddings = response.data ?? [];
			const results: EmbedResult[] = texts.map((text, idx) => ({
				text,
				embedding: embeddings[idx]?.embedding ?? [],
				tokens: estimateTokens(text),
			}));

			for (const result of results) {
				assertDimension(result.embedding, this.dimension);
			}

			return results;
		} catch (error) {
			if (signal?.aborted) {
				throw abortReason(signal);
			}
			if (error instanceof EmbeddingDimensionError || error instanceof RateLimitError) {
				throw error;
			}

			if (attempt < this.maxRetries && this.isRetryableError(error)) {
				const delay = this.retryDelay * Math.pow(2, attempt - 1);
				this.logger.warn(`Embed failed (attempt ${attempt}), retrying in ${delay}ms`, { error: errorMessage(error) });
				await sleep(delay, signal);
				return this.embedBatchWithRetry(texts, signal, attempt + 1);
			}

			throw new ApiError(
				`Failed to embed texts after ${attempt} attempts: ${errorMessage(error)}`,
				undefined,
				error instanceof Error ? error : undefined,
			);
		}
	}

	private isRetryableError(error: unknown): boolean {
		if (error instanceof Error) {
			const message = error.message.toLowerCase();
			return (
				message.includes('timeout') ||
				message.includes('econnreset') ||
				message.includes('econnrefused') ||
				message.includes('429') ||
				message.includes('500') ||
				message.includes('502') ||
				message.includes('503') ||
				message.includes('529')
			);
		}
		return false;
	}
}

export interface CreateVoyageEmbedderOptions {
	apiKey?: string;
	model?: string;
	dimension?: number;
	batchSize?: number;
	attemptTimeoutMs?: number;
	maxRetries?: number;
	rateLimiter?: RateLimiter;
	client?: VoyageEmbedApi;
	logger?: Logger;
}

/**
 * @throws ConfigError when the key is missing, the model is unknown, or the
 * configured dimension differs from the model's
 */
export function createVoyageEmbedder(options: CreateVoyageEmbedderOptions = {}): VoyageEmbedder {
	const apiKey = options.apiKey ?? process.env.VOYAGE_API_KEY;
	if (!apiKey) {
		throw new ConfigError('VOYAGE_API_KEY is required');
	}

	const model = options.model ?? 'voyage-3';
	const modelDim = VOYAGE_MODEL_DIMENSIONS[model];
	if (modelDim === undefined) {
		throw new ConfigError(`Unknown Voyage model: ${model}`);
	}

	const dimension = options.dimension ?? modelDim;
	if (dimension !== modelDim) {
		throw new ConfigError(`Model ${model} produces ${modelDim}-dimension vectors, configured ${dimension}`);
	}

	return new VoyageEmbedder({
		apiKey,
		model,
		dimension,
		batchSize: options.batchSize ?? 64,
		attemptTimeoutMs: options.attemptTimeoutMs,
		maxRetries: options.maxRetries,
		rateLimiter: options.rateLimiter,
		client: options.client,
		logger: options.logger,
	});
}
