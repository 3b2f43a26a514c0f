import { describe, it, expect, afterEach, vi } from 'vitest';
import { VoyageEmbedder, createVoyageEmbedder, embedQuery, estimateTokens } from '../src/rag/embedder.js';
import type { VoyageEmbedApi } from '../src/rag/embedder.js';
import { RateLimiter } from '../src/shared/rate-limiter.js';
import { ConfigError, EmbeddingDimensionError, RateLimitError, TimeoutError } from '../src/shared/errors.js';
import { FakeEmbedder, never, quietLogger } from './helpers.js';

type EmbedRequest = Parameters<VoyageEmbedApi['embed']>[0];
type EmbedRequestOptions = Parameters<VoyageEmbedApi['embed']>[1];
type EmbedResponse = Awaited<ReturnType<VoyageEmbedApi['embed']>>;

function voyageClient(reply: (request: EmbedRequest, options: EmbedRequestOptions) => Promise<EmbedResponse>) {
	return { embed: vi.fn(reply) };
}

function voyageEmbedder(client: VoyageEmbedApi, options: { retryDelay?: number; rateLimiter?: RateLimiter } = {}) {
	return new VoyageEmbedder({
		apiKey: 'test-key',
		model: 'voyage-3-lite',
		dimension: 2,
		batchSize: 8,
		attemptTimeoutMs: 2_500,
		maxRetries: 3,
		retryDelay: options.retryDelay ?? 1,
		rateLimiter: options.rateLimiter,
		client,
		logger: quietLogger,
	});
}

describe('estimateTokens', () => {
	it('should count CJK characters more heavily than Latin ones', () => {
		expect(estimateTokens('abcde')).toBe(2);
		expect(estimateTokens('退款')).toBe(2);
		expect(estimateTokens('ab退款')).toBe(3);
		expect(estimateTokens('')).toBe(0);
	});
});

describe('embedQuery', () => {
	it('should return a vector of the configured dimension', async () => {
		const embedder = new FakeEmbedder(2, { refund: [0.6, 0.8] });

		expect(await embedQuery(embedder, 'refund', 100)).toEqual([0.6, 0.8]);
	});

	it('should reject a vector of another dimension', async () => {
		const embedder = new FakeEmbedder(2, {}, [1, 0, 0]);

		await expect(embedQuery(embedder, 'refund', 100)).rejects.toBeInstanceOf(EmbeddingDimensionError);
	});

	it('should give up after its deadline', async () => {
		const embedder = new FakeEmbedder(2);
		embedder.embed.mockImplementation(() => never<number[]>());

		const result = embedQuery(embedder, 'refund', 10);

		await expect(result).rejects.toBeInstanceOf(TimeoutError);
		await expect(result).rejects.toThrow('embed(fake-embed) timed out after 10ms');
	});

	it('should abort the client call when the deadline passes', async () => {
		const embedder = new FakeEmbedder(2);
		let seen: AbortSignal | undefined;
		embedder.embed.mockImplementation((_text, options) => {
			seen = options?.signal;
			return never<number[]>();
		});

		await expect(embedQuery(embedder, 'refund', 10)).rejects.toBeInstanceOf(TimeoutError);

		expect(seen?.aborted).toBe(true);
		expect(seen?.reason).toBeInstanceOf(TimeoutError);
	});
});

describe('VoyageEmbedder', () => {
	it('should pass the attempt timeout and the caller signal to the SDK', async () => {
		const client = voyageClient(async () => ({ data: [{ embedding: [0.6, 0.8] }] }));
		const controller = new AbortController();

		const vector = await voyageEmbedder(client).embed('refund', { signal: controller.signal });

		expect(vector).toEqual([0.6, 0.8]);
		expect(client.embed).toHaveBeenCalledWith(
			{ input: ['refund'], model: 'voyage-3-lite' },
			{ timeoutInSeconds: 3, maxRetries: 0, abortSignal: controller.signal },
		);
	});

	it('should retry a transient server error', async () => {
		const client = voyageClient(async () => ({ data: [{ embedding: [0.6, 0.8] }] }));
		client.embed.mockRejectedValueOnce(new Error('503 Service Unavailable'));

		expect(await voyageEmbedder(client).embed('refund')).toEqual([0.6, 0.8]);
		expect(client.embed).toHaveBeenCalledTimes(2);
	});

	it('should not retry once the caller has aborted', async () => {
		const controller = new AbortController();
		const client = voyageClient(async () => {
			controller.abort(new Error('caller gave up'));
			throw new Error('503 Service Unavailable');
		});

		await expect(voyageEmbedder(client).embed('refund', { signal: controller.signal })).rejects.toThrow('caller gave up');
		expect(client.embed).toHaveBeenCalledTimes(1);
	});

	it('should stop the backoff sleep when the caller aborts', async () => {
		const controller = new AbortController();
		const client = voyageClient(async () => {
			setTimeout(() => controller.abort(new Error('caller gave up')), 10);
			throw new Error('503 Service Unavailable');
		});

		const embedder = voyageEmbedder(client, { retryDelay: 60_000 });

		await expect(embedder.embed('refund', { signal: controller.signal })).rejects.toThrow('caller gave up');
		expect(client.embed).toHaveBeenCalledTimes(1);
	});

	it('should stop waiting for the rate limiter when the caller aborts', async () => {
		const rateLimiter = new RateLimiter({ requestsPerMinute: 1, tokensPerMinute: 1_000, now: () => 0 });
		rateLimiter.tryAcquire(1);
		const client = voyageClient(async () => ({ data: [{ embedding: [0.6, 0.8] }] }));
		const controller = new AbortController();
		setTimeout(() => controller.abort(new Error('caller gave up')), 10);

		const result = voyageEmbedder(client, { rateLimiter }).embed('refund', { signal: controller.signal });

		await expect(result).rejects.toThrow('caller gave up');
		expect(client.embed).not.toHaveBeenCalled();
	});

	it('should not retry when the rate limiter refuses', async () => {
		const rateLimiter = new RateLimiter({ requestsPerMinute: 1, tokensPerMinute: 1_000, maxWaitMs: 0, now: () => 0 });
		rateLimiter.tryAcquire(1);
		const client = voyageClient(async () => ({ data: [{ embedding: [0.6, 0.8] }] }));

		await expect(voyageEmbedder(client, { rateLimiter }).embed('refund')).rejects.toBeInstanceOf(RateLimitError);
		expect(client.embed).not.toHaveBeenCalled();
	});
});

describe('createVoyageEmbedder', () => {
	afterEach(() => {
		vi.unstubAllEnvs();
	});

	it('should require an API key', () => {
		vi.stubEnv('VOYAGE_API_KEY', '');

		expect(() => createVoyageEmbedder()).toThrow('VOYAGE_API_KEY is required');
	});

	it('should reject unknown models and mismatched dimensions', () => {
		expect(() => createVoyageEmbedder({ apiKey: 'test-key', model: 'voyage-unknown' })).toThrow(ConfigError);
		expect(() => createVoyageEmbedder({ apiKey: 'test-key', model: 'voyage-3', dimension: 512 }))
			.toThrow('Model voyage-3 produces 1024-dimension vectors, configured 512');
	});

	it('should take the dimension from the model by default', () => {
		const embedder = createVoyageEmbedder({ apiKey: 'test-key', model: 'voyage-3-lite' });

		expect(embedder.model).toBe('voyage-3-lite');
		expect(embedder.dimension).toBe(512);
	});
});
