/**
 * Engine composition root
 *
 * Wires stores, embedder, reranker and chat client into the searcher, the
 * guideline matcher and the ensemble estimator. All collaborators are injected;
 * createEngineFromEnv builds the production set (Qdrant, Voyage, HTTP rerank,
 * OpenAI-compatible chat).
 */

import type { EngineConfig } from './config/types.js';
import { getEnv, type Env } from './config/env.js';
import { loadEngineConfig } from './config/loader.js';
import type { CorpusStats, SearchCollection } from './store/types.js';
import { QdrantCollection } from './store/qdrant.js';
import { CorpusStatsCache } from './rag/lexical.js';
import { HybridSearcher } from './rag/searcher.js';
import { createVoyageEmbedder, type EmbeddingClient } from './rag/embedder.js';
import { HttpRerankClient, VoyageRerankClient, type RerankClient } from './rag/reranker.js';
import { recordPayloadSchema } from './rag/types.js';
import type { QaResponse, RecordPayload, SearchOptions, SearchResponse } from './rag/types.js';
import { GuidelineMatcher } from './guidelines/matcher.js';
import { OpenAICompatChatClient, type ChatClient } from './guidelines/chat-client.js';
import { guidelinePayloadSchema } from './guidelines/types.js';
import type { GuidelinePayload, MatchOptions, MatchOutcome } from './guidelines/types.js';
import {
	ConfidenceEstimator,
	documentSearchPipeline,
	guidelinePipeline,
	type EnsembleReport,
	type StrategyName,
} from './ensemble/estimator.js';
import { ConfigError } from './shared/errors.js';
import { createVoyageRateLimiter } from './shared/rate-limiter.js';
import { Logger, createDefaultLogger } from './shared/logger.js';

export interface EngineDependencies {
	config: EngineConfig;
	records: SearchCollection<RecordPayload>;
	guidelines: SearchCollection<GuidelinePayload>;
	embedder: EmbeddingClient;
	reranker?: RerankClient;
	chatClient?: ChatClient;
	logger?: Logger;
}

/**
 * @throws ConfigError when the embedder, the config and the stores disagree on
 * the vector dimension
 */
export function checkDimensions(deps: EngineDependencies): void {
	const expected = deps.config.embedding.dimension;
	if (deps.embedder.dimension !== expected) {
		throw new ConfigError(
			`Embedder ${deps.embedder.model} produces ${deps.embedder.dimension}-dimension vectors, configured ${expected}`,
		);
	}
	for (const collection of [deps.records, deps.guidelines]) {
		if (collection.vectorSize !== expected) {
			throw new ConfigError(
				`Collection ${collection.name} stores ${collection.vectorSize}-dimension vectors, configured ${expected}`,
			);
		}
	}
}

export class RetrievalEngine {
	readonly config: EngineConfig;
	readonly searcher: HybridSearcher;
	readonly matcher: GuidelineMatcher;
	readonly estimator: ConfidenceEstimator;
	private readonly records: SearchCollection<RecordPayload>;
	private readonly guidelines: SearchCollection<GuidelinePayload>;
	private readonly statsCache: CorpusStatsCache;

	constructor(deps: EngineDependencies) {
		checkDimensions(deps);

		const { config } = deps;
		const logger = deps.logger ?? createDefaultLogger('engine');
		this.config = config;
		this.records = deps.records;
		this.guidelines = deps.guidelines;
		this.statsCache = new CorpusStatsCache(config.lexical.statsTtlMs);

		this.searcher = new HybridSearcher({
			collection: deps.records,
			embedder: deps.embedder,
			reranker: deps.reranker,
			statsCache: this.statsCache,
			settings: {
				lexical: config.lexical,
				search: config.search,
				cascade: config.cascade,
				rerank: config.rerank,
				embedding: config.embedding,
			},
			logger: logger.withPrefix('search'),
		});

		this.matcher = new GuidelineMatcher({
			collection: deps.guidelines,
			embedder: deps.embedder,
			chatClient: deps.chatClient,
			statsCache: this.statsCache,
			settings: {
				guidelines: config.guidelines,
				lexical: config.lexical,
				embedding: config.embedding,
			},
			logger: logger.withPrefix('guidelines'),
		});

		this.estimator = new ConfidenceEstimator({
			ensemble: config.ensemble,
			logger: logger.withPrefix('ensemble'),
		});
	}

	search(query: string, options?: SearchOptions): Promise<SearchResponse> {
		return this.searcher.search(query, options);
	}

	answer(query: string, options?: Omit<SearchOptions, 'kind'>): Promise<QaResponse> {
		return this.searcher.answer(query, options);
	}

	matchGuideline(context: string, options?: MatchOptions): Promise<MatchOutcome> {
		return this.matcher.match(context, options);
	}

	searchConfidence(query: string, strategies?: StrategyName[]): Promise<EnsembleReport> {
		return this.estimator.estimate(documentSearchPipeline(this.searcher, query, this.config.search.rrfK), strategies);
	}

	matchConfidence(context: string, strategies?: StrategyName[]): Promise<EnsembleReport> {
		return this.estimator.estimate(guidelinePipeline(this.matcher, context), strategies);
	}

	async corpusStats(): Promise<{ records: CorpusStats; guidelines: CorpusStats }> {
		const [records, guidelines] = await Promise.all([
			this.statsCache.get(this.records),
			this.statsCache.get(this.guidelines),
		]);
		return { records, guidelines };
	}

	/** Drop cached corpus statistics, e.g. after an external reindex */
	invalidateStats(): void {
		this.statsCache.invalidate();
	}
}

// ── Production wiring ───────────────────────────────────

export function createReranker(env: Env): RerankClient | undefined {
	switch (env.RERANK_PROVIDER) {
		case 'http':
			return new HttpRerankClient(env.RERANK_BASE_URL);
		case 'voyage':
			if (!env.VOYAGE_API_KEY) {
				throw new ConfigError('RERANK_PROVIDER=voyage requires VOYAGE_API_KEY');
			}
			return new VoyageRerankClient(env.VOYAGE_API_KEY, env.VOYAGE_RERANK_MODEL, env.VOYAGE_BASE_URL);
		case 'none':
			return undefined;
	}
}

export function createChatClient(env: Env): ChatClient | undefined {
	if (!env.LLM_BASE_URL) {
		return undefined;
	}
	return new OpenAICompatChatClient({
		baseUrl: env.LLM_BASE_URL,
		model: env.LLM_MODEL,
		apiKey: env.LLM_API_KEY,
	});
}

export function createEmbedder(env: Env, config: EngineConfig, logger?: Logger): EmbeddingClient {
	return createVoyageEmbedder({
		apiKey: env.VOYAGE_API_KEY,
		model: config.embedding.model,
		dimension: config.embedding.dimension,
		batchSize: config.embedding.batchSize,
		attemptTimeoutMs: config.embedding.attemptTimeoutMs,
		maxRetries: config.embedding.maxRetries,
		rateLimiter: createVoyageRateLimiter(env.VOYAGE_RPM_LIMIT, env.VOYAGE_TPM_LIMIT, logger),
		logger,
	});
}

export interface QdrantCollections {
	records: QdrantCollection<RecordPayload>;
	guidelines: QdrantCollection<GuidelinePayload>;
}

export function createQdrantCollections(env: Env, config: EngineConfig, logger?: Logger): QdrantCollections {
	return {
		records: new QdrantCollection({
			url: env.QDRANT_URL,
			apiKey: env.QDRANT_API_KEY,
			name: env.RECORDS_COLLECTION,
			vectorSize: config.embedding.dimension,
			payloadSchema: recordPayloadSchema,
			keywordFields: ['kind'],
			logger,
		}),
		guidelines: new QdrantCollection({
			url: env.QDRANT_URL,
			apiKey: env.QDRANT_API_KEY,
			name: env.GUIDELINES_COLLECTION,
			vectorSize: config.embedding.dimension,
			payloadSchema: guidelinePayloadSchema,
			logger,
		}),
	};
}

export interface CreateEngineOptions {
	/** Defaults to loadEngineConfig() */
	config?: EngineConfig;
	/** Replace the Qdrant collections, e.g. with in-memory snapshots */
	collections?: {
		records: SearchCollection<RecordPayload>;
		guidelines: SearchCollection<GuidelinePayload>;
	};
}

/**
 * Production engine: env + YAML config, Qdrant, Voyage, configured reranker and LLM
 * @throws ConfigError
 */
export async function createEngineFromEnv(options: CreateEngineOptions = {}): Promise<RetrievalEngine> {
	const env = getEnv();
	const config = options.config ?? await loadEngineConfig();
	const logger = createDefaultLogger('engine');

	const collections = options.collections ?? createQdrantCollections(env, config, logger.withPrefix('qdrant'));

	return new RetrievalEngine({
		config,
		records: collections.records,
		guidelines: collections.guidelines,
		embedder: createEmbedder(env, config, logger.withPrefix('embed')),
		reranker: createReranker(env),
		chatClient: createChatClient(env),
		logger,
	});
}
