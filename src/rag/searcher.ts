/**
 * Hybrid document searcher
 *
 * - lexical + vector legs in parallel, each reporting ok / empty / skipped / unavailable
 * - cross-language query: lexical leg skipped (term matching is meaningless across languages)
 * - vector leg: single threshold, or the adaptive cascade
 * - weighted RRF, then optional cross-encoder rerank
 * - QA answers: a QA record whose question is near enough to the query is
 *   returned directly, otherwise the hybrid search over QA records
 */

import type { CorpusStats, PayloadMatch, SearchCollection } from '../store/types.js';
import type {
	CascadeConfig,
	EmbeddingConfig,
	LexicalConfig,
	RerankConfig,
	SearchConfig,
} from '../config/types.js';
import { CorpusStatsCache, lexicalSearch } from './lexical.js';
import { vectorSearch } from './vector.js';
import { clampCascade, runCascade } from './cascade.js';
import { fuseHybrid } from './fusion.js';
import { candidateText, rerankCandidates } from './reranker.js';
import type { RerankClient } from './reranker.js';
import { embedQuery } from './embedder.js';
import type { EmbeddingClient } from './embedder.js';
import { detectLanguage } from './language-detect.js';
import { sourceSkipped, sourceHits, sourceUnavailable } from './types.js';
import type {
	ExactAnswer,
	ISearcher,
	LexicalHit,
	QaResponse,
	RecordKind,
	RecordPayload,
	ScoredCandidate,
	SearchOptions,
	SearchResponse,
	SearchResult,
	SearchStatus,
	SourceOutcome,
	VectorHit,
} from './types.js';
import { withRequestContext } from '../shared/request-context.js';
import { Logger, errorMessage } from '../shared/logger.js';

export interface SearcherSettings {
	lexical: LexicalConfig;
	search: SearchConfig;
	cascade: CascadeConfig;
	rerank: RerankConfig;
	embedding: EmbeddingConfig;
}

export interface SearcherConfig {
	collection: SearchCollection<RecordPayload>;
	embedder: EmbeddingClient;
	reranker?: RerankClient;
	statsCache: CorpusStatsCache;
	settings: SearcherSettings;
	logger?: Logger;
}

/**
 * Every attempted source unavailable → retrieval unavailable.
 * Skipped sources were never attempted.
 */
export function allSourcesUnavailable(outcomes: ReadonlyArray<SourceOutcome<unknown>>): boolean {
	const attempted = outcomes.filter(o => o.status !== 'skipped');
	return attempted.length > 0 && attempted.every(o => o.status === 'unavailable');
}

function kindFilter(kind: RecordKind | undefined): PayloadMatch | undefined {
	return kind === undefined ? undefined : { key: 'kind', value: kind };
}

function toSearchResult(c: ScoredCandidate<RecordPayload>, idx: number): SearchResult {
	const result: SearchResult = {
		rank: idx + 1,
		id: c.id,
		kind: c.payload.kind,
		title: c.payload.title,
		body: c.payload.body,
		reference: c.payload.reference ?? null,
		fused_score: c.fusedScore,
	};
	if (c.lexicalScore !== undefined) result.lexical_score = c.lexicalScore;
	if (c.vectorScore !== undefined) result.vector_score = c.vectorScore;
	if (c.rerankScore !== undefined) result.rerank_score = c.rerankScore;
	if (c.threshold !== undefined) result.threshold = c.threshold;
	if (c.isFallback !== undefined) result.is_fallback = c.isFallback;
	return result;
}

export class HybridSearcher implements ISearcher {
	private readonly collection: SearchCollection<RecordPayload>;
	private readonly embedder: EmbeddingClient;
	private readonly reranker: RerankClient | undefined;
	private readonly statsCache: CorpusStatsCache;
	private readonly settings: SearcherSettings;
	private readonly logger: Logger;

	constructor(config: SearcherConfig) {
		this.collection = config.collection;
		this.embedder = config.embedder;
		this.reranker = config.reranker;
		this.statsCache = config.statsCache;
		this.settings = config.settings;
		this.logger = config.logger ?? new Logger({ prefix: 'rag:searcher' });
	}

	async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
		return withRequestContext('search', () => this.run(query, options));
	}

	/**
	 * Answer from QA records: the closest question at or above
	 * search.qaExactThreshold is returned as-is; below it, hybrid search
	 * restricted to QA records.
	 */
	async answer(query: string, options: Omit<SearchOptions, 'kind'> = {}): Promise<QaResponse> {
		return withRequestContext('answer', async () => {
			const startTime = Date.now();
			const { exact, queryVector } = await this.exactAnswer(query);
			if (exact) {
				this.logger.info(`Exact QA answer ${exact.id} (similarity ${exact.similarity.toFixed(3)})`);
				return {
					query,
					status: 'exact',
					exact_answer: exact,
					results: [],
					search_time_ms: Date.now() - startTime,
				};
			}

			const response = await this.run(query, { ...options, kind: 'qa' }, queryVector);
			return {
				query,
				status: response.status,
				exact_answer: null,
				results: response.results,
				search_time_ms: Date.now() - startTime,
			};
		});
	}

	private async exactAnswer(query: string): Promise<{ exact?: ExactAnswer; queryVector?: number[] }> {
		if (query.trim().length === 0) {
			return {};
		}
		const { search, embedding } = this.settings;

		let queryVector: number[];
		try {
			queryVector = await embedQuery(this.embedder, query, embedding.timeoutMs);
		} catch (error) {
			this.logger.warn('Query embedding failed, no exact QA lookup', { error: errorMessage(error) });
			return {};
		}

		const outcome = await vectorSearch(
			this.collection,
			queryVector,
			{ threshold: search.qaExactThreshold, topK: 1, where: kindFilter('qa') },
			this.logger,
		);
		const top = outcome.hits[0];
		if (!top) {
			return { queryVector };
		}
		return {
			queryVector,
			exact: {
				id: top.id,
				question: top.payload.title,
				answer: top.payload.body,
				reference: top.payload.reference ?? null,
				similarity: top.similarity,
			},
		};
	}

	private async run(query: string, options: SearchOptions, queryVector?: number[]): Promise<SearchResponse> {
		const startTime = Date.now();
		const { search, rerank } = this.settings;
		const limit = options.limit ?? search.rerankTopN;
		const docLanguage = search.docLanguage;
		const detectedLang = detectLanguage(query, docLanguage ?? 'en');

		if (query.trim().length === 0) {
			return {
				query,
				status: 'no_results',
				results: [],
				rerank_used: false,
				sources: { lexical: 'empty', vector: 'empty' },
				detected_lang: detectedLang,
				search_time_ms: Date.now() - startTime,
			};
		}

		this.logger.info(`Search: "${query.substring(0, 50)}" lang=${detectedLang} doc=${docLanguage ?? '-'}`);

		const crossLanguage = docLanguage !== undefined && detectedLang !== docLanguage;
		const [lexical, vector] = await Promise.all([
			crossLanguage
				? Promise.resolve(sourceSkipped<LexicalHit<RecordPayload>>(`query language ${detectedLang} differs from ${docLanguage}`))
				: this.lexicalLeg(query, options),
			this.vectorLeg(query, options, queryVector),
		]);

		const sources = { lexical: lexical.status, vector: vector.status };
		this.logger.debug('Sources', { ...sources, lexical_hits: lexical.hits.length, vector_hits: vector.hits.length });

		if (allSourcesUnavailable([lexical, vector])) {
			this.logger.warn('All retrieval sources unavailable');
			return {
				query,
				status: 'unavailable',
				results: [],
				rerank_used: false,
				sources,
				detected_lang: detectedLang,
				search_time_ms: Date.now() - startTime,
			};
		}

		const fused = fuseHybrid(lexical.hits, vector.hits, {
			lexicalWeight: options.lexicalWeight ?? search.lexicalWeight,
			vectorWeight: options.vectorWeight ?? search.vectorWeight,
			k: search.rrfK,
		});

		let ranked: ScoredCandidate<RecordPayload>[];
		let rerankUsed = false;
		if ((options.useRerank ?? rerank.enabled) && this.reranker) {
			const outcome = await rerankCandidates(
				this.reranker,
				query,
				fused.slice(0, Math.max(rerank.candidateLimit, limit)),
				payload => candidateText(payload, rerank.maxTextLength),
				{ topN: limit, timeoutMs: rerank.timeoutMs },
				this.logger,
			);
			ranked = outcome.candidates;
			rerankUsed = outcome.used;
		} else {
			ranked = fused.slice(0, limit);
		}

		const results = ranked.map(toSearchResult);
		const status: SearchStatus = results.length > 0 ? 'ok' : 'no_results';
		this.logger.info(`Returning ${results.length} results`, { status, rerank_used: rerankUsed });

		return {
			query,
			status,
			results,
			rerank_used: rerankUsed,
			sources,
			detected_lang: detectedLang,
			search_time_ms: Date.now() - startTime,
		};
	}

	private async lexicalLeg(query: string, options: SearchOptions): Promise<SourceOutcome<LexicalHit<RecordPayload>>> {
		const { lexical } = this.settings;
		let stats: CorpusStats;
		try {
			// Read once per request
			stats = await this.statsCache.get(this.collection);
		} catch (error) {
			this.logger.warn('Corpus stats unavailable', { error: errorMessage(error) });
			return sourceUnavailable(errorMessage(error));
		}
		return lexicalSearch(this.collection, query, stats, { ...lexical, where: kindFilter(options.kind) }, this.logger);
	}

	private async vectorLeg(
		query: string,
		options: SearchOptions,
		precomputed?: number[],
	): Promise<SourceOutcome<VectorHit<RecordPayload>>> {
		const { search, cascade, embedding } = this.settings;
		const where = kindFilter(options.kind);

		let queryVector: number[];
		if (precomputed) {
			queryVector = precomputed;
		} else {
			try {
				queryVector = await embedQuery(this.embedder, query, embedding.timeoutMs);
			} catch (error) {
				this.logger.warn('Query embedding failed, vector source unavailable', { error: errorMessage(error) });
				return sourceUnavailable(errorMessage(error));
			}
		}

		if (options.useCascade ?? search.useCascade) {
			const params = { ...cascade, requested: Math.max(search.vectorTopK, cascade.minResults), where };
			const result = await runCascade(
				this.collection,
				queryVector,
				options.vectorThreshold !== undefined ? clampCascade(params, options.vectorThreshold) : params,
				this.logger,
			);
			return result.state === 'unavailable'
				? sourceUnavailable('every cascade query failed')
				: sourceHits(result.hits);
		}

		return vectorSearch(
			this.collection,
			queryVector,
			{ threshold: options.vectorThreshold ?? search.vectorThreshold, topK: search.vectorTopK, where },
			this.logger,
		);
	}
}

export function createSearcher(config: SearcherConfig): HybridSearcher {
	return new HybridSearcher(config);
}
