/**
 * Lexical scorer (BM25-style)
 *
 *   score = termMatchRank × lengthNormalization
 *   termMatchRank       = Σ_t tf·(k1+1) / (tf+k1)      over distinct query terms in the doc
 *   lengthNormalization = log10(N+1) / (1 + log10(1 + b·len/avgLen))
 *
 * Lengths are token counts from the shared tokenizer.
 */

import type { CorpusStats, PayloadMatch, SearchCollection } from '../store/types.js';
import { queryTerms, termFrequencies } from './tokenizer.js';
import { sourceHits, sourceUnavailable } from './types.js';
import type { LexicalHit, SourceOutcome } from './types.js';
import { Logger, errorMessage } from '../shared/logger.js';

export interface Bm25Params {
	k1: number;
	b: number;
}

export function termMatchRank(
	terms: readonly string[],
	tf: ReadonlyMap<string, number>,
	k1: number,
): number {
	let rank = 0;
	for (const term of terms) {
		const freq = tf.get(term) ?? 0;
		if (freq > 0) {
			rank += (freq * (k1 + 1)) / (freq + k1);
		}
	}
	return rank;
}

export function lengthNormalization(docLength: number, stats: CorpusStats, b: number): number {
	const avg = stats.avgDocLength > 0 ? stats.avgDocLength : 1;
	return Math.log10(stats.totalDocs + 1) / (1 + Math.log10(1 + (b * docLength) / avg));
}

export function scoreDocument(
	terms: readonly string[],
	docTokens: readonly string[],
	stats: CorpusStats,
	params: Bm25Params,
): number {
	const rank = termMatchRank(terms, termFrequencies(docTokens), params.k1);
	if (rank === 0) {
		return 0;
	}
	return rank * lengthNormalization(docTokens.length, stats, params.b);
}

export interface LexicalSearchParams extends Bm25Params {
	topK: number;
	where?: PayloadMatch;
}

/**
 * Rank committed entries of `collection` against `query`. Every entry sharing
 * a term is scored before the top-K cut.
 * No matching term → `empty`; a store failure → `unavailable`.
 */
export async function lexicalSearch<P>(
	collection: SearchCollection<P>,
	query: string,
	stats: CorpusStats,
	params: LexicalSearchParams,
	logger: Logger,
): Promise<SourceOutcome<LexicalHit<P>>> {
	const terms = queryTerms(query);
	if (terms.length === 0) {
		return sourceHits([]);
	}

	try {
		const matches = await collection.matchTerms(terms, params.where);
		const hits: LexicalHit<P>[] = [];
		for (const m of matches) {
			const score = scoreDocument(terms, m.tokens, stats, params);
			if (score > 0) {
				hits.push({ id: m.id, payload: m.payload, score });
			}
		}
		hits.sort((a, b) => b.score - a.score || a.id - b.id);
		logger.debug(`Lexical: ${terms.length} terms, ${matches.length} matches`);
		return sourceHits(hits.slice(0, params.topK));
	} catch (error) {
		logger.warn(`Lexical search on ${collection.name} failed`, { error: errorMessage(error) });
		return sourceUnavailable(errorMessage(error));
	}
}

/**
 * Per-collection corpus-stats cache. Entries live `ttlMs`; 0 disables caching.
 * Concurrent misses for one collection share a single store call.
 */
export class CorpusStatsCache {
	private readonly entries = new Map<string, { stats: CorpusStats; expiresAt: number }>();
	private readonly inflight = new Map<string, Promise<CorpusStats>>();

	constructor(
		private readonly ttlMs: number,
		private readonly now: () => number = Date.now,
	) {}

	async get<P>(collection: SearchCollection<P>): Promise<CorpusStats> {
		const cached = this.entries.get(collection.name);
		if (cached && cached.expiresAt > this.now()) {
			return cached.stats;
		}

		const pending = this.inflight.get(collection.name);
		if (pending) {
			return pending;
		}

		const load = collection.corpusStats().then(
			(stats) => {
				if (this.ttlMs > 0) {
					this.entries.set(collection.name, { stats, expiresAt: this.now() + this.ttlMs });
				}
				return stats;
			},
		).finally(() => {
			this.inflight.delete(collection.name);
		});
		this.inflight.set(collection.name, load);
		return load;
	}

	invalidate(collectionName?: string): void {
		if (collectionName === undefined) {
			this.entries.clear();
		} else {
			this.entries.delete(collectionName);
		}
	}
}
