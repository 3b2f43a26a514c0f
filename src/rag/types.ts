/**
 * Retrieval types: records, per-source outcomes, scored candidates, search response
 */

import { z } from 'zod';

// ── Records ─────────────────────────────────────────────

export type RecordStatus = 'committed' | 'pending' | 'deleted';

/** `qa`: title is a question, body its answer; `doc`: any other document */
export const recordKindSchema = z.enum(['qa', 'doc']);

export type RecordKind = z.infer<typeof recordKindSchema>;

export const recordPayloadSchema = z.object({
	title: z.string(),
	body: z.string(),
	reference: z.string().optional(),
	kind: recordKindSchema.default('doc'),
});

export type RecordPayload = z.infer<typeof recordPayloadSchema>;

export const knowledgeRecordSchema = recordPayloadSchema.extend({
	id: z.number().int().nonnegative(),
	status: z.enum(['committed', 'pending', 'deleted']).default('committed'),
});

export type KnowledgeRecord = z.infer<typeof knowledgeRecordSchema>;

// ── Source outcomes ─────────────────────────────────────

export type SourceName = 'lexical' | 'vector';

/**
 * What one retrieval source produced for a request. `skipped` and `empty`
 * contribute nothing but are not failures; `unavailable` is.
 */
export type SourceOutcome<T> =
	| { status: 'ok'; hits: T[] }
	| { status: 'empty'; hits: T[] }
	| { status: 'skipped'; hits: T[]; reason: string }
	| { status: 'unavailable'; hits: T[]; error: string };

export type SourceStatus = SourceOutcome<unknown>['status'];

export function sourceHits<T>(hits: T[]): SourceOutcome<T> {
	return hits.length > 0 ? { status: 'ok', hits } : { status: 'empty', hits: [] };
}

export function sourceSkipped<T>(reason: string): SourceOutcome<T> {
	return { status: 'skipped', hits: [], reason };
}

export function sourceUnavailable<T>(error: string): SourceOutcome<T> {
	return { status: 'unavailable', hits: [], error };
}

// ── Hits ────────────────────────────────────────────────

export interface LexicalHit<P> {
	id: number;
	payload: P;
	score: number;
}

export interface VectorHit<P> {
	id: number;
	payload: P;
	similarity: number;
	/** Set by the cascade: threshold the hit was found at */
	threshold?: number;
	/** Set by the cascade: found by the floor query */
	isFallback?: boolean;
}

export interface ScoredCandidate<P> {
	id: number;
	payload: P;
	lexicalScore?: number;
	vectorScore?: number;
	fusedScore: number;
	rerankScore?: number;
	threshold?: number;
	isFallback?: boolean;
}

// ── Search response (external contract) ─────────────────

export type SearchStatus = 'ok' | 'no_results' | 'unavailable';

export interface SearchResult {
	rank: number;
	id: number;
	kind: RecordKind;
	title: string;
	body: string;
	reference: string | null;
	fused_score: number;
	lexical_score?: number;
	vector_score?: number;
	rerank_score?: number;
	threshold?: number;
	is_fallback?: boolean;
}

export interface SearchResponse {
	query: string;
	status: SearchStatus;
	results: SearchResult[];
	rerank_used: boolean;
	sources: Record<SourceName, SourceStatus>;
	detected_lang: string;
	search_time_ms: number;
}

export interface SearchOptions {
	/** Results to return (defaults to search.rerankTopN) */
	limit?: number;
	useRerank?: boolean;
	/** Overrides search.useCascade */
	useCascade?: boolean;
	lexicalWeight?: number;
	vectorWeight?: number;
	/** Minimum similarity for vector hits; with the cascade, no step goes below it */
	vectorThreshold?: number;
	/** Only records of this kind */
	kind?: RecordKind;
}

// ── QA answers ──────────────────────────────────────────

export interface ExactAnswer {
	id: number;
	question: string;
	answer: string;
	reference: string | null;
	similarity: number;
}

/**
 * `exact`: a QA question is close enough to the query to answer directly;
 * otherwise the hybrid search over QA records.
 */
export interface QaResponse {
	query: string;
	status: 'exact' | SearchStatus;
	exact_answer: ExactAnswer | null;
	results: SearchResult[];
	search_time_ms: number;
}

/**
 * Searcher interface: query → ranked records
 */
export interface ISearcher {
	search(query: string, options?: SearchOptions): Promise<SearchResponse>;
}
