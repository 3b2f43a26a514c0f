/**
 * Cross-encoder reranking
 *
 * Reranking is an optional quality pass: any failure (timeout, non-2xx,
 * malformed or empty payload) is logged and the fused ranking, truncated to
 * the requested size, is returned unchanged.
 */

import { z } from 'zod';
import type { ScoredCandidate } from './types.js';
import { ApiError } from '../shared/errors.js';
import { withTimeout } from '../shared/async.js';
import { Logger, errorMessage } from '../shared/logger.js';

export interface RerankScore {
	/** 0-based index into the submitted texts */
	index: number;
	score: number;
}

export interface RerankClient {
	readonly name: string;
	rerank(query: string, texts: string[], signal: AbortSignal): Promise<RerankScore[]>;
}

const rerankResponseSchema = z.array(
	z.object({
		index: z.number().int(),
		score: z.number(),
	}),
);

async function readErrorBody(response: Response): Promise<string> {
	try {
		return (await response.text()).slice(0, 200);
	} catch (error) {
		return `(unreadable body: ${errorMessage(error)})`;
	}
}

/**
 * Self-hosted cross-encoder: POST {baseUrl}/rerank {query, texts} → [{index, score}]
 */
export class HttpRerankClient implements RerankClient {
	readonly name = 'http';
	private readonly baseUrl: string;

	constructor(baseUrl: string, private readonly apiKey?: string) {
		this.baseUrl = baseUrl.replace(/\/$/, '');
	}

	async rerank(query: string, texts: string[], signal: AbortSignal): Promise<RerankScore[]> {
		const headers: Record<string, string> = { 'Content-Type': 'application/json' };
		if (this.apiKey) {
			headers['Authorization'] = `Bearer ${this.apiKey}`;
		}

		const response = await fetch(`${this.baseUrl}/rerank`, {
			method: 'POST',
			headers,
			body: JSON.stringify({ query, texts }),
			signal,
		});

		if (!response.ok) {
			throw new ApiError(`Rerank failed: ${response.status} ${await readErrorBody(response)}`, response.status);
		}

		const parsed = rerankResponseSchema.safeParse(await response.json());
		if (!parsed.success) {
			throw new ApiError(`Invalid rerank response: ${parsed.error.message}`);
		}
		return parsed.data;
	}
}

const voyageRerankResponseSchema = z.object({
	data: z.array(
		z.object({
			index: z.number().int(),
			relevance_score: z.number(),
		}),
	),
});

/**
 * Voyage hosted reranker
 */
export class VoyageRerankClient implements RerankClient {
	readonly name = 'voyage';
	private readonly baseUrl: string;

	constructor(
		private readonly apiKey: string,
		private readonly model: string,
		baseUrl = 'https://api.voyageai.com/v1',
	) {
		this.baseUrl = baseUrl.replace(/\/$/, '');
	}

	async rerank(query: string, texts: string[], signal: AbortSignal): Promise<RerankScore[]> {
		const response = await fetch(`${this.baseUrl}/rerank`, {
			method: 'POST',
			headers: {
				'Authorization': `Bearer ${this.apiKey}`,
				'Content-Type': 'application/json',
			},
			body: JSON.stringify({ query, documents: texts, model: this.model }),
			signal,
		});

		if (!response.ok) {
			throw new ApiError(`Voyage rerank failed: ${response.status} ${await readErrorBody(response)}`, response.status);
		}

		const parsed = voyageRerankResponseSchema.safeParse(await response.json());
		if (!parsed.success) {
			throw new ApiError(`Invalid rerank response: ${parsed.error.message}`);
		}
		return parsed.data.data.map(r => ({ index: r.index, score: r.relevance_score }));
	}
}

/** title + " " + body, cut to maxLength chars */
export function candidateText(payload: { title: string; body: string }, maxLength: number): string {
	return `${payload.title} ${payload.body}`.slice(0, maxLength);
}

export interface RerankOptions {
	topN: number;
	timeoutMs: number;
}

export interface RerankOutcome<P> {
	candidates: ScoredCandidate<P>[];
	used: boolean;
	/** Why the fused order was kept */
	fallbackReason?: string;
}

/**
 * Reorder `candidates` by cross-encoder score. Never throws.
 *
 * Out-of-range and repeated indices are ignored; candidates the service did
 * not score keep their fused order after the scored ones.
 */
export async function rerankCandidates<P>(
	client: RerankClient | undefined,
	query: string,
	candidates: readonly ScoredCandidate<P>[],
	toText: (payload: P) => string,
	options: RerankOptions,
	logger: Logger,
): Promise<RerankOutcome<P>> {
	const fallback = (reason: string): RerankOutcome<P> => ({
		candidates: candidates.slice(0, options.topN),
		used: false,
		fallbackReason: reason,
	});

	if (!client) {
		return fallback('no rerank client');
	}
	if (candidates.length < 2) {
		return fallback('fewer than 2 candidates');
	}

	const texts = candidates.map(c => toText(c.payload));
	let scores: RerankScore[];
	try {
		scores = await withTimeout(`rerank(${client.name})`, options.timeoutMs, (signal) =>
			client.rerank(query, texts, signal),
		);
	} catch (error) {
		logger.warn('Rerank failed, keeping fused order', { error: errorMessage(error) });
		return fallback(errorMessage(error));
	}

	if (scores.length === 0) {
		logger.warn('Rerank returned no scores, keeping fused order');
		return fallback('empty rerank response');
	}

	const seen = new Set<number>();
	const scored: Array<{ candidate: ScoredCandidate<P>; score: number; order: number }> = [];
	for (const s of scores) {
		if (s.index < 0 || s.index >= candidates.length || seen.has(s.index) || !Number.isFinite(s.score)) {
			continue;
		}
		seen.add(s.index);
		scored.push({ candidate: candidates[s.index], score: s.score, order: s.index });
	}

	if (scored.length === 0) {
		logger.warn('Rerank returned no usable index, keeping fused order');
		return fallback('no usable rerank index');
	}

	scored.sort((a, b) => b.score - a.score || a.order - b.order);
	const reordered: ScoredCandidate<P>[] = scored.map(s => ({ ...s.candidate, rerankScore: s.score }));
	candidates.forEach((c, idx) => {
		if (!seen.has(idx)) reordered.push(c);
	});

	logger.debug(`Reranked ${scored.length}/${candidates.length} candidates`);
	return { candidates: reordered.slice(0, options.topN), used: true };
}
