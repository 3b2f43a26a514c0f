/**
 * Weighted Reciprocal Rank Fusion
 *
 * An id at 1-based rank r of a source adds weight / (k + r). Ids missing from a
 * source add nothing from it but are never dropped. One function serves both
 * document search and guideline matching.
 */

import type { LexicalHit, ScoredCandidate, VectorHit } from './types.js';
import { ConfigError } from '../shared/errors.js';

export const DEFAULT_RRF_K = 60;

export interface FusionSource {
	name: string;
	weight: number;
	/** Best first */
	ids: readonly number[];
	/** Original per-rank scores, parallel to `ids` */
	scores?: readonly number[];
}

export interface SourceContribution {
	rank: number;
	score?: number;
}

export interface FusedItem {
	id: number;
	fusedScore: number;
	/** Source name → rank/score, only for sources that contained the id */
	sources: Record<string, SourceContribution>;
}

export interface FuseOptions {
	k?: number;
	/** Tie-break, higher first (e.g. guideline priority) */
	secondaryKey?: (id: number) => number;
}

function bestSourceScore(item: FusedItem): number {
	let best = Number.NEGATIVE_INFINITY;
	for (const c of Object.values(item.sources)) {
		if (c.score !== undefined && c.score > best) {
			best = c.score;
		}
	}
	return best;
}

/**
 * Fuse ranked lists. Output order: fusedScore desc, secondary key desc,
 * largest single-source score desc, id asc. Independent of source order.
 */
export function fuse(sources: readonly FusionSource[], options: FuseOptions = {}): FusedItem[] {
	const k = options.k ?? DEFAULT_RRF_K;
	if (!(k > 0)) {
		throw new ConfigError(`RRF k must be positive, got ${k}`);
	}

	// Sum in a fixed source order so float addition does not depend on input order
	const ordered = [...sources].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : a.weight - b.weight));
	const items = new Map<number, FusedItem>();

	for (const source of ordered) {
		const seen = new Set<number>();
		source.ids.forEach((id, idx) => {
			if (seen.has(id)) return;
			seen.add(id);

			const rank = idx + 1;
			let item = items.get(id);
			if (!item) {
				item = { id, fusedScore: 0, sources: {} };
				items.set(id, item);
			}
			item.fusedScore += source.weight / (k + rank);
			item.sources[source.name] = { rank, score: source.scores?.[idx] };
		});
	}

	const secondary = options.secondaryKey;
	const best = new Map<number, number>();
	for (const item of items.values()) {
		best.set(item.id, bestSourceScore(item));
	}

	return [...items.values()].sort((a, b) => {
		if (a.fusedScore !== b.fusedScore) return b.fusedScore - a.fusedScore;
		if (secondary) {
			const diff = secondary(b.id) - secondary(a.id);
			if (diff !== 0) return diff;
		}
		const bestA = best.get(a.id) ?? Number.NEGATIVE_INFINITY;
		const bestB = best.get(b.id) ?? Number.NEGATIVE_INFINITY;
		if (bestA !== bestB) return bestB > bestA ? 1 : -1;
		return a.id - b.id;
	});
}

/** Fused score of an id ranked first in every source */
export function maxFusedScore(weights: readonly number[], k: number = DEFAULT_RRF_K): number {
	return weights.reduce((sum, w) => sum + w, 0) / (k + 1);
}

export interface HybridFusionParams {
	lexicalWeight: number;
	vectorWeight: number;
	k: number;
	secondaryKey?: (id: number) => number;
}

/**
 * Fuse lexical and vector hits into scored candidates carrying both source
 * scores and any cascade annotations.
 */
export function fuseHybrid<P>(
	lexical: readonly LexicalHit<P>[],
	vector: readonly VectorHit<P>[],
	params: HybridFusionParams,
): ScoredCandidate<P>[] {
	const fused = fuse(
		[
			{
				name: 'lexical',
				weight: params.lexicalWeight,
				ids: lexical.map(h => h.id),
				scores: lexical.map(h => h.score),
			},
			{
				name: 'vector',
				weight: params.vectorWeight,
				ids: vector.map(h => h.id),
				scores: vector.map(h => h.similarity),
			},
		],
		{ k: params.k, secondaryKey: params.secondaryKey },
	);

	const lexicalById = new Map(lexical.map(h => [h.id, h]));
	const vectorById = new Map(vector.map(h => [h.id, h]));
	const candidates: ScoredCandidate<P>[] = [];

	for (const item of fused) {
		const lex = lexicalById.get(item.id);
		const vec = vectorById.get(item.id);
		const payload = lex?.payload ?? vec?.payload;
		if (payload === undefined) continue;

		const candidate: ScoredCandidate<P> = { id: item.id, payload, fusedScore: item.fusedScore };
		if (lex) candidate.lexicalScore = lex.score;
		if (vec) {
			candidate.vectorScore = vec.similarity;
			if (vec.threshold !== undefined) candidate.threshold = vec.threshold;
			if (vec.isFallback !== undefined) candidate.isFallback = vec.isFallback;
		}
		candidates.push(candidate);
	}
	return candidates;
}
