/**
 * Vector searcher: cosine similarity against committed entries, similarity floor, top-K.
 */

import type { PayloadMatch, SearchCollection } from '../store/types.js';
import { sourceHits, sourceUnavailable } from './types.js';
import type { SourceOutcome, VectorHit } from './types.js';
import { EmbeddingDimensionError } from '../shared/errors.js';
import { Logger, errorMessage } from '../shared/logger.js';

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	if (a.length !== b.length) {
		throw new EmbeddingDimensionError(a.length, b.length);
	}
	let dot = 0;
	let normA = 0;
	let normB = 0;
	for (let i = 0; i < a.length; i++) {
		dot += a[i] * b[i];
		normA += a[i] * a[i];
		normB += b[i] * b[i];
	}
	if (normA === 0 || normB === 0) {
		return 0;
	}
	return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Similarity desc, then id asc */
export function compareBySimilarity(
	a: { id: number; similarity: number },
	b: { id: number; similarity: number },
): number {
	return b.similarity - a.similarity || a.id - b.id;
}

export interface VectorSearchParams {
	threshold: number;
	topK: number;
	excludeIds?: ReadonlySet<number>;
	where?: PayloadMatch;
}

/**
 * Query the collection; a store failure turns the source `unavailable`.
 */
export async function vectorSearch<P>(
	collection: SearchCollection<P>,
	queryVector: readonly number[],
	params: VectorSearchParams,
	logger: Logger,
): Promise<SourceOutcome<VectorHit<P>>> {
	try {
		const matches = await collection.nearest(queryVector, {
			threshold: params.threshold,
			limit: params.topK,
			excludeIds: params.excludeIds,
			where: params.where,
		});
		const hits: VectorHit<P>[] = matches
			.filter(m => m.similarity >= params.threshold)
			.sort(compareBySimilarity)
			.slice(0, params.topK)
			.map(m => ({ id: m.id, payload: m.payload, similarity: m.similarity }));
		return sourceHits(hits);
	} catch (error) {
		logger.warn(`Vector search on ${collection.name} failed`, { error: errorMessage(error) });
		return sourceUnavailable(errorMessage(error));
	}
}
