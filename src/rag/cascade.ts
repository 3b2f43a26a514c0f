/**
 * Adaptive threshold cascade
 *
 * Walks a descending similarity ladder, collecting new ids at each step until
 * `requested` items are found. If fewer than `minResults` were collected, one
 * floor query fills the gap and its hits are tagged `isFallback`.
 */

import type { PayloadMatch, SearchCollection } from '../store/types.js';
import type { VectorHit } from './types.js';
import { compareBySimilarity } from './vector.js';
import { Logger, errorMessage } from '../shared/logger.js';

export const DEFAULT_LADDER: readonly number[] = [0.95, 0.9, 0.8, 0.65];
export const DEFAULT_FLOOR_THRESHOLD = 0.5;
export const DEFAULT_MIN_RESULTS = 3;

export interface CascadeParams {
	ladder: readonly number[];
	floorThreshold: number;
	minResults: number;
	/** Target count; defaults to minResults */
	requested?: number;
	where?: PayloadMatch;
}

/**
 * Restrict the cascade to similarities ≥ `minThreshold`: ladder steps below it
 * are dropped (the threshold itself becomes the only step when none remain) and
 * the floor is raised to it.
 */
export function clampCascade<T extends CascadeParams>(params: T, minThreshold: number): T {
	const ladder = params.ladder.filter(t => t >= minThreshold);
	return {
		...params,
		ladder: ladder.length > 0 ? ladder : [minThreshold],
		floorThreshold: Math.max(params.floorThreshold, minThreshold),
	};
}

/**
 * - satisfied: minResults reached
 * - exhausted: floor query ran and still came up short
 * - unavailable: embedding failed, or every store query failed
 */
export type CascadeState = 'satisfied' | 'exhausted' | 'unavailable';

export interface CascadeStep {
	threshold: number;
	found: number;
	isFallback: boolean;
	error?: string;
}

export interface CascadeResult<P> {
	state: CascadeState;
	hits: VectorHit<P>[];
	steps: CascadeStep[];
}

/**
 * Run the cascade for an already-embedded query
 */
export async function runCascade<P>(
	collection: SearchCollection<P>,
	queryVector: readonly number[],
	params: CascadeParams,
	logger: Logger,
): Promise<CascadeResult<P>> {
	const requested = params.requested ?? params.minResults;
	const collected: VectorHit<P>[] = [];
	const seen = new Set<number>();
	const steps: CascadeStep[] = [];

	const query = async (threshold: number, limit: number, isFallback: boolean): Promise<void> => {
		try {
			const matches = await collection.nearest(queryVector, { threshold, limit, excludeIds: seen, where: params.where });
			const fresh = matches
				.filter(m => m.similarity >= threshold && !seen.has(m.id))
				.sort(compareBySimilarity)
				.slice(0, limit);
			for (const m of fresh) {
				seen.add(m.id);
				collected.push({
					id: m.id,
					payload: m.payload,
					similarity: m.similarity,
					threshold,
					isFallback,
				});
			}
			steps.push({ threshold, found: fresh.length, isFallback });
		} catch (error) {
			logger.warn(`Cascade step ${threshold} failed, continuing`, { error: errorMessage(error) });
			steps.push({ threshold, found: 0, isFallback, error: errorMessage(error) });
		}
	};

	for (const threshold of params.ladder) {
		if (collected.length >= requested) break;
		await query(threshold, requested - collected.length, false);
	}

	const lastStep = params.ladder[params.ladder.length - 1];
	// A floor at or above the last step cannot find anything new
	if (collected.length < params.minResults && (lastStep === undefined || params.floorThreshold < lastStep)) {
		await query(params.floorThreshold, params.minResults - collected.length, true);
	}

	const allFailed = steps.length > 0 && steps.every(s => s.error !== undefined);
	const state: CascadeState = allFailed
		? 'unavailable'
		: collected.length >= params.minResults ? 'satisfied' : 'exhausted';

	logger.debug(`Cascade ${state}`, {
		collected: collected.length,
		steps: steps.map(s => `${s.threshold}${s.isFallback ? '(floor)' : ''}:${s.error ? 'error' : s.found}`),
	});

	return { state, hits: collected, steps };
}

/**
 * Embed `query` once, then run the cascade. A failed embedding makes the
 * result `unavailable`; nothing is thrown.
 */
export async function adaptiveVectorSearch<P>(
	query: string,
	deps: {
		collection: SearchCollection<P>;
		embedQuery: (text: string) => Promise<number[]>;
		logger: Logger;
	},
	params: Partial<CascadeParams> = {},
): Promise<CascadeResult<P>> {
	const resolved: CascadeParams = {
		ladder: params.ladder ?? DEFAULT_LADDER,
		floorThreshold: params.floorThreshold ?? DEFAULT_FLOOR_THRESHOLD,
		minResults: params.minResults ?? DEFAULT_MIN_RESULTS,
		requested: params.requested,
		where: params.where,
	};

	let vector: number[];
	try {
		vector = await deps.embedQuery(query);
	} catch (error) {
		deps.logger.warn('Query embedding failed, cascade unavailable', { error: errorMessage(error) });
		return { state: 'unavailable', hits: [], steps: [] };
	}

	return runCascade(deps.collection, vector, resolved, deps.logger);
}
