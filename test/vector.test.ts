import { describe, it, expect } from 'vitest';
import { cosineSimilarity, vectorSearch } from '../src/rag/vector.js';
import { EmbeddingDimensionError } from '../src/shared/errors.js';
import { FailingCollection, quietLogger, recordCollection, unit } from './helpers.js';

describe('cosineSimilarity', () => {
	it('should be 1 for parallel and 0 for orthogonal vectors', () => {
		expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
		expect(cosineSimilarity([1, 0], [0, 3])).toBe(0);
	});

	it('should be 0 when either vector has zero norm', () => {
		expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
	});

	it('should reject vectors of different length', () => {
		expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow(EmbeddingDimensionError);
	});
});

describe('vectorSearch', () => {
	const fixtures = [
		{ id: 1, title: 'a', body: '', vector: unit(0.99) },
		{ id: 2, title: 'b', body: '', vector: unit(0.8) },
		{ id: 3, title: 'c', body: '', vector: unit(0.6) },
		{ id: 4, title: 'd', body: '', vector: unit(0.1) },
		{ id: 5, title: 'e', body: '', vector: unit(0.8) },
		{ id: 6, title: 'f', body: '', vector: unit(0.99), status: 'deleted' as const },
	];

	it('should return committed entries above the threshold, best first, ties by id', async () => {
		const collection = await recordCollection(fixtures);
		const outcome = await vectorSearch(collection, [1, 0], { threshold: 0.5, topK: 10 }, quietLogger);

		expect(outcome.status).toBe('ok');
		expect(outcome.hits.map(h => h.id)).toEqual([1, 2, 5, 3]);
		expect(outcome.hits[0].similarity).toBeCloseTo(0.99, 12);
	});

	it('should return a subset when the threshold rises', async () => {
		const collection = await recordCollection(fixtures);
		const ids = async (threshold: number): Promise<number[]> =>
			(await vectorSearch(collection, [1, 0], { threshold, topK: 10 }, quietLogger)).hits.map(h => h.id);

		const loose = await ids(0.05);
		const medium = await ids(0.7);
		const strict = await ids(0.9);

		expect(loose).toEqual([1, 2, 5, 3, 4]);
		expect(medium).toEqual([1, 2, 5]);
		expect(strict).toEqual([1]);
	});

	it('should honour topK and excluded ids', async () => {
		const collection = await recordCollection(fixtures);
		const outcome = await vectorSearch(
			collection,
			[1, 0],
			{ threshold: 0.5, topK: 2, excludeIds: new Set([1]) },
			quietLogger,
		);

		expect(outcome.hits.map(h => h.id)).toEqual([2, 5]);
	});

	it('should report unavailable when the store fails', async () => {
		const outcome = await vectorSearch(new FailingCollection('records', 2), [1, 0], { threshold: 0.5, topK: 2 }, quietLogger);

		expect(outcome.status).toBe('unavailable');
	});
});
