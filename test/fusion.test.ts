import { describe, it, expect } from 'vitest';
import { fuse, fuseHybrid, maxFusedScore, type FusionSource } from '../src/rag/fusion.js';
import { ConfigError } from '../src/shared/errors.js';

const X = 1;
const Y = 2;
const Z = 3;

const sourceA: FusionSource = { name: 'A', weight: 0.5, ids: [X, Z], scores: [5, 4] };
const sourceB: FusionSource = { name: 'B', weight: 0.5, ids: [Y, Z], scores: [0.9, 0.8] };

describe('fuse', () => {
	it('should rank an id found at rank 2 in both sources above two single-source rank-1 ids', () => {
		const fused = fuse([sourceA, sourceB], { k: 60 });

		expect(fused.map(f => f.id)).toEqual([Z, X, Y]);
		expect(fused[0].fusedScore).toBeCloseTo(1 / 62, 12);
		expect(fused[1].fusedScore).toBeCloseTo(0.5 / 61, 12);
		expect(fused[2].fusedScore).toBeCloseTo(0.5 / 61, 12);
	});

	it('should break equal fused scores by the larger single-source score, then id', () => {
		const tied = fuse([
			{ name: 'A', weight: 0.5, ids: [7], scores: [0.2] },
			{ name: 'B', weight: 0.5, ids: [4], scores: [0.2] },
			{ name: 'C', weight: 0.5, ids: [9], scores: [0.3] },
		]);

		expect(tied.map(f => f.id)).toEqual([9, 4, 7]);
	});

	it('should be independent of source order', () => {
		expect(fuse([sourceB, sourceA])).toEqual(fuse([sourceA, sourceB]));
	});

	it('should keep ids present in only one source', () => {
		const fused = fuse([
			{ name: 'lexical', weight: 0.4, ids: [10] },
			{ name: 'vector', weight: 0.6, ids: [20, 30] },
		]);

		const byId = new Map(fused.map(f => [f.id, f]));
		expect(byId.size).toBe(3);
		expect(byId.get(10)?.fusedScore).toBeCloseTo(0.4 / 61, 12);
		expect(byId.get(30)?.fusedScore).toBeCloseTo(0.6 / 62, 12);
		expect(byId.get(30)?.sources).toEqual({ vector: { rank: 2, score: undefined } });
	});

	it('should never score a single-source id above the same rank found in every source', () => {
		const single = fuse([
			{ name: 'A', weight: 0.5, ids: [1] },
			{ name: 'B', weight: 0.5, ids: [2] },
		]);
		const both = fuse([
			{ name: 'A', weight: 0.5, ids: [1] },
			{ name: 'B', weight: 0.5, ids: [1] },
		]);

		expect(single[0].fusedScore).toBeLessThanOrEqual(both[0].fusedScore);
		expect(both[0].fusedScore).toBeCloseTo(1 / 61, 12);
	});

	it('should order by the secondary key before source scores', () => {
		const fused = fuse(
			[
				{ name: 'lexical', weight: 0.5, ids: [10], scores: [9] },
				{ name: 'vector', weight: 0.5, ids: [20], scores: [0.1] },
			],
			{ secondaryKey: id => (id === 20 ? 5 : 1) },
		);

		expect(fused.map(f => f.id)).toEqual([20, 10]);
	});

	it('should count a repeated id at its first rank only', () => {
		const fused = fuse([{ name: 'A', weight: 1, ids: [1, 2, 1] }]);

		expect(fused.map(f => f.id)).toEqual([1, 2]);
		expect(fused[0].fusedScore).toBeCloseTo(1 / 61, 12);
	});

	it('should reject a non-positive k', () => {
		expect(() => fuse([sourceA], { k: 0 })).toThrow(ConfigError);
	});

	it('should return nothing for empty sources', () => {
		expect(fuse([])).toEqual([]);
		expect(fuse([{ name: 'A', weight: 1, ids: [] }])).toEqual([]);
	});
});

describe('maxFusedScore', () => {
	it('should equal the score of an id ranked first everywhere', () => {
		expect(maxFusedScore([0.4, 0.6], 60)).toBeCloseTo(1 / 61, 12);
		expect(maxFusedScore([1], 9)).toBe(0.1);
	});
});

describe('fuseHybrid', () => {
	it('should carry source scores and cascade annotations onto candidates', () => {
		const candidates = fuseHybrid(
			[{ id: 1, payload: 'one', score: 2.5 }],
			[
				{ id: 2, payload: 'two', similarity: 0.91, threshold: 0.9, isFallback: false },
				{ id: 1, payload: 'one', similarity: 0.55, threshold: 0.5, isFallback: true },
			],
			{ lexicalWeight: 0.4, vectorWeight: 0.6, k: 60 },
		);

		expect(candidates).toHaveLength(2);
		expect(candidates[0]).toEqual({
			id: 1,
			payload: 'one',
			fusedScore: 0.4 / 61 + 0.6 / 62,
			lexicalScore: 2.5,
			vectorScore: 0.55,
			threshold: 0.5,
			isFallback: true,
		});
		expect(candidates[1]).toEqual({
			id: 2,
			payload: 'two',
			fusedScore: 0.6 / 61,
			vectorScore: 0.91,
			threshold: 0.9,
			isFallback: false,
		});
	});
});
