import { describe, it, expect } from 'vitest';
import { RetrievalEngine, createChatClient, createReranker } from '../src/engine.js';
import { resolveEngineConfig } from '../src/config/loader.js';
import { envSchema } from '../src/config/env.js';
import { HttpRerankClient } from '../src/rag/reranker.js';
import { OpenAICompatChatClient } from '../src/guidelines/chat-client.js';
import { ConfigError } from '../src/shared/errors.js';
import { FakeEmbedder, guidelineCollection, quietLogger, recordCollection, unit } from './helpers.js';

const config = resolveEngineConfig({ embedding: { dimension: 2 } });

async function engine(embedder = new FakeEmbedder(2, { apple: [1, 0], 'refund order': [1, 0] })) {
	const records = await recordCollection([
		{ id: 1, title: 'Apple pie', body: 'recipe', vector: unit(0.92) },
		{ id: 2, title: 'Banana bread', body: '', vector: unit(0.2) },
		{ id: 3, title: 'Apple cider', body: '', vector: unit(0.55) },
	]);
	const guidelines = await guidelineCollection([
		{ id: 11, title: 'Refund', condition: 'refund order', action: 'explain refunds', priority: 1, vector: unit(0.9) },
		{ id: 12, title: 'Password', condition: 'password reset', action: 'send link', priority: 1, vector: unit(0.3) },
	]);
	return {
		records,
		engine: new RetrievalEngine({ config, records, guidelines, embedder, logger: quietLogger }),
	};
}

describe('RetrievalEngine', () => {
	it('should refuse an embedder whose dimension differs from the config', async () => {
		await expect(engine(new FakeEmbedder(3))).rejects.toThrow(
			'Embedder fake-embed produces 3-dimension vectors, configured 2',
		);
	});

	it('should refuse a collection whose vector size differs from the config', async () => {
		const records = await recordCollection([], 3);
		const guidelines = await guidelineCollection([]);

		expect(() => new RetrievalEngine({ config, records, guidelines, embedder: new FakeEmbedder(2), logger: quietLogger }))
			.toThrow(ConfigError);
	});

	it('should search records and match guidelines', async () => {
		const { engine: e } = await engine();

		const search = await e.search('apple');
		expect(search.results.map(r => r.id)).toEqual([1, 3]);
		expect(search.rerank_used).toBe(false);

		const match = await e.matchGuideline('refund order');
		expect(match.status === 'matched' && match.match.rule_id).toBe(11);
	});

	it('should agree across strategies for a clear search answer', async () => {
		const { engine: e } = await engine();

		const report = await e.searchConfidence('apple');

		expect(report.key).toBe(1);
		expect(report.consistency).toBe(1);
		expect(report.confidence).toBeCloseTo(0.4 * 61 / 62 + 0.6, 12);
		expect(report.is_reliable).toBe(true);
	});

	it('should estimate guideline confidence over the chosen strategies', async () => {
		const { engine: e } = await engine();

		const report = await e.matchConfidence('refund order', ['balanced', 'lexical_heavy']);

		expect(report.runs.map(r => r.strategy)).toEqual(['balanced', 'lexical_heavy']);
		expect(report.key).toBe(11);
	});

	it('should cache corpus statistics until invalidated', async () => {
		const { engine: e, records } = await engine();

		expect(await e.corpusStats()).toEqual({
			records: { totalDocs: 3, avgDocLength: 7 / 3 },
			guidelines: { totalDocs: 2, avgDocLength: 2 },
		});

		await records.upsert([{ id: 4, payload: { title: 'Cherry', body: 'tart', kind: 'doc' }, vector: [1, 0], text: 'Cherry tart', status: 'committed' }]);
		expect((await e.corpusStats()).records.totalDocs).toBe(3);

		e.invalidateStats();
		expect((await e.corpusStats()).records).toEqual({ totalDocs: 4, avgDocLength: 9 / 4 });
	});
});

describe('production wiring', () => {
	it('should build the configured reranker', () => {
		expect(createReranker(envSchema.parse({ RERANK_PROVIDER: 'none' }))).toBeUndefined();
		expect(createReranker(envSchema.parse({}))).toBeInstanceOf(HttpRerankClient);
		expect(() => createReranker(envSchema.parse({ RERANK_PROVIDER: 'voyage' }))).toThrow(ConfigError);
	});

	it('should build a chat client only when an LLM endpoint is configured', () => {
		expect(createChatClient(envSchema.parse({}))).toBeUndefined();

		const client = createChatClient(envSchema.parse({ LLM_BASE_URL: 'http://llm.test/v1', LLM_MODEL: 'test-model' }));
		expect(client).toBeInstanceOf(OpenAICompatChatClient);
		expect(client?.model).toBe('test-model');
	});
});
