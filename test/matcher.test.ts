import { describe, it, expect } from 'vitest';
import { createMatcher, resolveInstruction, type GuidelineMatcher } from '../src/guidelines/matcher.js';
import { CorpusStatsCache } from '../src/rag/lexical.js';
import { resolveEngineConfig } from '../src/config/loader.js';
import type { SearchCollection } from '../src/store/types.js';
import type { GuidelinePayload } from '../src/guidelines/types.js';
import {
	FailingCollection,
	FakeChatClient,
	FakeEmbedder,
	guidelineCollection,
	never,
	quietLogger,
	unit,
} from './helpers.js';

const REFUND_CONTEXT = 'refund for my order';

const guidelines = [
	{
		id: 101,
		title: 'Refund request',
		condition: 'customer asks for a refund on an order',
		action: 'Explain the refund policy',
		priority: 3,
		vector: unit(0.95),
		promptOverride: 'Use the refund script',
	},
	{ id: 102, title: 'Password reset', condition: 'customer cannot reset password', action: 'Send reset link', priority: 2, vector: unit(0.8) },
	{ id: 103, title: 'Angry customer', condition: 'customer is angry', action: 'Escalate', priority: 5, vector: unit(0.1) },
	{ id: 104, title: 'Shipping delay', condition: 'order shipping is delayed', action: 'Share tracking', priority: 1, vector: unit(0.75) },
	{ id: 105, title: 'Cancel order', condition: 'customer wants to cancel an order', action: 'Cancel it', priority: 4, vector: unit(0.72) },
];

function embedder(): FakeEmbedder {
	return new FakeEmbedder(2, {
		[REFUND_CONTEXT]: [1, 0],
		'help me': [1, 0],
		'hello there': [-1, 0],
	});
}

async function matcherFor(
	options: {
		chat?: FakeChatClient;
		collection?: SearchCollection<GuidelinePayload>;
		embedder?: FakeEmbedder;
	} = {},
): Promise<GuidelineMatcher> {
	const config = resolveEngineConfig({ embedding: { dimension: 2 }, guidelines: { llmTimeoutMs: 20 } });
	return createMatcher({
		collection: options.collection ?? await guidelineCollection(guidelines),
		embedder: options.embedder ?? embedder(),
		chatClient: options.chat,
		statsCache: new CorpusStatsCache(0),
		settings: config,
		logger: quietLogger,
	});
}

describe('GuidelineMatcher', () => {
	it('should shortlist by fused score and pick the top candidate without an LLM', async () => {
		const matcher = await matcherFor();

		const outcome = await matcher.match(REFUND_CONTEXT);

		expect(outcome.status).toBe('matched');
		if (outcome.status !== 'matched') return;
		const { match } = outcome;
		expect(match.shortlist.map(s => s.rule_id)).toEqual([101, 104, 105, 102]);
		expect(match.shortlist[0].fused_score).toBeCloseTo(1 / 61, 12);
		expect(match.shortlist[1].fused_score).toBeCloseTo(0.4 / 62 + 0.6 / 63, 12);
		expect(match.shortlist[3].lexical_score).toBeUndefined();
		expect(match.rule_id).toBe(101);
		expect(match.selection_method).toBe('fusion_only');
		expect(match.confidence).toBeCloseTo(1, 12);
		expect(match.actionable).toBe(true);
		expect(match.prompt_override).toBe('Use the refund script');
		expect(outcome.sources).toEqual({ lexical: 'ok', vector: 'ok' });
	});

	it('should scale fusion-only confidence by the best possible fused score', async () => {
		const matcher = await matcherFor();

		const outcome = await matcher.match('help me', { matchConfidenceThreshold: 0.7 });

		expect(outcome.status).toBe('matched');
		if (outcome.status !== 'matched') return;
		expect(outcome.sources.lexical).toBe('empty');
		expect(outcome.match.rule_id).toBe(101);
		expect(outcome.match.confidence).toBeCloseTo(0.6, 12);
		expect(outcome.match.actionable).toBe(false);
	});

	it('should resolve a single candidate with full confidence and no LLM call', async () => {
		const chat = new FakeChatClient(async () => '{"rule_id": 101}');
		const matcher = await matcherFor({ chat });

		const outcome = await matcher.match(REFUND_CONTEXT, { candidateTopK: 1 });

		expect(chat.calls).toHaveLength(0);
		expect(outcome.status === 'matched' && outcome.match).toMatchObject({
			rule_id: 101,
			selection_method: 'fusion_only',
			confidence: 1,
		});
	});

	it('should accept the LLM pick when it is on the shortlist', async () => {
		const chat = new FakeChatClient(async () =>
			'```json\n{"rule_id": 104, "confidence": 0.85, "rationale": "the order is late"}\n```',
		);
		const matcher = await matcherFor({ chat });

		const outcome = await matcher.match(REFUND_CONTEXT);

		expect(outcome.status === 'matched' && outcome.match).toMatchObject({
			rule_id: 104,
			selection_method: 'llm',
			confidence: 0.85,
			actionable: true,
			rationale: 'the order is late',
			prompt_override: null,
			action_text: 'Share tracking',
		});
		expect(chat.calls).toHaveLength(1);
		expect(chat.calls[0][1].content).toContain('rule_id: 104');
		expect(chat.calls[0][1].content).toContain(REFUND_CONTEXT);
	});

	it('should fall back to the top fused candidate when the LLM picks outside a 5-entry shortlist', async () => {
		const chat = new FakeChatClient(async () => '{"rule_id": 999, "confidence": 0.99}');
		const matcher = await matcherFor({ chat });

		const outcome = await matcher.match(REFUND_CONTEXT, { vectorThreshold: 0.05 });

		expect(outcome.status).toBe('matched');
		if (outcome.status !== 'matched') return;
		expect(outcome.match.shortlist.map(s => s.rule_id)).toEqual([101, 104, 105, 102, 103]);
		expect(outcome.match.rule_id).toBe(101);
		expect(outcome.match.selection_method).toBe('fusion_fallback');
		expect(outcome.match.confidence).toBe(0.3);
		expect(outcome.match.actionable).toBe(false);
	});

	it('should fall back when the LLM call fails', async () => {
		const chat = new FakeChatClient(async () => {
			throw new Error('connection refused');
		});
		const matcher = await matcherFor({ chat });

		const outcome = await matcher.match(REFUND_CONTEXT);

		expect(outcome.status === 'matched' && outcome.match).toMatchObject({
			rule_id: 101,
			selection_method: 'fusion_fallback',
			confidence: 0.3,
			rationale: 'LLM call failed: connection refused',
		});
	});

	it('should fall back when the LLM does not answer in time', async () => {
		const matcher = await matcherFor({ chat: new FakeChatClient(() => never<string>()) });

		const outcome = await matcher.match(REFUND_CONTEXT);

		expect(outcome.status === 'matched' && outcome.match).toMatchObject({
			selection_method: 'fusion_fallback',
			confidence: 0.3,
			rationale: 'LLM call failed: llm-selection timed out after 20ms',
		});
	});

	it('should fall back with 0.5 when the answer carries no rule id', async () => {
		const matcher = await matcherFor({ chat: new FakeChatClient(async () => 'I am not sure which one fits.') });

		const outcome = await matcher.match(REFUND_CONTEXT);

		expect(outcome.status).toBe('matched');
		if (outcome.status !== 'matched') return;
		expect(outcome.match.selection_method).toBe('fusion_fallback');
		expect(outcome.match.confidence).toBe(0.5);
		expect(outcome.match.rationale).toBeUndefined();
	});

	it('should skip the LLM when the request disables it', async () => {
		const chat = new FakeChatClient(async () => '{"rule_id": 104}');
		const matcher = await matcherFor({ chat });

		const outcome = await matcher.match(REFUND_CONTEXT, { useLlm: false });

		expect(chat.calls).toHaveLength(0);
		expect(outcome.status === 'matched' && outcome.match.selection_method).toBe('fusion_only');
	});

	it('should report no_match when nothing is retrieved', async () => {
		const matcher = await matcherFor();

		const outcome = await matcher.match('hello there');

		expect(outcome).toEqual({ status: 'no_match', sources: { lexical: 'empty', vector: 'empty' } });
	});

	it('should report unavailable when retrieval fails', async () => {
		const failing = embedder();
		failing.failing = true;
		const matcher = await matcherFor({
			collection: new FailingCollection<GuidelinePayload>('guidelines', 2),
			embedder: failing,
		});

		const outcome = await matcher.match(REFUND_CONTEXT);

		expect(outcome).toEqual({ status: 'unavailable', sources: { lexical: 'unavailable', vector: 'unavailable' } });
	});
});

describe('resolveInstruction', () => {
	it('should prefer the prompt override of an actionable match', async () => {
		const matcher = await matcherFor();
		const outcome = await matcher.match(REFUND_CONTEXT);

		expect(resolveInstruction(outcome, 'default reply')).toBe('Use the refund script');
	});

	it('should return the fallback for a non-actionable match', async () => {
		const matcher = await matcherFor();
		const outcome = await matcher.match('help me', { matchConfidenceThreshold: 0.7 });

		expect(resolveInstruction(outcome, 'default reply')).toBe('default reply');
	});

	it('should return the fallback when nothing matched', () => {
		expect(resolveInstruction({ status: 'no_match', sources: { lexical: 'empty', vector: 'empty' } }, 'default reply'))
			.toBe('default reply');
	});
});
