/**
 * Test fakes: deterministic embedder, chat client, reranker, failing store
 */

import { vi } from 'vitest';
import type { EmbedCallOptions, EmbeddingClient, EmbedResult } from '../src/rag/embedder.js';
import type { RerankClient, RerankScore } from '../src/rag/reranker.js';
import type { ChatClient, ChatMessage } from '../src/guidelines/chat-client.js';
import type { CorpusStats, NearestMatch, SearchCollection, TermMatch } from '../src/store/types.js';
import { InMemoryCollection } from '../src/store/memory.js';
import type { RecordKind, RecordPayload } from '../src/rag/types.js';
import { recordText } from '../src/rag/indexer.js';
import type { GuidelinePayload } from '../src/guidelines/types.js';
import { Logger, LogLevel } from '../src/shared/logger.js';
import { SearchError } from '../src/shared/errors.js';

export const quietLogger = new Logger({ level: LogLevel.ERROR });

/** 2-d unit vector whose cosine similarity with [1, 0] is `similarity` */
export function unit(similarity: number): number[] {
	return [similarity, Math.sqrt(1 - similarity * similarity)];
}

/**
 * Embedder returning fixed vectors per text; unknown texts get `fallback`
 */
export class FakeEmbedder implements EmbeddingClient {
	readonly model = 'fake-embed';
	readonly embed = vi.fn(async (text: string, _options?: EmbedCallOptions): Promise<number[]> => this.vectorFor(text));
	readonly embedBatch = vi.fn(async (texts: string[], _options?: EmbedCallOptions): Promise<EmbedResult[]> =>
		texts.map(text => ({ text, embedding: this.vectorFor(text), tokens: text.length })),
	);
	failing = false;

	constructor(
		readonly dimension: number,
		private readonly vectors: Record<string, number[]> = {},
		private readonly fallback: number[] = new Array<number>(dimension).fill(0),
	) {}

	private vectorFor(text: string): number[] {
		if (this.failing) {
			throw new Error('embedding service down');
		}
		return this.vectors[text] ?? this.fallback;
	}
}

export class FakeChatClient implements ChatClient {
	readonly model = 'fake-chat';
	readonly calls: ChatMessage[][] = [];

	constructor(private readonly reply: (messages: ChatMessage[], signal: AbortSignal) => Promise<string>) {}

	async complete(messages: ChatMessage[], options: { signal: AbortSignal }): Promise<string> {
		this.calls.push(messages);
		return this.reply(messages, options.signal);
	}
}

export class FakeReranker implements RerankClient {
	readonly name = 'fake';
	readonly rerank = vi.fn(async (_query: string, texts: string[], _signal: AbortSignal): Promise<RerankScore[]> =>
		this.scorer(texts),
	);

	constructor(private readonly scorer: (texts: string[]) => RerankScore[] | Promise<RerankScore[]>) {}
}

/** A call that never answers */
export function never<T>(): Promise<T> {
	return new Promise<T>(() => {});
}

/** A collection whose every read fails */
export class FailingCollection<P> implements SearchCollection<P> {
	constructor(
		readonly name: string,
		readonly vectorSize: number,
	) {}

	async matchTerms(): Promise<TermMatch<P>[]> {
		throw new SearchError('store offline');
	}

	async nearest(): Promise<NearestMatch<P>[]> {
		throw new SearchError('store offline');
	}

	async corpusStats(): Promise<CorpusStats> {
		throw new SearchError('store offline');
	}
}

export interface RecordFixture {
	id: number;
	title: string;
	body: string;
	vector: number[];
	status?: 'committed' | 'pending' | 'deleted';
	kind?: RecordKind;
}

export async function recordCollection(
	fixtures: RecordFixture[],
	vectorSize = 2,
): Promise<InMemoryCollection<RecordPayload>> {
	const collection = new InMemoryCollection<RecordPayload>('records', vectorSize);
	await collection.upsert(fixtures.map(f => ({
		id: f.id,
		payload: { title: f.title, body: f.body, kind: f.kind ?? 'doc' },
		vector: f.vector,
		text: recordText(f),
		status: f.status ?? 'committed',
	})));
	return collection;
}

export interface GuidelineFixture {
	id: number;
	title: string;
	condition: string;
	action: string;
	priority: number;
	vector: number[];
	promptOverride?: string;
}

export async function guidelineCollection(
	fixtures: GuidelineFixture[],
	vectorSize = 2,
): Promise<InMemoryCollection<GuidelinePayload>> {
	const collection = new InMemoryCollection<GuidelinePayload>('guidelines', vectorSize);
	await collection.upsert(fixtures.map(f => ({
		id: f.id,
		payload: {
			title: f.title,
			condition_text: f.condition,
			action_text: f.action,
			priority: f.priority,
			...(f.promptOverride !== undefined ? { prompt_override: f.promptOverride } : {}),
		},
		vector: f.vector,
		text: f.condition,
		status: 'committed',
	})));
	return collection;
}
