/**
 * Qdrant-backed collection (@qdrant/js-client-rest)
 *
 * Point layout: integer id, one cosine vector, payload = domain payload plus
 *   text          indexed text
 *   tokens        shared-tokenizer tokens (keyword index, used for term matching)
 *   token_length  token count (corpus stats)
 *   status        committed | pending | stale | deleted (keyword index)
 */

import { QdrantClient as QdrantSdk } from '@qdrant/js-client-rest';
import { z } from 'zod';
import type {
	CorpusStats,
	EntryStatus,
	IndexEntry,
	NearestMatch,
	NearestQuery,
	PayloadMatch,
	StoredEntry,
	TermMatch,
	WritableCollection,
} from './types.js';
import { tokenize } from '../rag/tokenizer.js';
import { compareBySimilarity } from '../rag/vector.js';
import { SearchError } from '../shared/errors.js';
import { sleep } from '../shared/async.js';
import { Logger, errorMessage } from '../shared/logger.js';

type QueryRequest = NonNullable<Parameters<QdrantSdk['query']>[1]>;
type Filter = NonNullable<QueryRequest['filter']>;
type Condition = Exclude<NonNullable<Filter['must']>, unknown[]>;
type PointId = string | number;

const SCROLL_PAGE = 256;
const UPSERT_BATCH = 32;

const indexFieldsSchema = z.object({
	token_length: z.number().int().nonnegative().default(0),
	status: z.enum(['committed', 'pending', 'stale', 'deleted']).default('pending'),
});

const COMMITTED: Filter = {
	must: [{ key: 'status', match: { value: 'committed' } }],
};

function committedWhere(where: PayloadMatch | undefined): Condition[] {
	const must: Condition[] = [{ key: 'status', match: { value: 'committed' } }];
	if (where) {
		must.push({ key: where.key, match: { value: where.value } });
	}
	return must;
}

/**
 * Term frequency needs the full token list; the payload keeps distinct tokens
 * only, so recount from the stored text.
 */
function tokensOf(raw: unknown): string[] {
	const parsed = z.object({ text: z.string() }).safeParse(raw);
	return parsed.success ? tokenize(parsed.data.text) : [];
}

function toNumericId(id: PointId): number {
	return typeof id === 'number' ? id : Number(id);
}

const vectorParamsSchema = z.object({ size: z.number().int() });

export interface QdrantCollectionOptions<P> {
	url: string;
	apiKey?: string;
	name: string;
	vectorSize: number;
	payloadSchema: z.ZodType<P, z.ZodTypeDef, unknown>;
	/** Payload fields filtered on by `where`; get a keyword index */
	keywordFields?: readonly string[];
	logger?: Logger;
}

export class QdrantCollection<P extends Record<string, unknown>> implements WritableCollection<P> {
	readonly name: string;
	readonly vectorSize: number;
	private readonly sdk: QdrantSdk;
	private readonly payloadSchema: z.ZodType<P, z.ZodTypeDef, unknown>;
	private readonly keywordFields: readonly string[];
	private readonly logger: Logger;

	constructor(options: QdrantCollectionOptions<P>) {
		this.sdk = new QdrantSdk({ url: options.url, apiKey: options.apiKey });
		this.name = options.name;
		this.vectorSize = options.vectorSize;
		this.payloadSchema = options.payloadSchema;
		this.keywordFields = options.keywordFields ?? [];
		this.logger = options.logger ?? new Logger();
	}

	// ── Collection management ───────────────────────────────

	async ensureCollection(forceRecreate = false): Promise<void> {
		const { exists } = await this.sdk.collectionExists(this.name);

		if (exists && forceRecreate) {
			this.logger.warn(`Recreating collection: ${this.name}`);
			await this.sdk.deleteCollection(this.name);
		}

		if (!exists || forceRecreate) {
			this.logger.info(`Creating collection: ${this.name}`);
			await this.sdk.createCollection(this.name, {
				vectors: { size: this.vectorSize, distance: 'Cosine' },
			});
			await this.sdk.createPayloadIndex(this.name, { field_name: 'status', field_schema: 'keyword', wait: true });
			await this.sdk.createPayloadIndex(this.name, { field_name: 'tokens', field_schema: 'keyword', wait: true });
			for (const field of this.keywordFields) {
				await this.sdk.createPayloadIndex(this.name, { field_name: field, field_schema: 'keyword', wait: true });
			}
			return;
		}

		const size = await this.remoteVectorSize();
		if (size !== undefined && size !== this.vectorSize) {
			throw new SearchError(`Collection ${this.name} stores ${size}-dimension vectors, expected ${this.vectorSize}`);
		}
	}

	/** Vector size of the remote collection; undefined when it does not exist or uses named vectors */
	async remoteVectorSize(): Promise<number | undefined> {
		const { exists } = await this.sdk.collectionExists(this.name);
		if (!exists) return undefined;
		const info = await this.sdk.getCollection(this.name);
		const parsed = vectorParamsSchema.safeParse(info.config.params.vectors);
		return parsed.success ? parsed.data.size : undefined;
	}

	// ── Writes ──────────────────────────────────────────────

	async upsert(entries: IndexEntry<P>[]): Promise<void> {
		for (let i = 0; i < entries.length; i += UPSERT_BATCH) {
			const batch = entries.slice(i, i + UPSERT_BATCH);
			const points = batch.map(e => {
				const tokens = tokenize(e.text);
				return {
					id: e.id,
					vector: e.vector,
					payload: {
						...e.payload,
						text: e.text,
						tokens: [...new Set(tokens)],
						token_length: tokens.length,
						status: e.status,
					},
				};
			});
			await this.withRetry(() => this.sdk.upsert(this.name, { wait: true, points }));
		}
	}

	async setStatus(ids: readonly number[], status: EntryStatus): Promise<void> {
		if (ids.length === 0) return;
		await this.withRetry(() => this.sdk.setPayload(this.name, {
			payload: { status },
			points: [...ids],
			wait: true,
		}));
	}

	// ── Reads ───────────────────────────────────────────────

	async list(): Promise<StoredEntry<P>[]> {
		const out: StoredEntry<P>[] = [];
		await this.scrollAll(undefined, true, (id, payload) => {
			const parsed = this.parsePayload(id, payload);
			if (parsed) {
				out.push({ id, payload: parsed.payload, status: parsed.fields.status });
			}
		});
		return out.sort((a, b) => a.id - b.id);
	}

	async count(status?: EntryStatus): Promise<number> {
		const filter: Filter | undefined = status
			? { must: [{ key: 'status', match: { value: status } }] }
			: undefined;
		const { count } = await this.sdk.count(this.name, { filter, exact: true });
		return count;
	}

	async matchTerms(terms: readonly string[], where?: PayloadMatch): Promise<TermMatch<P>[]> {
		if (terms.length === 0) return [];
		const filter: Filter = {
			must: [...committedWhere(where), { key: 'tokens', match: { any: [...terms] } }],
		};

		const matches: TermMatch<P>[] = [];
		try {
			await this.scrollAll(filter, true, (id, payload) => {
				const parsed = this.parsePayload(id, payload);
				if (parsed) {
					matches.push({ id, payload: parsed.payload, tokens: tokensOf(payload) });
				}
			});
		} catch (error) {
			throw new SearchError(`Term match on ${this.name} failed: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
		}
		return matches;
	}

	async nearest(vector: readonly number[], query: NearestQuery): Promise<NearestMatch<P>[]> {
		const excluded = query.excludeIds ? [...query.excludeIds] : [];
		const filter: Filter = excluded.length > 0
			? { must: committedWhere(query.where), must_not: [{ has_id: excluded }] }
			: { must: committedWhere(query.where) };

		try {
			const resp = await this.sdk.query(this.name, {
				query: [...vector],
				filter,
				limit: query.limit,
				score_threshold: query.threshold,
				with_payload: true,
			});

			const matches: NearestMatch<P>[] = [];
			for (const p of resp.points) {
				const id = toNumericId(p.id);
				const parsed = this.parsePayload(id, p.payload);
				if (parsed) {
					matches.push({ id, payload: parsed.payload, similarity: p.score });
				}
			}
			return matches.sort(compareBySimilarity);
		} catch (error) {
			throw new SearchError(`Vector query on ${this.name} failed: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
		}
	}

	async corpusStats(): Promise<CorpusStats> {
		let totalDocs = 0;
		let totalLength = 0;
		try {
			await this.scrollAll(COMMITTED, ['token_length'], (_id, payload) => {
				const fields = indexFieldsSchema.safeParse(payload ?? {});
				totalDocs++;
				totalLength += fields.success ? fields.data.token_length : 0;
			});
		} catch (error) {
			throw new SearchError(`Corpus stats on ${this.name} failed: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
		}
		return { totalDocs, avgDocLength: totalDocs > 0 ? totalLength / totalDocs : 0 };
	}

	// ── Internal ────────────────────────────────────────────

	private parsePayload(
		id: number,
		raw: unknown,
	): { payload: P; fields: z.infer<typeof indexFieldsSchema> } | undefined {
		const payload = this.payloadSchema.safeParse(raw);
		const fields = indexFieldsSchema.safeParse(raw ?? {});
		if (!payload.success || !fields.success) {
			this.logger.warn(`Skipping point ${id} in ${this.name}: invalid payload`);
			return undefined;
		}
		return { payload: payload.data, fields: fields.data };
	}

	private async scrollAll(
		filter: Filter | undefined,
		withPayload: boolean | string[],
		visit: (id: number, payload: unknown) => void,
	): Promise<void> {
		let offset: PointId | undefined;
		for (;;) {
			const resp = await this.sdk.scroll(this.name, {
				filter,
				limit: SCROLL_PAGE,
				offset,
				with_payload: withPayload,
				with_vector: false,
			});
			for (const p of resp.points) {
				visit(toNumericId(p.id), p.payload);
			}
			const next = resp.next_page_offset;
			if (typeof next !== 'number' && typeof next !== 'string') {
				return;
			}
			offset = next;
		}
	}

	private async withRetry<T>(fn: () => Promise<T>, maxRetries = 3): Promise<T> {
		for (let attempt = 1; ; attempt++) {
			try {
				return await fn();
			} catch (err) {
				if (attempt >= maxRetries) throw err;
				const delay = 1000 * attempt;
				this.logger.warn(`Qdrant write failed (attempt ${attempt}), retrying in ${delay}ms`, { error: errorMessage(err) });
				await sleep(delay);
			}
		}
	}
}
