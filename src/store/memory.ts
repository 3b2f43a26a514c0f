/**
 * In-process collection. Backs the tests and small JSON snapshots used by the CLI.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
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
import { cosineSimilarity, compareBySimilarity } from '../rag/vector.js';
import { ConfigError, SearchError } from '../shared/errors.js';

interface MemoryEntry<P> extends IndexEntry<P> {
	tokens: string[];
	tokenSet: Set<string>;
}

const snapshotSchema = z.object({
	name: z.string(),
	vectorSize: z.number().int().positive(),
	entries: z.array(
		z.object({
			id: z.number().int(),
			payload: z.unknown(),
			vector: z.array(z.number()),
			text: z.string(),
			status: z.enum(['committed', 'pending', 'stale', 'deleted']),
		}),
	),
});

const payloadFields = z.record(z.unknown());

function matchesWhere(payload: unknown, where: PayloadMatch | undefined): boolean {
	if (!where) return true;
	const fields = payloadFields.safeParse(payload);
	return fields.success && fields.data[where.key] === where.value;
}

export class InMemoryCollection<P> implements WritableCollection<P> {
	private readonly entries = new Map<number, MemoryEntry<P>>();

	constructor(
		readonly name: string,
		readonly vectorSize: number,
	) {}

	async ensureCollection(forceRecreate = false): Promise<void> {
		if (forceRecreate) {
			this.entries.clear();
		}
	}

	async upsert(entries: IndexEntry<P>[]): Promise<void> {
		for (const entry of entries) {
			if (entry.vector.length !== this.vectorSize) {
				throw new SearchError(
					`Vector for entry ${entry.id} has ${entry.vector.length} dimensions, collection ${this.name} expects ${this.vectorSize}`,
				);
			}
			const tokens = tokenize(entry.text);
			this.entries.set(entry.id, { ...entry, tokens, tokenSet: new Set(tokens) });
		}
	}

	async setStatus(ids: readonly number[], status: EntryStatus): Promise<void> {
		for (const id of ids) {
			const entry = this.entries.get(id);
			if (entry) {
				entry.status = status;
			}
		}
	}

	async list(): Promise<StoredEntry<P>[]> {
		return [...this.entries.values()]
			.sort((a, b) => a.id - b.id)
			.map(e => ({ id: e.id, payload: e.payload, status: e.status }));
	}

	async count(status?: EntryStatus): Promise<number> {
		if (status === undefined) {
			return this.entries.size;
		}
		let n = 0;
		for (const e of this.entries.values()) {
			if (e.status === status) n++;
		}
		return n;
	}

	private committed(): MemoryEntry<P>[] {
		return [...this.entries.values()]
			.filter(e => e.status === 'committed')
			.sort((a, b) => a.id - b.id);
	}

	async matchTerms(terms: readonly string[], where?: PayloadMatch): Promise<TermMatch<P>[]> {
		const matches: TermMatch<P>[] = [];
		for (const e of this.committed()) {
			if (terms.some(t => e.tokenSet.has(t)) && matchesWhere(e.payload, where)) {
				matches.push({ id: e.id, payload: e.payload, tokens: e.tokens });
			}
		}
		return matches;
	}

	async nearest(vector: readonly number[], query: NearestQuery): Promise<NearestMatch<P>[]> {
		if (vector.length !== this.vectorSize) {
			throw new SearchError(
				`Query vector has ${vector.length} dimensions, collection ${this.name} expects ${this.vectorSize}`,
			);
		}

		const matches: NearestMatch<P>[] = [];
		for (const e of this.committed()) {
			if (query.excludeIds?.has(e.id) || !matchesWhere(e.payload, query.where)) continue;
			const similarity = cosineSimilarity(vector, e.vector);
			if (similarity >= query.threshold) {
				matches.push({ id: e.id, payload: e.payload, similarity });
			}
		}
		return matches.sort(compareBySimilarity).slice(0, query.limit);
	}

	async corpusStats(): Promise<CorpusStats> {
		const committed = this.committed();
		if (committed.length === 0) {
			return { totalDocs: 0, avgDocLength: 0 };
		}
		const total = committed.reduce((sum, e) => sum + e.tokens.length, 0);
		return { totalDocs: committed.length, avgDocLength: total / committed.length };
	}

	// ── Snapshots ───────────────────────────────────────────

	toSnapshot(): CollectionSnapshot<P> {
		return {
			name: this.name,
			vectorSize: this.vectorSize,
			entries: [...this.entries.values()]
				.sort((a, b) => a.id - b.id)
				.map(e => ({ id: e.id, payload: e.payload, vector: e.vector, text: e.text, status: e.status })),
		};
	}

	async save(filePath: string): Promise<void> {
		await mkdir(dirname(filePath), { recursive: true });
		await writeFile(filePath, JSON.stringify(this.toSnapshot()));
	}

	/**
	 * Load a snapshot written by `save`, validating payloads with `payloadSchema`
	 * @throws ConfigError
	 */
	static async load<P>(filePath: string, payloadSchema: z.ZodType<P, z.ZodTypeDef, unknown>): Promise<InMemoryCollection<P>> {
		let raw: unknown;
		try {
			raw = JSON.parse(await readFile(filePath, 'utf-8'));
		} catch (error) {
			throw new ConfigError(`Cannot read snapshot ${filePath}`, error instanceof Error ? error : undefined);
		}

		const parsed = snapshotSchema.safeParse(raw);
		if (!parsed.success) {
			throw new ConfigError(`Invalid snapshot ${filePath}: ${parsed.error.message}`);
		}

		const entries: IndexEntry<P>[] = [];
		for (const e of parsed.data.entries) {
			const payload = payloadSchema.safeParse(e.payload);
			if (!payload.success) {
				throw new ConfigError(`Invalid payload for entry ${e.id} in ${filePath}: ${payload.error.message}`);
			}
			entries.push({ id: e.id, payload: payload.data, vector: e.vector, text: e.text, status: e.status });
		}

		const collection = new InMemoryCollection<P>(parsed.data.name, parsed.data.vectorSize);
		await collection.upsert(entries);
		return collection;
	}
}

export interface CollectionSnapshot<P> {
	name: string;
	vectorSize: number;
	entries: IndexEntry<P>[];
}
