/**
 * Index builder
 *
 * Records: batched embedding + upsert with checkpoint resume.
 * Guidelines: incremental sync; a changed condition is marked stale before it
 * is re-embedded, so retrieval never sees an entry whose vector is out of date.
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { EntryStatus, IndexEntry, StoredEntry, WritableCollection } from '../store/types.js';
import type { EmbeddingClient } from './embedder.js';
import { assertDimension } from './embedder.js';
import type { CorpusStatsCache } from './lexical.js';
import type { KnowledgeRecord, RecordKind, RecordPayload } from './types.js';
import type { Guideline, GuidelinePayload, GuidelineState } from '../guidelines/types.js';
import { isNotFoundError } from '../shared/errors.js';
import { Logger, errorMessage } from '../shared/logger.js';

export interface IndexStats {
	totalRecords: number;
	successCount: number;
	skippedCount: number;
	durationMs: number;
}

export interface SyncStats {
	added: number;
	reembedded: number;
	statusChanged: number;
	deleted: number;
	unchanged: number;
	durationMs: number;
}

const checkpointSchema = z.object({
	lastProcessedId: z.number().int().nullable(),
	timestamp: z.number(),
});

export type CheckpointData = z.infer<typeof checkpointSchema>;

/** Lexical/vector text of a record; a QA record is indexed by its question */
export function recordText(record: { title: string; body: string; kind?: RecordKind }): string {
	return record.kind === 'qa' ? record.title : `${record.title} ${record.body}`;
}

/** Index status of a guideline in a given management state */
export function guidelineStatus(state: GuidelineState): EntryStatus {
	switch (state) {
		case 'active': return 'committed';
		case 'inactive':
		case 'draft': return 'pending';
		case 'deleted': return 'deleted';
	}
}

function toGuidelinePayload(g: Guideline): GuidelinePayload {
	return {
		title: g.title,
		condition_text: g.conditionText,
		action_text: g.actionText,
		...(g.promptOverride !== undefined ? { prompt_override: g.promptOverride } : {}),
		priority: g.priority,
	};
}

function samePayload(a: GuidelinePayload, b: GuidelinePayload): boolean {
	return a.title === b.title
		&& a.condition_text === b.condition_text
		&& a.action_text === b.action_text
		&& a.prompt_override === b.prompt_override
		&& a.priority === b.priority;
}

export interface IndexerConfig {
	embedder: EmbeddingClient;
	batchSize: number;
	checkpointPath?: string;
	/** Invalidated after every write so corpus stats are recomputed */
	statsCache?: CorpusStatsCache;
	logger?: Logger;
}

export class Indexer {
	private readonly embedder: EmbeddingClient;
	private readonly batchSize: number;
	private readonly checkpointPath: string | undefined;
	private readonly statsCache: CorpusStatsCache | undefined;
	private readonly logger: Logger;

	constructor(config: IndexerConfig) {
		this.embedder = config.embedder;
		this.batchSize = config.batchSize;
		this.checkpointPath = config.checkpointPath;
		this.statsCache = config.statsCache;
		this.logger = config.logger ?? new Logger({ prefix: 'rag:indexer' });
	}

	async indexRecords(
		collection: WritableCollection<RecordPayload>,
		records: KnowledgeRecord[],
	): Promise<IndexStats> {
		const startTime = Date.now();

		const checkpoint = await this.loadCheckpoint();
		let resumeFrom = 0;

		if (checkpoint.lastProcessedId !== null) {
			const idx = records.findIndex(r => r.id === checkpoint.lastProcessedId);
			if (idx >= 0) {
				resumeFrom = idx + 1;
				this.logger.info(`Resuming from record ${resumeFrom} (id ${checkpoint.lastProcessedId})`);
			}
		}

		let successCount = 0;
		const totalBatches = Math.ceil((records.length - resumeFrom) / this.batchSize);

		try {
			for (let i = resumeFrom; i < records.length; i += this.batchSize) {
				const batch = records.slice(i, i + this.batchSize);
				const batchNum = Math.floor((i - resumeFrom) / this.batchSize) + 1;
				const progress = ((i - resumeFrom + batch.length) / (records.length - resumeFrom) * 100).toFixed(1);

				try {
					await this.indexRecordBatch(collection, batch);
				} catch (error) {
					this.logger.error(`Failed to index batch starting at ${i}`, { error: errorMessage(error) });
					throw error;
				}
				successCount += batch.length;
				await this.saveCheckpoint(batch[batch.length - 1].id);

				this.logger.info(
					`[${progress}%] batch ${batchNum}/${totalBatches} ` +
					`(${i + batch.length}/${records.length} records)`,
				);
			}
		} finally {
			this.statsCache?.invalidate(collection.name);
		}

		await this.clearCheckpoint();

		return {
			totalRecords: records.length,
			successCount,
			skippedCount: resumeFrom,
			durationMs: Date.now() - startTime,
		};
	}

	private async indexRecordBatch(
		collection: WritableCollection<RecordPayload>,
		records: KnowledgeRecord[],
	): Promise<void> {
		if (records.length === 0) return;

		const texts = records.map(recordText);
		const vectors = await this.embedTexts(texts);

		const entries: IndexEntry<RecordPayload>[] = records.map((r, idx) => ({
			id: r.id,
			payload: {
				title: r.title,
				body: r.body,
				...(r.reference !== undefined ? { reference: r.reference } : {}),
				kind: r.kind,
			},
			vector: vectors[idx],
			text: texts[idx],
			status: r.status,
		}));
		await collection.upsert(entries);
	}

	/**
	 * Bring the guideline index in line with `guidelines`:
	 * - new or changed (condition or display fields) → re-embedded and upserted;
	 *   a changed condition is first marked `stale`
	 * - only the state changed → status update
	 * - missing from `guidelines`, or in state `deleted` → `deleted`
	 */
	async syncGuidelines(
		collection: WritableCollection<GuidelinePayload>,
		guidelines: Guideline[],
	): Promise<SyncStats> {
		const startTime = Date.now();
		const existing = new Map<number, StoredEntry<GuidelinePayload>>();
		for (const entry of await collection.list()) {
			existing.set(entry.id, entry);
		}

		const stats: SyncStats = { added: 0, reembedded: 0, statusChanged: 0, deleted: 0, unchanged: 0, durationMs: 0 };
		const toEmbed: Guideline[] = [];
		const stale: number[] = [];
		const statusUpdates = new Map<EntryStatus, number[]>();
		const seen = new Set<number>();

		const queueStatus = (id: number, status: EntryStatus): void => {
			const ids = statusUpdates.get(status) ?? [];
			ids.push(id);
			statusUpdates.set(status, ids);
		};

		for (const g of guidelines) {
			seen.add(g.id);
			const prev = existing.get(g.id);
			const status = guidelineStatus(g.state);

			if (status === 'deleted') {
				if (prev && prev.status !== 'deleted') {
					queueStatus(g.id, 'deleted');
					stats.deleted++;
				} else {
					stats.unchanged++;
				}
				continue;
			}

			const payload = toGuidelinePayload(g);
			if (!prev) {
				toEmbed.push(g);
				stats.added++;
			} else if (!samePayload(prev.payload, payload)) {
				if (prev.payload.condition_text !== payload.condition_text) {
					stale.push(g.id);
				}
				toEmbed.push(g);
				stats.reembedded++;
			} else if (prev.status !== status) {
				queueStatus(g.id, status);
				stats.statusChanged++;
			} else {
				stats.unchanged++;
			}
		}

		for (const [id, entry] of existing) {
			if (!seen.has(id) && entry.status !== 'deleted') {
				queueStatus(id, 'deleted');
				stats.deleted++;
			}
		}

		try {
			if (stale.length > 0) {
				await collection.setStatus(stale, 'stale');
				this.logger.info(`Marked ${stale.length} guidelines stale`);
			}
			for (const [status, ids] of statusUpdates) {
				await collection.setStatus(ids, status);
			}
			for (let i = 0; i < toEmbed.length; i += this.batchSize) {
				const batch = toEmbed.slice(i, i + this.batchSize);
				const vectors = await this.embedTexts(batch.map(g => g.conditionText));
				await collection.upsert(batch.map((g, idx) => ({
					id: g.id,
					payload: toGuidelinePayload(g),
					vector: vectors[idx],
					text: g.conditionText,
					status: guidelineStatus(g.state),
				})));
			}
		} finally {
			this.statsCache?.invalidate(collection.name);
		}

		stats.durationMs = Date.now() - startTime;
		this.logger.info('Guideline sync complete', { ...stats });
		return stats;
	}

	private async embedTexts(texts: string[]): Promise<number[][]> {
		const results = await this.embedder.embedBatch(texts);
		return results.map(r => {
			assertDimension(r.embedding, this.embedder.dimension);
			return r.embedding;
		});
	}

	private async loadCheckpoint(): Promise<CheckpointData> {
		const empty: CheckpointData = { lastProcessedId: null, timestamp: 0 };
		if (!this.checkpointPath) {
			return empty;
		}
		let content: string;
		try {
			content = await fs.readFile(this.checkpointPath, 'utf-8');
		} catch (error) {
			if (isNotFoundError(error)) return empty;
			throw error;
		}
		let raw: unknown;
		try {
			raw = JSON.parse(content);
		} catch (error) {
			this.logger.warn(`Unreadable checkpoint ${this.checkpointPath}, starting over`, { error: errorMessage(error) });
			return empty;
		}
		const parsed = checkpointSchema.safeParse(raw);
		if (!parsed.success) {
			this.logger.warn(`Invalid checkpoint ${this.checkpointPath}, starting over`);
			return empty;
		}
		return parsed.data;
	}

	private async saveCheckpoint(recordId: number): Promise<void> {
		if (!this.checkpointPath) return;

		const data: CheckpointData = { lastProcessedId: recordId, timestamp: Date.now() };
		await fs.mkdir(dirname(this.checkpointPath), { recursive: true });
		await fs.writeFile(this.checkpointPath, JSON.stringify(data, null, 2));
	}

	private async clearCheckpoint(): Promise<void> {
		if (!this.checkpointPath) return;
		try {
			await fs.unlink(this.checkpointPath);
		} catch (error) {
			if (!isNotFoundError(error)) throw error;
		}
	}
}

export function createIndexer(config: IndexerConfig): Indexer {
	return new Indexer(config);
}
