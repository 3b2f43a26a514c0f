#!/usr/bin/env node
/**
 * kb-retrieval command line
 *
 * Usage:
 *   kb-retrieval search <query> [--limit 5] [--cascade] [--no-rerank] [--kind qa|doc]
 *   kb-retrieval answer <question> [--limit 5]
 *   kb-retrieval match <context> [--top-k 5] [--no-llm] [--threshold 0.6]
 *   kb-retrieval confidence <text> [--target records|guidelines] [--strategies conservative,balanced]
 *   kb-retrieval index-records <records.json> [--force] [--checkpoint path]
 *   kb-retrieval index-guidelines <guidelines.json> [--force]
 *   kb-retrieval stats
 *
 * Common options:
 *   --config <engine.yaml>   engine tunables (default: ENGINE_CONFIG or config/engine.yaml)
 *   --snapshot <dir>         use JSON snapshots in <dir> instead of Qdrant
 *
 * Input files follow data/records.example.json and data/guidelines.example.json.
 * Results are printed to stdout as JSON; logs go to stderr.
 */

import { access, readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { getEnv } from './config/env.js';
import { loadEngineConfig } from './config/loader.js';
import { ensembleSchema, type EngineConfig } from './config/types.js';
import { InMemoryCollection } from './store/memory.js';
import type { WritableCollection } from './store/types.js';
import { createEmbedder, createQdrantCollections, createEngineFromEnv } from './engine.js';
import { createIndexer } from './rag/indexer.js';
import { knowledgeRecordSchema, recordKindSchema, recordPayloadSchema, type RecordKind, type RecordPayload } from './rag/types.js';
import { guidelineSchema, guidelinePayloadSchema, type GuidelinePayload } from './guidelines/types.js';
import type { StrategyName } from './ensemble/estimator.js';
import { ConfigError, isNotFoundError } from './shared/errors.js';
import { createDefaultLogger, errorMessage } from './shared/logger.js';

const logger = createDefaultLogger('cli');

const RECORDS_SNAPSHOT = 'records.snapshot.json';
const GUIDELINES_SNAPSHOT = 'guidelines.snapshot.json';

const { values: args, positionals } = parseArgs({
	options: {
		config: { type: 'string', short: 'c' },
		snapshot: { type: 'string', short: 's' },
		limit: { type: 'string', short: 'n' },
		cascade: { type: 'boolean', default: false },
		'no-rerank': { type: 'boolean', default: false },
		'top-k': { type: 'string', short: 'k' },
		'no-llm': { type: 'boolean', default: false },
		threshold: { type: 'string' },
		target: { type: 'string', default: 'records' },
		strategies: { type: 'string' },
		kind: { type: 'string' },
		force: { type: 'boolean', short: 'f', default: false },
		checkpoint: { type: 'string' },
	},
	allowPositionals: true,
	strict: true,
});

function print(value: unknown): void {
	process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

function requireArg(value: string | undefined, name: string): string {
	if (!value) {
		throw new ConfigError(`Missing argument: ${name}`);
	}
	return value;
}

function numberOption(value: string | undefined, name: string): number | undefined {
	if (value === undefined) return undefined;
	const n = Number(value);
	if (!Number.isFinite(n)) {
		throw new ConfigError(`--${name} must be a number (got "${value}")`);
	}
	return n;
}

const strategiesSchema = ensembleSchema.shape.strategies;

function kindOption(value: string | undefined): RecordKind | undefined {
	if (value === undefined) return undefined;
	const parsed = recordKindSchema.safeParse(value);
	if (!parsed.success) {
		throw new ConfigError(`--kind must be qa or doc (got "${value}")`);
	}
	return parsed.data;
}

function strategiesOption(value: string | undefined): StrategyName[] | undefined {
	if (value === undefined) return undefined;
	const parsed = strategiesSchema.safeParse(value.split(',').map(s => s.trim()).filter(Boolean));
	if (!parsed.success) {
		throw new ConfigError(`Invalid --strategies: ${parsed.error.errors.map(e => e.message).join('; ')}`);
	}
	return parsed.data;
}

async function readJsonArray<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S>[]> {
	let raw: unknown;
	try {
		raw = JSON.parse(await readFile(resolve(path), 'utf-8'));
	} catch (error) {
		throw new ConfigError(`Cannot read ${path}`, error instanceof Error ? error : undefined);
	}
	const parsed = z.array(schema).safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.errors.map(e => `  ${e.path.join('.')}: ${e.message}`).join('\n');
		throw new ConfigError(`Invalid ${path}:\n${issues}`);
	}
	return parsed.data;
}

async function openSnapshot<P>(
	dir: string,
	file: string,
	name: string,
	schema: z.ZodType<P, z.ZodTypeDef, unknown>,
	vectorSize: number,
): Promise<InMemoryCollection<P>> {
	const path = join(resolve(dir), file);
	try {
		await access(path);
	} catch (error) {
		if (!isNotFoundError(error)) throw error;
		logger.info(`No snapshot at ${path}, starting empty`);
		return new InMemoryCollection<P>(name, vectorSize);
	}
	return InMemoryCollection.load(path, schema);
}

interface Collections {
	records: WritableCollection<RecordPayload>;
	guidelines: WritableCollection<GuidelinePayload>;
	/** Persist in-memory collections; no-op for Qdrant */
	save(): Promise<void>;
}

async function openCollections(config: EngineConfig): Promise<Collections> {
	const env = getEnv();
	if (args.snapshot) {
		const dir = args.snapshot;
		const records = await openSnapshot(dir, RECORDS_SNAPSHOT, env.RECORDS_COLLECTION, recordPayloadSchema, config.embedding.dimension);
		const guidelines = await openSnapshot(dir, GUIDELINES_SNAPSHOT, env.GUIDELINES_COLLECTION, guidelinePayloadSchema, config.embedding.dimension);
		return {
			records,
			guidelines,
			save: async () => {
				await records.save(join(resolve(dir), RECORDS_SNAPSHOT));
				await guidelines.save(join(resolve(dir), GUIDELINES_SNAPSHOT));
			},
		};
	}
	const qdrant = createQdrantCollections(env, config, logger.withPrefix('qdrant'));
	return { ...qdrant, save: async () => {} };
}

async function runIndexCommand(command: 'index-records' | 'index-guidelines', file: string, config: EngineConfig): Promise<void> {
	const env = getEnv();
	const collections = await openCollections(config);
	const indexer = createIndexer({
		embedder: createEmbedder(env, config, logger.withPrefix('embed')),
		batchSize: env.BATCH_SIZE,
		checkpointPath: args.checkpoint,
		logger: logger.withPrefix('indexer'),
	});

	if (command === 'index-records') {
		const records = await readJsonArray(file, knowledgeRecordSchema);
		await collections.records.ensureCollection(args.force);
		const stats = await indexer.indexRecords(collections.records, records);
		await collections.save();
		print({ ...stats, total: await collections.records.count(), committed: await collections.records.count('committed') });
		return;
	}

	const guidelines = await readJsonArray(file, guidelineSchema);
	await collections.guidelines.ensureCollection(args.force);
	const stats = await indexer.syncGuidelines(collections.guidelines, guidelines);
	await collections.save();
	print({ ...stats, total: await collections.guidelines.count(), committed: await collections.guidelines.count('committed') });
}

async function main(): Promise<void> {
	const [command, text] = positionals;
	const config = await loadEngineConfig(args.config);

	switch (command) {
		case 'index-records':
		case 'index-guidelines':
			await runIndexCommand(command, requireArg(text, 'file'), config);
			return;
		case 'search':
		case 'answer':
		case 'match':
		case 'confidence':
		case 'stats':
			break;
		default:
			throw new ConfigError(`Unknown command: ${command ?? '(none)'}. Expected search, answer, match, confidence, index-records, index-guidelines or stats`);
	}

	const collections = args.snapshot ? await openCollections(config) : undefined;
	const engine = await createEngineFromEnv({ config, collections });

	switch (command) {
		case 'search':
			print(await engine.search(requireArg(text, 'query'), {
				limit: numberOption(args.limit, 'limit'),
				useCascade: args.cascade || undefined,
				useRerank: args['no-rerank'] ? false : undefined,
				kind: kindOption(args.kind),
			}));
			return;
		case 'answer':
			print(await engine.answer(requireArg(text, 'question'), {
				limit: numberOption(args.limit, 'limit'),
			}));
			return;
		case 'match':
			print(await engine.matchGuideline(requireArg(text, 'context'), {
				candidateTopK: numberOption(args['top-k'], 'top-k'),
				useLlm: args['no-llm'] ? false : undefined,
				matchConfidenceThreshold: numberOption(args.threshold, 'threshold'),
			}));
			return;
		case 'confidence': {
			const input = requireArg(text, 'text');
			const strategies = strategiesOption(args.strategies);
			if (args.target === 'guidelines') {
				print(await engine.matchConfidence(input, strategies));
			} else if (args.target === 'records') {
				print(await engine.searchConfidence(input, strategies));
			} else {
				throw new ConfigError(`--target must be records or guidelines (got "${args.target}")`);
			}
			return;
		}
		case 'stats':
			print(await engine.corpusStats());
			return;
	}
}

main().catch(err => {
	logger.error('Command failed', { error: errorMessage(err) });
	process.exit(1);
});
