/**
 * Engine configuration: every tunable with its default and bounds
 */

import { z } from 'zod';
import { DEFAULT_FLOOR_THRESHOLD, DEFAULT_LADDER, DEFAULT_MIN_RESULTS } from '../rag/cascade.js';

const WEIGHT_TOLERANCE = 1e-6;

const unit = z.number().min(0).max(1);

/** BM25-style lexical scoring */
export const lexicalSchema = z.object({
	k1: z.number().positive().default(1.2),
	b: unit.default(0.75),
	topK: z.number().int().min(1).max(200).default(20),
	/** Corpus-stats cache TTL; 0 recomputes on every request */
	statsTtlMs: z.number().int().min(0).default(30_000),
});

export const cascadeSchema = z.object({
	ladder: z.array(unit).min(1).default([...DEFAULT_LADDER]),
	floorThreshold: unit.default(DEFAULT_FLOOR_THRESHOLD),
	minResults: z.number().int().min(1).max(100).default(DEFAULT_MIN_RESULTS),
});

export const embeddingSchema = z.object({
	model: z.string().min(1).default('voyage-3'),
	dimension: z.number().int().positive().default(1024),
	/** Deadline of a query embedding, retries included */
	timeoutMs: z.number().int().positive().default(20_000),
	/** SDK timeout of one attempt */
	attemptTimeoutMs: z.number().int().positive().default(5_000),
	maxRetries: z.number().int().min(0).max(10).default(3),
	batchSize: z.number().int().positive().default(64),
});

export const rerankSchema = z.object({
	enabled: z.boolean().default(true),
	timeoutMs: z.number().int().positive().default(8_000),
	/** Fused candidates sent to the cross-encoder */
	candidateLimit: z.number().int().min(2).max(100).default(20),
	maxTextLength: z.number().int().positive().default(2000),
});

export const searchSchema = z.object({
	lexicalWeight: unit.default(0.4),
	vectorWeight: unit.default(0.6),
	rrfK: z.number().int().min(1).default(60),
	vectorTopK: z.number().int().min(1).max(200).default(20),
	vectorThreshold: unit.default(0.3),
	/** Results returned after rerank */
	rerankTopN: z.number().int().min(1).max(100).default(10),
	/** Run the vector leg through the threshold cascade */
	useCascade: z.boolean().default(false),
	/** A QA question at least this similar to the query is answered directly */
	qaExactThreshold: unit.default(0.95),
	/** Language of the indexed documents; enables the cross-language lexical skip */
	docLanguage: z.string().min(2).optional(),
});

export const guidelineConfigSchema = z.object({
	lexicalWeight: unit.default(0.4),
	vectorWeight: unit.default(0.6),
	rrfK: z.number().int().min(1).default(60),
	lexicalTopK: z.number().int().min(1).max(100).default(20),
	vectorTopK: z.number().int().min(1).max(100).default(20),
	vectorThreshold: unit.default(0.7),
	candidateTopK: z.number().int().min(1).max(10).default(5),
	llmEnabled: z.boolean().default(true),
	llmTimeoutMs: z.number().int().positive().default(15_000),
	matchConfidenceThreshold: unit.default(0.6),
});

export const ensembleSchema = z.object({
	strategies: z
		.array(z.enum(['conservative', 'balanced', 'lexical_heavy', 'vector_heavy']))
		.min(2)
		.max(6)
		.default(['conservative', 'balanced']),
	reliabilityThreshold: unit.default(0.7),
});

export const engineConfigSchema = z
	.object({
		embedding: embeddingSchema.default({}),
		lexical: lexicalSchema.default({}),
		search: searchSchema.default({}),
		cascade: cascadeSchema.default({}),
		rerank: rerankSchema.default({}),
		guidelines: guidelineConfigSchema.default({}),
		ensemble: ensembleSchema.default({}),
	})
	.superRefine((cfg, ctx) => {
		checkWeights(cfg.search.lexicalWeight, cfg.search.vectorWeight, ['search'], ctx);
		checkWeights(cfg.guidelines.lexicalWeight, cfg.guidelines.vectorWeight, ['guidelines'], ctx);

		if (cfg.embedding.attemptTimeoutMs > cfg.embedding.timeoutMs) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['embedding', 'attemptTimeoutMs'],
				message: `attemptTimeoutMs must not exceed timeoutMs (${cfg.embedding.timeoutMs})`,
			});
		}

		const { ladder, floorThreshold } = cfg.cascade;
		for (let i = 1; i < ladder.length; i++) {
			if (ladder[i] >= ladder[i - 1]) {
				ctx.addIssue({
					code: z.ZodIssueCode.custom,
					path: ['cascade', 'ladder', i],
					message: 'ladder must be strictly descending',
				});
			}
		}
		const last = ladder[ladder.length - 1];
		if (last !== undefined && floorThreshold >= last) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ['cascade', 'floorThreshold'],
				message: `floorThreshold must be below the last ladder step (${last})`,
			});
		}
	});

function checkWeights(
	lexical: number,
	vector: number,
	path: string[],
	ctx: z.RefinementCtx,
): void {
	if (Math.abs(lexical + vector - 1) > WEIGHT_TOLERANCE) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			path,
			message: `lexicalWeight + vectorWeight must sum to 1 (got ${lexical + vector})`,
		});
	}
}

export type LexicalConfig = z.infer<typeof lexicalSchema>;
export type CascadeConfig = z.infer<typeof cascadeSchema>;
export type EmbeddingConfig = z.infer<typeof embeddingSchema>;
export type RerankConfig = z.infer<typeof rerankSchema>;
export type SearchConfig = z.infer<typeof searchSchema>;
export type GuidelineConfig = z.infer<typeof guidelineConfigSchema>;
export type EnsembleConfig = z.infer<typeof ensembleSchema>;
export type EngineConfig = z.infer<typeof engineConfigSchema>;
/** Raw (pre-default) shape, as written in YAML or passed by callers */
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
