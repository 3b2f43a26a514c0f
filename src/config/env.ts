/**
 * Environment variable schema and validation using zod
 */

import { z } from 'zod';
import { ConfigError } from '../shared/errors.js';

export const envSchema = z.object({
	// === Engine ===
	ENGINE_CONFIG: z.string().optional(),

	// === Voyage AI (embedding / optional rerank) ===
	VOYAGE_API_KEY: z.string().min(1).optional(),
	VOYAGE_RERANK_MODEL: z.string().default('rerank-2'),
	VOYAGE_BASE_URL: z.string().url().default('https://api.voyageai.com/v1'),
	VOYAGE_RPM_LIMIT: z.coerce.number().int().positive().default(2000),
	VOYAGE_TPM_LIMIT: z.coerce.number().int().positive().default(3000000),

	// === Cross-encoder rerank service ===
	RERANK_PROVIDER: z.enum(['http', 'voyage', 'none']).default('http'),
	RERANK_BASE_URL: z.string().url('RERANK_BASE_URL must be a valid URL').default('http://localhost:9000'),

	// === LLM (guideline selection) ===
	LLM_BASE_URL: z.string().url('LLM_BASE_URL must be a valid URL').optional(),
	LLM_API_KEY: z.string().optional(),
	LLM_MODEL: z.string().default('glm-4.5-air'),

	// === Qdrant ===
	QDRANT_URL: z.string().url('QDRANT_URL must be a valid URL').default('http://localhost:6333'),
	QDRANT_API_KEY: z.string().optional(),
	RECORDS_COLLECTION: z.string().min(1).default('knowledge_records'),
	GUIDELINES_COLLECTION: z.string().min(1).default('guidelines'),

	// === Indexing ===
	BATCH_SIZE: z.coerce.number().int().positive().default(64),

	// === Logging ===
	LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables (cached after the first success)
 * @throws ConfigError
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): Env {
	if (cachedEnv) {
		return cachedEnv;
	}

	const result = envSchema.safeParse(env);

	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `  ${e.path.join('.')}: ${e.message}`)
			.join('\n');
		throw new ConfigError(`Environment validation failed:\n${errors}`);
	}

	cachedEnv = result.data;
	return cachedEnv;
}

export function getEnv(): Env {
	return parseEnv();
}

/** For tests */
export function clearEnvCache(): void {
	cachedEnv = null;
}
