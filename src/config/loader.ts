/**
 * Engine configuration loader
 * Reads config/engine.yaml (or ENGINE_CONFIG) and validates it against engineConfigSchema
 */

import { readFile } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { getEnv } from './env.js';
import { engineConfigSchema } from './types.js';
import type { EngineConfig, EngineConfigInput } from './types.js';
import { ConfigError } from '../shared/errors.js';

const __dirname = fileURLToPath(new URL('.', import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');
const DEFAULT_CONFIG_PATH = join(PROJECT_ROOT, 'config', 'engine.yaml');

function formatIssues(error: z.ZodError): string {
	return error.errors
		.map((e) => `  ${e.path.join('.') || '(root)'}: ${e.message}`)
		.join('\n');
}

/**
 * Load a YAML file and validate against a zod schema
 */
async function loadAndValidateYaml<S extends z.ZodTypeAny>(filePath: string, schema: S): Promise<z.output<S>> {
	let content: string;
	try {
		content = await readFile(filePath, 'utf-8');
	} catch (error) {
		throw new ConfigError(
			`Cannot read config ${filePath}`,
			error instanceof Error ? error : undefined,
		);
	}

	let raw: unknown;
	try {
		raw = parseYaml(content);
	} catch (error) {
		throw new ConfigError(
			`Invalid YAML in ${filePath}`,
			error instanceof Error ? error : undefined,
		);
	}

	// An empty file means "all defaults"
	const result = schema.safeParse(raw ?? {});
	if (!result.success) {
		throw new ConfigError(`Invalid config ${filePath}:\n${formatIssues(result.error)}`);
	}
	return result.data;
}

/**
 * Validate an in-memory config (defaults filled in)
 * @throws ConfigError
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
	const result = engineConfigSchema.safeParse(input);
	if (!result.success) {
		throw new ConfigError(`Invalid engine config:\n${formatIssues(result.error)}`);
	}
	return result.data;
}

const configCache = new Map<string, EngineConfig>();

/**
 * Load engine config from a YAML file; defaults to ENGINE_CONFIG, then config/engine.yaml
 */
export async function loadEngineConfig(filePath?: string): Promise<EngineConfig> {
	const path = resolve(filePath ?? getEnv().ENGINE_CONFIG ?? DEFAULT_CONFIG_PATH);
	const cached = configCache.get(path);
	if (cached) {
		return cached;
	}

	const config = await loadAndValidateYaml(path, engineConfigSchema);
	configCache.set(path, config);
	return config;
}

/**
 * Clear cached configuration (for testing)
 */
export function clearCache(): void {
	configCache.clear();
}

export function getProjectRoot(): string {
	return PROJECT_ROOT;
}

export function getDefaultConfigPath(): string {
	return DEFAULT_CONFIG_PATH;
}
