/**
 * Guideline (condition → action rule) types
 */

import { z } from 'zod';
import type { SourceStatus } from '../rag/types.js';

export const guidelinePayloadSchema = z.object({
	title: z.string(),
	condition_text: z.string(),
	action_text: z.string(),
	prompt_override: z.string().optional(),
	priority: z.number().int(),
});

export type GuidelinePayload = z.infer<typeof guidelinePayloadSchema>;

/** Lifecycle state in the management surface; only `active` guidelines are searchable */
export type GuidelineState = 'active' | 'inactive' | 'draft' | 'deleted';

export const guidelineSchema = z.object({
	id: z.number().int().nonnegative(),
	title: z.string().min(1),
	conditionText: z.string().min(1),
	actionText: z.string(),
	promptOverride: z.string().optional(),
	priority: z.number().int().default(1),
	state: z.enum(['active', 'inactive', 'draft', 'deleted']).default('active'),
});

export type Guideline = z.infer<typeof guidelineSchema>;

export type SelectionMethod = 'llm' | 'fusion_only' | 'fusion_fallback';

export interface ShortlistEntry {
	rule_id: number;
	title: string;
	priority: number;
	fused_score: number;
	lexical_score?: number;
	vector_score?: number;
}

export interface MatchResult {
	rule_id: number;
	/** Fused score of the chosen candidate */
	match_score: number;
	selection_method: SelectionMethod;
	confidence: number;
	rationale?: string;
	actionable: boolean;
	title: string;
	condition_text: string;
	action_text: string;
	prompt_override: string | null;
	priority: number;
	shortlist: ShortlistEntry[];
}

export type MatchOutcome =
	| { status: 'matched'; match: MatchResult; sources: Record<'lexical' | 'vector', SourceStatus> }
	| { status: 'no_match'; sources: Record<'lexical' | 'vector', SourceStatus> }
	| { status: 'unavailable'; sources: Record<'lexical' | 'vector', SourceStatus> };

export interface MatchOptions {
	candidateTopK?: number;
	useLlm?: boolean;
	/** Overrides guidelines.matchConfidenceThreshold for this call */
	matchConfidenceThreshold?: number;
	lexicalWeight?: number;
	vectorWeight?: number;
	vectorThreshold?: number;
}
