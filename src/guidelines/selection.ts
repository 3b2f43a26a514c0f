/**
 * LLM selection step: prompt formatting and answer parsing.
 *
 * Accepted answers, tried in order:
 *   1. a ```json fenced object
 *   2. a bare {...} object
 *   3. labelled lines ("rule_id: 12", "confidence: 0.8", "rationale: ...")
 */

import { z } from 'zod';
import type { ChatMessage } from './chat-client.js';
import type { GuidelinePayload } from './types.js';
import type { ScoredCandidate } from '../rag/types.js';

export const DEFAULT_SELECTION_CONFIDENCE = 0.5;

const SYSTEM_PROMPT = 'You match conversations to action guidelines. Answer only in the requested format.';

export function formatShortlist(candidates: readonly ScoredCandidate<GuidelinePayload>[]): string {
	return candidates
		.map((c, idx) => [
			`${idx + 1}. rule_id: ${c.id}`,
			`   title: ${c.payload.title}`,
			`   condition: ${c.payload.condition_text}`,
			`   priority: ${c.payload.priority}`,
		].join('\n'))
		.join('\n\n');
}

export function buildSelectionPrompt(
	context: string,
	candidates: readonly ScoredCandidate<GuidelinePayload>[],
): ChatMessage[] {
	const user = `Pick the single guideline that best fits the conversation below.

[Conversation]
${context}

[Candidate guidelines]
${formatShortlist(candidates)}

Consider the user's core need, how well each condition matches it, and the guideline priority.
Reply with one JSON object and nothing else:
{"rule_id": <one rule_id from the list>, "confidence": <number between 0 and 1>, "rationale": "<one sentence>"}`;

	return [
		{ role: 'system', content: SYSTEM_PROMPT },
		{ role: 'user', content: user },
	];
}

export interface ParsedSelection {
	ruleId: number;
	/** Clamped to [0,1]; DEFAULT_SELECTION_CONFIDENCE when absent */
	confidence: number;
	rationale?: string;
}

const numeric = z.union([
	z.number(),
	z.string().regex(/^\s*-?\d+(\.\d+)?\s*$/).transform(Number),
]);

const answerSchema = z.object({
	rule_id: z.union([
		z.number().int(),
		z.string().regex(/^\s*\d+\s*$/).transform(Number),
	]),
	confidence: numeric.optional().catch(undefined),
	rationale: z.string().optional().catch(undefined),
});

export function clampConfidence(value: number | undefined): number {
	if (value === undefined || !Number.isFinite(value)) {
		return DEFAULT_SELECTION_CONFIDENCE;
	}
	return Math.max(0, Math.min(1, value));
}

function tryJson(text: string): ParsedSelection | undefined {
	let raw: unknown;
	try {
		raw = JSON.parse(text);
	} catch {
		return undefined;
	}
	const parsed = answerSchema.safeParse(raw);
	if (!parsed.success) {
		return undefined;
	}
	const rationale = parsed.data.rationale?.trim();
	return {
		ruleId: parsed.data.rule_id,
		confidence: clampConfidence(parsed.data.confidence),
		...(rationale ? { rationale } : {}),
	};
}

const FENCED = /```(?:json)?\s*([\s\S]*?)```/i;
const RULE_ID_LINE = /(?:rule[_ ]?id|guideline[_ ]?id|选择指南ID)\s*[:：=]\s*\[?\s*(\d+)/i;
const CONFIDENCE_LINE = /(?:confidence|置信度)\s*[:：=]\s*\[?\s*([0-9]*\.?[0-9]+)/i;
const RATIONALE_LINE = /(?:rationale|reason|思考过程)\s*[:：=]\s*(.+)/i;

function tryLabelledLines(text: string): ParsedSelection | undefined {
	const idMatch = RULE_ID_LINE.exec(text);
	if (!idMatch) {
		return undefined;
	}
	const confidenceMatch = CONFIDENCE_LINE.exec(text);
	const rationale = RATIONALE_LINE.exec(text)?.[1]?.trim();
	return {
		ruleId: Number(idMatch[1]),
		confidence: clampConfidence(confidenceMatch ? Number(confidenceMatch[1]) : undefined),
		...(rationale ? { rationale } : {}),
	};
}

/**
 * Parse an LLM answer; undefined when no rule id can be found.
 */
export function parseSelection(text: string): ParsedSelection | undefined {
	const fenced = FENCED.exec(text)?.[1];
	if (fenced) {
		const fromFence = tryJson(fenced.trim());
		if (fromFence) return fromFence;
	}

	const start = text.indexOf('{');
	const end = text.lastIndexOf('}');
	if (start >= 0 && end > start) {
		const fromObject = tryJson(text.slice(start, end + 1));
		if (fromObject) return fromObject;
	}

	return tryLabelledLines(text);
}
