/**
 * Two-stage guideline matcher
 *
 *   IDLE → COARSE_RETRIEVAL → SHORTLIST_READY → {LLM_SELECTION | NO_LLM} → RESOLVED
 *
 * Stage 1 retrieves by lexical + vector over the guideline conditions and fuses
 * with priority as tie-break. Stage 2 lets an LLM pick one shortlisted rule; every
 * LLM failure resolves to the top fused candidate (`fusion_fallback`).
 */

import type { CorpusStats, SearchCollection } from '../store/types.js';
import type { EmbeddingConfig, GuidelineConfig, LexicalConfig } from '../config/types.js';
import type { EmbeddingClient } from '../rag/embedder.js';
import { embedQuery } from '../rag/embedder.js';
import { CorpusStatsCache, lexicalSearch } from '../rag/lexical.js';
import { vectorSearch } from '../rag/vector.js';
import { fuseHybrid, maxFusedScore } from '../rag/fusion.js';
import { allSourcesUnavailable } from '../rag/searcher.js';
import { sourceUnavailable } from '../rag/types.js';
import type { LexicalHit, ScoredCandidate, SourceOutcome, VectorHit } from '../rag/types.js';
import type { ChatClient } from './chat-client.js';
import { buildSelectionPrompt, clampConfidence, parseSelection } from './selection.js';
import type {
	GuidelinePayload,
	MatchOptions,
	MatchOutcome,
	MatchResult,
	SelectionMethod,
} from './types.js';
import { withTimeout } from '../shared/async.js';
import { withRequestContext } from '../shared/request-context.js';
import { Logger, errorMessage } from '../shared/logger.js';

/** Confidence when the LLM picked a rule outside the shortlist, or the call failed */
export const FALLBACK_CONFIDENCE_INVALID = 0.3;
/** Confidence when the LLM answered but no rule id could be parsed */
export const FALLBACK_CONFIDENCE_UNPARSEABLE = 0.5;

const LLM_TEMPERATURE = 0.3;
const LLM_MAX_TOKENS = 1000;

export type MatcherState =
	| 'IDLE'
	| 'COARSE_RETRIEVAL'
	| 'SHORTLIST_READY'
	| 'LLM_SELECTION'
	| 'NO_LLM'
	| 'RESOLVED';

export interface MatcherSettings {
	guidelines: GuidelineConfig;
	lexical: LexicalConfig;
	embedding: EmbeddingConfig;
}

export interface GuidelineMatcherConfig {
	collection: SearchCollection<GuidelinePayload>;
	embedder: EmbeddingClient;
	chatClient?: ChatClient;
	statsCache: CorpusStatsCache;
	settings: MatcherSettings;
	logger?: Logger;
}

interface Selection {
	chosen: ScoredCandidate<GuidelinePayload>;
	method: SelectionMethod;
	confidence: number;
	rationale?: string;
}

export class GuidelineMatcher {
	private readonly collection: SearchCollection<GuidelinePayload>;
	private readonly embedder: EmbeddingClient;
	private readonly chatClient: ChatClient | undefined;
	private readonly statsCache: CorpusStatsCache;
	private readonly settings: MatcherSettings;
	private readonly logger: Logger;

	constructor(config: GuidelineMatcherConfig) {
		this.collection = config.collection;
		this.embedder = config.embedder;
		this.chatClient = config.chatClient;
		this.statsCache = config.statsCache;
		this.settings = config.settings;
		this.logger = config.logger ?? new Logger({ prefix: 'guidelines:matcher' });
	}

	async match(context: string, options: MatchOptions = {}): Promise<MatchOutcome> {
		return withRequestContext('match', () => this.run(context, options));
	}

	private transition(state: MatcherState, data?: Record<string, unknown>): void {
		this.logger.debug(`→ ${state}`, data);
	}

	private async run(context: string, options: MatchOptions): Promise<MatchOutcome> {
		const cfg = this.settings.guidelines;
		const lexicalWeight = options.lexicalWeight ?? cfg.lexicalWeight;
		const vectorWeight = options.vectorWeight ?? cfg.vectorWeight;
		const threshold = options.matchConfidenceThreshold ?? cfg.matchConfidenceThreshold;

		this.transition('IDLE');
		this.logger.info(`Match: "${context.substring(0, 100)}"`);

		this.transition('COARSE_RETRIEVAL');
		const [lexical, vector] = await Promise.all([
			this.lexicalLeg(context),
			this.vectorLeg(context, options.vectorThreshold ?? cfg.vectorThreshold),
		]);
		const sources = { lexical: lexical.status, vector: vector.status };

		if (allSourcesUnavailable([lexical, vector])) {
			this.logger.warn('Guideline retrieval unavailable');
			this.transition('RESOLVED', { status: 'unavailable' });
			return { status: 'unavailable', sources };
		}

		const priorities = new Map<number, number>();
		for (const h of [...lexical.hits, ...vector.hits]) {
			priorities.set(h.id, h.payload.priority);
		}

		const shortlist = fuseHybrid(lexical.hits, vector.hits, {
			lexicalWeight,
			vectorWeight,
			k: cfg.rrfK,
			secondaryKey: id => priorities.get(id) ?? 0,
		}).slice(0, options.candidateTopK ?? cfg.candidateTopK);

		this.transition('SHORTLIST_READY', { candidates: shortlist.map(c => c.id), ...sources });

		if (shortlist.length === 0) {
			this.logger.info('No guideline matched');
			this.transition('RESOLVED', { status: 'no_match' });
			return { status: 'no_match', sources };
		}

		const useLlm = (options.useLlm ?? cfg.llmEnabled) && this.chatClient !== undefined;
		const selection = await this.select(context, shortlist, useLlm, maxFusedScore([lexicalWeight, vectorWeight], cfg.rrfK));

		const { chosen } = selection;
		const match: MatchResult = {
			rule_id: chosen.id,
			match_score: chosen.fusedScore,
			selection_method: selection.method,
			confidence: selection.confidence,
			actionable: selection.confidence >= threshold,
			title: chosen.payload.title,
			condition_text: chosen.payload.condition_text,
			action_text: chosen.payload.action_text,
			prompt_override: chosen.payload.prompt_override ?? null,
			priority: chosen.payload.priority,
			shortlist: shortlist.map(c => ({
				rule_id: c.id,
				title: c.payload.title,
				priority: c.payload.priority,
				fused_score: c.fusedScore,
				...(c.lexicalScore !== undefined ? { lexical_score: c.lexicalScore } : {}),
				...(c.vectorScore !== undefined ? { vector_score: c.vectorScore } : {}),
			})),
		};
		if (selection.rationale) {
			match.rationale = selection.rationale;
		}

		this.transition('RESOLVED', {
			rule_id: match.rule_id,
			method: match.selection_method,
			confidence: match.confidence,
		});
		this.logger.info(`Matched guideline ${match.rule_id} via ${match.selection_method}`, {
			confidence: match.confidence,
			actionable: match.actionable,
		});

		return { status: 'matched', match, sources };
	}

	private async select(
		context: string,
		shortlist: ScoredCandidate<GuidelinePayload>[],
		useLlm: boolean,
		maxScore: number,
	): Promise<Selection> {
		const top = shortlist[0];

		if (shortlist.length === 1) {
			this.transition('NO_LLM', { reason: 'single candidate' });
			return { chosen: top, method: 'fusion_only', confidence: 1.0 };
		}

		if (!useLlm || !this.chatClient) {
			this.transition('NO_LLM', { reason: 'llm disabled' });
			return {
				chosen: top,
				method: 'fusion_only',
				confidence: clampConfidence(maxScore > 0 ? top.fusedScore / maxScore : 0),
			};
		}

		this.transition('LLM_SELECTION', { candidates: shortlist.length });
		const chat = this.chatClient;
		let answer: string;
		try {
			answer = await withTimeout('llm-selection', this.settings.guidelines.llmTimeoutMs, signal =>
				chat.complete(buildSelectionPrompt(context, shortlist), {
					signal,
					temperature: LLM_TEMPERATURE,
					maxTokens: LLM_MAX_TOKENS,
				}),
			);
		} catch (error) {
			this.logger.warn('LLM selection failed, using top fused candidate', { error: errorMessage(error) });
			return {
				chosen: top,
				method: 'fusion_fallback',
				confidence: FALLBACK_CONFIDENCE_INVALID,
				rationale: `LLM call failed: ${errorMessage(error)}`,
			};
		}

		const parsed = parseSelection(answer);
		if (!parsed) {
			this.logger.warn('LLM answer had no rule id, using top fused candidate');
			return {
				chosen: top,
				method: 'fusion_fallback',
				confidence: FALLBACK_CONFIDENCE_UNPARSEABLE,
			};
		}

		const chosen = shortlist.find(c => c.id === parsed.ruleId);
		if (!chosen) {
			this.logger.warn(`LLM chose rule ${parsed.ruleId} outside the shortlist, using top fused candidate`);
			return {
				chosen: top,
				method: 'fusion_fallback',
				confidence: FALLBACK_CONFIDENCE_INVALID,
				...(parsed.rationale ? { rationale: parsed.rationale } : {}),
			};
		}

		return {
			chosen,
			method: 'llm',
			confidence: parsed.confidence,
			...(parsed.rationale ? { rationale: parsed.rationale } : {}),
		};
	}

	private async lexicalLeg(context: string): Promise<SourceOutcome<LexicalHit<GuidelinePayload>>> {
		let stats: CorpusStats;
		try {
			stats = await this.statsCache.get(this.collection);
		} catch (error) {
			this.logger.warn('Guideline corpus stats unavailable', { error: errorMessage(error) });
			return sourceUnavailable(errorMessage(error));
		}
		const { k1, b } = this.settings.lexical;
		return lexicalSearch(
			this.collection,
			context,
			stats,
			{ k1, b, topK: this.settings.guidelines.lexicalTopK },
			this.logger,
		);
	}

	private async vectorLeg(context: string, threshold: number): Promise<SourceOutcome<VectorHit<GuidelinePayload>>> {
		let queryVector: number[];
		try {
			queryVector = await embedQuery(this.embedder, context, this.settings.embedding.timeoutMs);
		} catch (error) {
			this.logger.warn('Context embedding failed, vector source unavailable', { error: errorMessage(error) });
			return sourceUnavailable(errorMessage(error));
		}
		return vectorSearch(
			this.collection,
			queryVector,
			{ threshold, topK: this.settings.guidelines.vectorTopK },
			this.logger,
		);
	}
}

export function createMatcher(config: GuidelineMatcherConfig): GuidelineMatcher {
	return new GuidelineMatcher(config);
}

/**
 * Instruction for the caller: the matched action (or its prompt override)
 * when the match is actionable, otherwise `fallback`.
 */
export function resolveInstruction(outcome: MatchOutcome, fallback: string): string {
	if (outcome.status !== 'matched' || !outcome.match.actionable) {
		return fallback;
	}
	return outcome.match.prompt_override ?? outcome.match.action_text;
}
