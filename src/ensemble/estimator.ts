/**
 * Ensemble confidence estimator
 *
 * Runs one retrieval pipeline under several parameter strategies in parallel and
 * reports how much the runs agree on the top answer.
 */

import type { EnsembleConfig } from '../config/types.js';
import type { ISearcher } from '../rag/types.js';
import { maxFusedScore } from '../rag/fusion.js';
import type { GuidelineMatcher } from '../guidelines/matcher.js';
import { clampConfidence } from '../guidelines/selection.js';
import { SearchError } from '../shared/errors.js';
import { withRequestContext } from '../shared/request-context.js';
import { Logger, errorMessage } from '../shared/logger.js';

export type StrategyName = EnsembleConfig['strategies'][number];

export interface StrategyParams {
	threshold: number;
	topK: number;
	vectorWeight: number;
	lexicalWeight: number;
}

export const STRATEGIES: Record<StrategyName, StrategyParams> = {
	conservative: { threshold: 0.8, topK: 10, vectorWeight: 0.6, lexicalWeight: 0.4 },
	balanced: { threshold: 0.6, topK: 5, vectorWeight: 0.6, lexicalWeight: 0.4 },
	lexical_heavy: { threshold: 0.7, topK: 5, vectorWeight: 0.3, lexicalWeight: 0.7 },
	vector_heavy: { threshold: 0.7, topK: 5, vectorWeight: 0.7, lexicalWeight: 0.3 },
};

/** Top answer of one run; undefined when the run found nothing */
export interface PipelineAnswer {
	key: number;
	confidence: number;
}

export type EnsemblePipeline = (params: StrategyParams) => Promise<PipelineAnswer | undefined>;

export type StrategyRun =
	| { strategy: StrategyName; status: 'answered'; key: number; confidence: number }
	| { strategy: StrategyName; status: 'empty' }
	| { strategy: StrategyName; status: 'failed'; error: string };

export interface EnsembleReport {
	key: number | null;
	confidence: number;
	consistency: number;
	is_reliable: boolean;
	successful_runs: number;
	failed_runs: number;
	runs: StrategyRun[];
}

/**
 * Majority vote over the answered runs.
 * Ties: higher summed confidence, then the key seen first.
 */
export function aggregateRuns(runs: StrategyRun[], reliabilityThreshold: number): EnsembleReport {
	const answered = runs.flatMap(r => (r.status === 'answered' ? [r] : []));
	const failed = runs.filter(r => r.status === 'failed').length;
	const successful = runs.length - failed;

	const votes = new Map<number, { count: number; total: number }>();
	for (const run of answered) {
		const vote = votes.get(run.key) ?? { count: 0, total: 0 };
		vote.count += 1;
		vote.total += run.confidence;
		votes.set(run.key, vote);
	}

	let winner: number | null = null;
	let best = { count: 0, total: 0 };
	// Map iteration follows insertion order, so strict comparisons keep the first seen on a full tie
	for (const [key, vote] of votes) {
		if (vote.count > best.count || (vote.count === best.count && vote.total > best.total)) {
			winner = key;
			best = vote;
		}
	}

	const consistency = successful > 0 ? best.count / successful : 0;
	const confidence = best.count > 0 ? best.total / best.count : 0;

	return {
		key: winner,
		confidence,
		consistency,
		is_reliable: winner !== null && consistency >= reliabilityThreshold && confidence >= reliabilityThreshold,
		successful_runs: successful,
		failed_runs: failed,
		runs,
	};
}

export interface EstimatorConfig {
	ensemble: EnsembleConfig;
	logger?: Logger;
}

export class ConfidenceEstimator {
	private readonly ensemble: EnsembleConfig;
	private readonly logger: Logger;

	constructor(config: EstimatorConfig) {
		this.ensemble = config.ensemble;
		this.logger = config.logger ?? new Logger({ prefix: 'ensemble' });
	}

	async estimate(pipeline: EnsemblePipeline, strategies: StrategyName[] = this.ensemble.strategies): Promise<EnsembleReport> {
		return withRequestContext('ensemble', async () => {
			const runs = await Promise.all(strategies.map(name => this.runStrategy(pipeline, name)));
			const report = aggregateRuns(runs, this.ensemble.reliabilityThreshold);
			this.logger.info(`Ensemble key=${report.key ?? '-'}`, {
				consistency: report.consistency,
				confidence: report.confidence,
				is_reliable: report.is_reliable,
				failed_runs: report.failed_runs,
			});
			return report;
		});
	}

	private async runStrategy(pipeline: EnsemblePipeline, strategy: StrategyName): Promise<StrategyRun> {
		try {
			const answer = await pipeline(STRATEGIES[strategy]);
			if (!answer) {
				return { strategy, status: 'empty' };
			}
			return { strategy, status: 'answered', key: answer.key, confidence: clampConfidence(answer.confidence) };
		} catch (error) {
			this.logger.warn(`Strategy ${strategy} failed`, { error: errorMessage(error) });
			return { strategy, status: 'failed', error: errorMessage(error) };
		}
	}
}

export function createEstimator(config: EstimatorConfig): ConfidenceEstimator {
	return new ConfidenceEstimator(config);
}

// ── Adapters ────────────────────────────────────────────

/**
 * Document search as an ensemble pipeline: key = top record id,
 * confidence = rerank score when present, else the normalised fused score.
 */
export function documentSearchPipeline(searcher: ISearcher, query: string, rrfK: number): EnsemblePipeline {
	return async params => {
		const response = await searcher.search(query, {
			limit: params.topK,
			vectorThreshold: params.threshold,
			lexicalWeight: params.lexicalWeight,
			vectorWeight: params.vectorWeight,
		});
		if (response.status === 'unavailable') {
			throw new SearchError('All retrieval sources unavailable');
		}
		const top = response.results[0];
		if (!top) {
			return undefined;
		}
		const confidence = top.rerank_score !== undefined
			? top.rerank_score
			: top.fused_score / maxFusedScore([params.lexicalWeight, params.vectorWeight], rrfK);
		return { key: top.id, confidence };
	};
}

/** Guideline matching as an ensemble pipeline: key = rule id, confidence = match confidence */
export function guidelinePipeline(matcher: GuidelineMatcher, context: string, maxCandidates = 10): EnsemblePipeline {
	return async params => {
		const outcome = await matcher.match(context, {
			candidateTopK: Math.min(params.topK, maxCandidates),
			vectorThreshold: params.threshold,
			lexicalWeight: params.lexicalWeight,
			vectorWeight: params.vectorWeight,
		});
		if (outcome.status === 'unavailable') {
			throw new SearchError('Guideline retrieval unavailable');
		}
		if (outcome.status === 'no_match') {
			return undefined;
		}
		return { key: outcome.match.rule_id, confidence: outcome.match.confidence };
	};
}
