import type { GenerationRun } from '@/domain/question/types';
import { SerialQueue } from './SerialQueue';
import type { Metrics, MonitorOptions } from './types';
import { DEFAULT_MONITOR_OPTIONS } from './types';

interface Totals {
	runCount: number;
	totalQuestions: number;
	successRateSum: number;
	filterPassRateSum: number;
	questionLengthSum: number;
	optionCountSum: number;
	questionsWithOptions: number;
	byType: Record<string, number>;
	byDifficulty: Record<string, number>;
	byLanguage: Record<string, number>;
}

function emptyTotals(): Totals {
	return {
		runCount: 0,
		totalQuestions: 0,
		successRateSum: 0,
		filterPassRateSum: 0,
		questionLengthSum: 0,
		optionCountSum: 0,
		questionsWithOptions: 0,
		byType: {},
		byDifficulty: {},
		byLanguage: {},
	};
}

function isCount(value: number): boolean {
	return Number.isInteger(value) && value >= 0;
}

function increment(counter: Record<string, number>, key: string, amount: number): void {
	counter[key] = (counter[key] ?? 0) + amount;
}

/**
 * Aggregates quality statistics across generation runs
 *
 * Writes go through a single-writer queue, so concurrent `record` calls
 * never interleave. `metrics()` and `recent()` read a consistent snapshot.
 */
export class QuestionMonitor {
	private readonly options: MonitorOptions;
	private readonly queue = new SerialQueue();
	private totals: Totals = emptyTotals();
	/** Oldest first */
	private runs: GenerationRun[] = [];

	constructor(options: Partial<MonitorOptions> = {}) {
		this.options = { ...DEFAULT_MONITOR_OPTIONS, ...options };
		if (!Number.isInteger(this.options.retention) || this.options.retention < 1) {
			throw new RangeError(`retention must be a positive integer, got ${this.options.retention}`);
		}
	}

	/**
	 * Fold a completed run into the metrics
	 *
	 * @throws TypeError if the run's counts are inconsistent
	 */
	record(run: GenerationRun): Promise<void> {
		return this.queue.run(() => {
			this.assertWellFormed(run);
			this.apply(run);
		});
	}

	/**
	 * Snapshot of the aggregate statistics
	 */
	metrics(): Metrics {
		const t = this.totals;
		return {
			totalQuestionsGenerated: t.totalQuestions,
			runCount: t.runCount,
			generationSuccessRate: t.runCount > 0 ? t.successRateSum / t.runCount : 0,
			filterPassRate: t.runCount > 0 ? t.filterPassRateSum / t.runCount : 0,
			averageQuestionLength: t.totalQuestions > 0 ? t.questionLengthSum / t.totalQuestions : 0,
			averageOptionsPerQuestion:
				t.questionsWithOptions > 0 ? t.optionCountSum / t.questionsWithOptions : 0,
			questionsByType: { ...t.byType },
			questionsByDifficulty: { ...t.byDifficulty },
			questionsByLanguage: { ...t.byLanguage },
		};
	}

	/**
	 * Most recent runs first, within the retention window
	 */
	recent(limit = 10): GenerationRun[] {
		if (limit <= 0) return [];
		return this.runs.slice(-limit).reverse();
	}

	/**
	 * Drop all recorded runs and statistics
	 */
	reset(): Promise<void> {
		return this.queue.run(() => {
			this.totals = emptyTotals();
			this.runs = [];
		});
	}

	private assertWellFormed(run: GenerationRun): void {
		const { requestedCount } = run.config;
		if (!isCount(run.generatedCount) || !isCount(run.filteredCount) || !isCount(requestedCount)) {
			throw new TypeError('Malformed generation run: counts must be non-negative integers');
		}
		if (run.filteredCount !== run.questions.length) {
			throw new TypeError(
				`Malformed generation run: filteredCount ${run.filteredCount} != ${run.questions.length} questions`,
			);
		}
	}

	private apply(run: GenerationRun): void {
		const t = this.totals;
		const { config } = run;

		t.runCount++;
		t.totalQuestions += run.filteredCount;
		t.successRateSum += config.requestedCount > 0 ? Math.min(run.generatedCount / config.requestedCount, 1) : 0;
		t.filterPassRateSum += run.generatedCount > 0 ? run.filteredCount / run.generatedCount : 0;

		for (const question of run.questions) {
			t.questionLengthSum += question.questionText.length;
			if (question.questionType === 'multiple_choice' || question.questionType === 'multiple_selection') {
				t.optionCountSum += question.options.length;
				t.questionsWithOptions++;
			}
		}

		increment(t.byType, config.questionType, run.filteredCount);
		increment(t.byDifficulty, config.difficulty, run.filteredCount);
		increment(t.byLanguage, config.language, run.filteredCount);

		this.runs.push(run);
		if (this.runs.length > this.options.retention) {
			this.runs.splice(0, this.runs.length - this.options.retention);
		}
	}
}
