/**
 * Aggregate statistics over recorded generation runs
 */
export interface Metrics {
	/** Sum of filtered questions over all runs */
	totalQuestionsGenerated: number;
	runCount: number;
	/** Mean of per-run min(generated / requested, 1) */
	generationSuccessRate: number;
	/** Mean of per-run filtered / generated (0 when nothing was generated) */
	filterPassRate: number;
	/** Mean question text length in characters over all recorded questions */
	averageQuestionLength: number;
	/** Mean option count over recorded questions that have options */
	averageOptionsPerQuestion: number;
	questionsByType: Record<string, number>;
	questionsByDifficulty: Record<string, number>;
	questionsByLanguage: Record<string, number>;
}

export interface MonitorOptions {
	/** Runs kept for `recent` */
	retention: number;
}

export const DEFAULT_MONITOR_OPTIONS: MonitorOptions = {
	retention: 50,
};
