// Types
export type { Metrics, MonitorOptions } from './types';
export { DEFAULT_MONITOR_OPTIONS } from './types';

// Monitor
export { QuestionMonitor } from './QuestionMonitor';
export { SerialQueue } from './SerialQueue';

// Quality analysis
export type {
	ContentMatch,
	ContentVerification,
	OptionQuality,
	QualityAnalysis,
	QualityBreakdown,
} from './quality';
export { analyzeQuestionQuality, importantWords, verifyAgainstContent } from './quality';
