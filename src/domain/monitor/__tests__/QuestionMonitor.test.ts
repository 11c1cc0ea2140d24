import { createGenerationConfig } from '@/domain/question/config';
import type { GenerationConfigInput, GenerationRun, QuestionRecord } from '@/domain/question/types';
import { describe, expect, it } from 'vitest';
import { QuestionMonitor } from '../QuestionMonitor';
import { SerialQueue } from '../SerialQueue';

function _trueFalse(count: number, text = 'Water boils at sea level.'): QuestionRecord[] {
	return Array.from({ length: count }, (_, i): QuestionRecord => ({
		questionType: 'true_false',
		questionText: `${text} ${i}`,
		correctAnswer: 'True',
	}));
}

function _run(
	questions: QuestionRecord[],
	generatedCount: number,
	config: Partial<GenerationConfigInput> = {},
): GenerationRun {
	return {
		config: createGenerationConfig({ questionType: 'true_false', requestedCount: 10, ...config }),
		questions,
		generatedCount,
		filteredCount: questions.length,
		rounds: 1,
		timestamp: Date.now(),
	};
}

describe('QuestionMonitor', () => {
	it('should report zeroed metrics before any run', () => {
		expect(new QuestionMonitor().metrics()).toEqual({
			totalQuestionsGenerated: 0,
			runCount: 0,
			generationSuccessRate: 0,
			filterPassRate: 0,
			averageQuestionLength: 0,
			averageOptionsPerQuestion: 0,
			questionsByType: {},
			questionsByDifficulty: {},
			questionsByLanguage: {},
		});
	});

	it('should sum filtered questions across runs', async () => {
		const monitor = new QuestionMonitor();

		await monitor.record(_run(_trueFalse(8), 10));
		await monitor.record(_run(_trueFalse(12), 12, { requestedCount: 12, difficulty: 'high' }));

		const metrics = monitor.metrics();
		expect(metrics.totalQuestionsGenerated).toBe(20);
		expect(metrics.runCount).toBe(2);
		expect(metrics.questionsByType).toEqual({ true_false: 20 });
		expect(metrics.questionsByDifficulty).toEqual({ medium: 8, high: 12 });
		expect(metrics.questionsByLanguage).toEqual({ English: 20 });
	});

	it('should average per-run rates', async () => {
		const monitor = new QuestionMonitor();

		// 10/10 generated, 8/10 kept
		await monitor.record(_run(_trueFalse(8), 10));
		// 15 generated for 10 requested counts as 1, 5/15 kept
		await monitor.record(_run(_trueFalse(5), 15));

		const metrics = monitor.metrics();
		expect(metrics.generationSuccessRate).toBeCloseTo(1);
		expect(metrics.filterPassRate).toBeCloseTo((0.8 + 5 / 15) / 2);
	});

	it('should count an empty run as a zero pass rate', async () => {
		const monitor = new QuestionMonitor();

		await monitor.record(_run([], 0));

		expect(monitor.metrics().filterPassRate).toBe(0);
		expect(monitor.metrics().generationSuccessRate).toBe(0);
	});

	it('should average options only over questions that have them', async () => {
		const monitor = new QuestionMonitor();
		const choice: QuestionRecord = {
			questionType: 'multiple_choice',
			questionText: 'Pick one?',
			options: [
				{ letter: 'A', text: 'One' },
				{ letter: 'B', text: 'Two' },
				{ letter: 'C', text: 'Three' },
				{ letter: 'D', text: 'Four' },
			],
			correctAnswer: 'A',
		};
		const statement: QuestionRecord = { questionType: 'true_false', questionText: 'Yes.', correctAnswer: 'True' };

		await monitor.record(_run([choice, statement], 2));

		const metrics = monitor.metrics();
		expect(metrics.averageOptionsPerQuestion).toBe(4);
		expect(metrics.averageQuestionLength).toBe((9 + 4) / 2);
	});

	it('should reject a run whose counts disagree', async () => {
		const monitor = new QuestionMonitor();
		const run = { ..._run(_trueFalse(2), 2), filteredCount: 3 };

		await expect(monitor.record(run)).rejects.toThrow(TypeError);
		await expect(monitor.record({ ..._run([], 0), generatedCount: -1 })).rejects.toThrow(
			'Malformed generation run: counts must be non-negative integers',
		);
		expect(monitor.metrics().runCount).toBe(0);
	});

	it('should lose no update under concurrent records', async () => {
		const monitor = new QuestionMonitor();

		await Promise.all(Array.from({ length: 25 }, () => monitor.record(_run(_trueFalse(2), 2))));

		expect(monitor.metrics().runCount).toBe(25);
		expect(monitor.metrics().totalQuestionsGenerated).toBe(50);
	});

	it('should list recent runs newest first within the retention window', async () => {
		const monitor = new QuestionMonitor({ retention: 2 });
		const runs = [1, 2, 3].map((count) => _run(_trueFalse(count), count));

		for (const run of runs) {
			await monitor.record(run);
		}

		expect(monitor.recent()).toEqual([runs[2], runs[1]]);
		expect(monitor.recent(1)).toEqual([runs[2]]);
		expect(monitor.recent(0)).toEqual([]);
		expect(monitor.metrics().runCount).toBe(3);
	});

	it('should reject a retention below 1', () => {
		expect(() => new QuestionMonitor({ retention: 0 })).toThrow(RangeError);
	});

	it('should start over after reset', async () => {
		const monitor = new QuestionMonitor();
		await monitor.record(_run(_trueFalse(3), 3));

		await monitor.reset();

		expect(monitor.metrics().runCount).toBe(0);
		expect(monitor.recent()).toEqual([]);
	});
});

describe('SerialQueue', () => {
	it('should run tasks one at a time in submission order', async () => {
		const queue = new SerialQueue();
		const log: string[] = [];

		const slow = queue.run(async () => {
			log.push('slow:start');
			await new Promise((resolve) => setTimeout(resolve, 10));
			log.push('slow:end');
		});
		const fast = queue.run(() => {
			log.push('fast');
		});

		await Promise.all([slow, fast]);
		expect(log).toEqual(['slow:start', 'slow:end', 'fast']);
	});

	it('should keep going after a failing task', async () => {
		const queue = new SerialQueue();

		const failing = queue.run(() => {
			throw new Error('nope');
		});
		const next = queue.run(() => 42);

		await expect(failing).rejects.toThrow('nope');
		await expect(next).resolves.toBe(42);
		await expect(queue.idle()).resolves.toBeUndefined();
	});
});
