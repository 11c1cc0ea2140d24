#!/usr/bin/env npx tsx
/**
 * Generate quiz questions from a text document
 *
 * Chunks the document, fits (or restores) a vector index over it, runs one
 * generation request and writes the export document as JSON.
 *
 * Usage:
 *   npx tsx scripts/generate-quiz.ts --input <file> [options]
 *
 * Environment (or .env):
 *   QUIZFORGE_PROVIDER, QUIZFORGE_API_KEY, QUIZFORGE_BASE_URL, QUIZFORGE_MODEL, ...
 *
 * Options:
 *   --input <path>        Text document to quiz on (required)
 *   --type <type>         multiple_choice | multiple_selection | true_false | short_answer (default: multiple_choice)
 *   --count <n>           Number of questions, 1-100 (default: 5)
 *   --topic <text>        Focus topic (optional)
 *   --difficulty <level>  low | medium | high (default: medium)
 *   --language <name>     Output language (default: English)
 *   --model <id>          Model id (default: QUIZFORGE_MODEL)
 *   --output <path>       Write the export document here instead of stdout
 *   --index-dir <dir>     Reuse or store the fitted index under this directory
 *   --list-models         Print the model catalog and exit
 *   --help, -h            Show help
 */

import 'dotenv/config';
import {createHash} from 'node:crypto';
import {mkdirSync, readFileSync, writeFileSync} from 'node:fs';
import {basename, dirname} from 'node:path';
import {
	CorruptStateError,
	FileStorageAdapter,
	GenerationOrchestrator,
	InvalidConfigError,
	MODEL_CATALOG,
	QUESTION_TYPES,
	QuestionMonitor,
	VectorIndex,
	cleanText,
	createLLMProvider,
	getRecommendedModels,
	isQuizForgeError,
	loadSettings,
	splitIntoChunks,
	toChunkingOptions,
	toExportDocument,
	toGenerationSettings,
	toMonitorOptions,
	toVectorizerOptions,
	type QuizForgeSettings,
} from '../src';
import {getArg, getIntArg, hasFlag} from './lib/args';

const HELP = `
Quiz Generation Script

Usage:
  npx tsx scripts/generate-quiz.ts --input <file> [options]

Options:
  --input <path>        Text document to quiz on (required)
  --type <type>         ${QUESTION_TYPES.join(' | ')} (default: multiple_choice)
  --count <n>           Number of questions, 1-100 (default: 5)
  --topic <text>        Focus topic (optional)
  --difficulty <level>  low | medium | high (default: medium)
  --language <name>     Output language (default: English)
  --model <id>          Model id (default: QUIZFORGE_MODEL)
  --output <path>       Write the export document here instead of stdout
  --index-dir <dir>     Reuse or store the fitted index under this directory
  --list-models         Print the model catalog and exit
  --help, -h            Show help

Examples:
  # Five medium multiple-choice questions from a local Ollama model
  npx tsx scripts/generate-quiz.ts --input notes/physics.txt

  # Ten hard true/false questions about tides, keeping the index between runs
  npx tsx scripts/generate-quiz.ts --input notes/physics.txt --type true_false --count 10 \\
    --difficulty high --topic tides --index-dir .quizforge
`;

// ============ Helper Functions ============

/**
 * Storage key for a document: its name plus a content hash, so an edited
 * file gets a fresh index
 */
function getDocumentKey(sourceName: string, text: string): string {
	const name = sourceName.toLowerCase().replace(/[^a-z0-9._-]+/g, '-');
	const hash = createHash('sha256').update(text).digest('hex').slice(0, 16);
	return `${name}-${hash}`;
}

function listModels(): void {
	const recommended = new Set(getRecommendedModels());
	for (const [id, info] of Object.entries(MODEL_CATALOG)) {
		const marker = recommended.has(id) ? '*' : ' ';
		console.log(
			`${marker} ${id.padEnd(16)} quality ${info.questionQuality}  speed ${info.speed}  ${info.size.padEnd(6)}  ${info.description}`,
		);
	}
	console.log('\n* recommended for question generation');
}

/**
 * Restore the document's index from `indexDir`, or fit and store a fresh one
 */
async function loadIndex(text: string, sourceName: string, settings: QuizForgeSettings, indexDir: string | undefined): Promise<VectorIndex> {
	const storage = indexDir ? new FileStorageAdapter(indexDir) : null;
	const location = `indexes/${getDocumentKey(sourceName, text)}`;

	if (storage) {
		try {
			const restored = await VectorIndex.restore(storage, location);
			console.error(`  Restored index (${restored.size} chunks) from ${indexDir}`);
			return restored;
		} catch (error) {
			if (!(error instanceof CorruptStateError)) throw error;
			console.error(`  No usable stored index (${error.message}), fitting a new one`);
		}
	}

	const chunks = await splitIntoChunks(cleanText(text), toChunkingOptions(settings));
	console.error(`  Split into ${chunks.length} chunks`);

	const index = new VectorIndex(toVectorizerOptions(settings));
	index.fit(chunks);
	console.error(`  Fitted index: ${index.getDimensions()} features`);

	if (storage) {
		await index.persist(storage, location);
		console.error(`  Stored index under ${indexDir}`);
	}
	return index;
}

// ============ Main ============

async function main() {
	const args = process.argv.slice(2);

	if (hasFlag(args, '--help', '-h')) {
		console.log(HELP);
		return;
	}
	if (hasFlag(args, '--list-models')) {
		listModels();
		return;
	}

	const inputPath = getArg(args, '--input');
	if (!inputPath) {
		console.error('Error: --input <path> is required');
		console.error(HELP);
		process.exitCode = 1;
		return;
	}

	const settings = loadSettings();
	const outputPath = getArg(args, '--output');
	const indexDir = getArg(args, '--index-dir');
	const sourceName = basename(inputPath);

	const llmProvider = createLLMProvider(settings);
	const modelId = getArg(args, '--model') ?? llmProvider.getModelName();

	console.error('=== Quiz Generation ===');
	console.error(`Input: ${inputPath}`);
	console.error(`Provider: ${llmProvider.getProviderName()}`);
	console.error(`Model: ${modelId}`);
	console.error('');

	const text = readFileSync(inputPath, 'utf-8');
	const index = await loadIndex(text, sourceName, settings, indexDir);

	const monitor = new QuestionMonitor(toMonitorOptions(settings));
	const orchestrator = new GenerationOrchestrator(index, llmProvider, monitor, toGenerationSettings(settings));

	const run = await orchestrator.generate(
		{
			questionType: getArg(args, '--type') ?? 'multiple_choice',
			requestedCount: getIntArg(args, '--count', 5),
			topic: getArg(args, '--topic') ?? null,
			difficulty: getArg(args, '--difficulty'),
			language: getArg(args, '--language'),
			modelId,
			sourceName,
		},
		(progress) => console.error(`  [round ${progress.round}] ${progress.stage}: ${progress.message}`),
	);

	const json = JSON.stringify(toExportDocument(run), null, 2);
	if (outputPath) {
		mkdirSync(dirname(outputPath), {recursive: true});
		writeFileSync(outputPath, json);
		console.error(`\nWrote ${run.questions.length} questions to ${outputPath}`);
	} else {
		console.log(json);
	}

	const metrics = monitor.metrics();
	console.error('');
	console.error('=== Metrics ===');
	console.error(`Questions: ${metrics.totalQuestionsGenerated} (parsed ${run.generatedCount}, rounds ${run.rounds})`);
	console.error(`Generation success rate: ${(metrics.generationSuccessRate * 100).toFixed(1)}%`);
	console.error(`Filter pass rate: ${(metrics.filterPassRate * 100).toFixed(1)}%`);
	console.error(`Average question length: ${metrics.averageQuestionLength.toFixed(1)} chars`);
}

main().catch((err: unknown) => {
	if (isQuizForgeError(err)) {
		console.error(`Error [${err.code}]: ${err.message}`);
		if (err instanceof InvalidConfigError) {
			for (const issue of err.issues) console.error(`  - ${issue}`);
		}
		if (err.code === 'MODEL_UNAVAILABLE') {
			console.error('Check that the model server is running and QUIZFORGE_BASE_URL points at it.');
		}
	} else {
		console.error('Error:', err instanceof Error ? err.message : err);
		if (err instanceof Error) console.error(err.stack);
	}
	process.exit(1);
});
