/**
 * Capability catalog for common locally hosted models
 *
 * Ratings are on a 1-5 scale and only guide model choice; any model id the
 * backend accepts can still be used.
 */

export type ModelSize = 'tiny' | 'small' | 'medium';

export interface ModelInfo {
	questionQuality: number;
	reasoning: number;
	knowledge: number;
	speed: number;
	size: ModelSize;
	description: string;
}

export type ModelTask = 'question_generation' | 'general';

export const DEFAULT_MODEL = 'llama3';

export const MODEL_CATALOG: Readonly<Record<string, ModelInfo>> = {
	llama3: {
		questionQuality: 3,
		reasoning: 3,
		knowledge: 3,
		speed: 4,
		size: 'medium',
		description: 'Default model with balanced capabilities',
	},
	mistral: {
		questionQuality: 4,
		reasoning: 4,
		knowledge: 3,
		speed: 3,
		size: 'medium',
		description: 'Strong reasoning and instruction following',
	},
	phi3: {
		questionQuality: 4,
		reasoning: 4,
		knowledge: 3,
		speed: 5,
		size: 'small',
		description: 'Lightweight model with good reasoning',
	},
	gemma: {
		questionQuality: 3,
		reasoning: 3,
		knowledge: 3,
		speed: 4,
		size: 'small',
		description: 'Efficient general-purpose model',
	},
	'neural-chat': {
		questionQuality: 4,
		reasoning: 3,
		knowledge: 4,
		speed: 3,
		size: 'medium',
		description: 'Tuned for conversational tasks',
	},
	'llama3:8b': {
		questionQuality: 3,
		reasoning: 3,
		knowledge: 3,
		speed: 5,
		size: 'small',
		description: 'Smaller, faster Llama 3',
	},
	'mistral:7b': {
		questionQuality: 3,
		reasoning: 4,
		knowledge: 3,
		speed: 4,
		size: 'small',
		description: 'Compact Mistral with strong reasoning',
	},
	'phi3:mini': {
		questionQuality: 3,
		reasoning: 3,
		knowledge: 2,
		speed: 5,
		size: 'tiny',
		description: 'Very small and fast',
	},
	'gemma:2b': {
		questionQuality: 2,
		reasoning: 2,
		knowledge: 2,
		speed: 5,
		size: 'tiny',
		description: 'Extremely lightweight',
	},
	'neural-chat:7b': {
		questionQuality: 4,
		reasoning: 3,
		knowledge: 3,
		speed: 4,
		size: 'small',
		description: 'Smaller conversational model',
	},
};

/** Suggested order for question generation */
const RECOMMENDED_MODELS = ['phi3', 'mistral', 'neural-chat', 'llama3', 'gemma'];

export function getRecommendedModels(): string[] {
	return [...RECOMMENDED_MODELS];
}

/**
 * Catalog entry for a model, falling back to the default model's entry
 */
export function getModelInfo(modelId: string): ModelInfo {
	return MODEL_CATALOG[modelId] ?? MODEL_CATALOG[DEFAULT_MODEL];
}

export function isKnownModel(modelId: string): boolean {
	return Object.prototype.hasOwnProperty.call(MODEL_CATALOG, modelId);
}

/**
 * Pick the best of the available models for a task
 *
 * For question generation this is the known model with the highest
 * question quality (first listed wins ties). Otherwise, or when no
 * available model is in the catalog, the first available model.
 */
export function getBestModelForTask(availableModels: readonly string[], task: ModelTask = 'question_generation'): string {
	if (availableModels.length === 0) {
		return DEFAULT_MODEL;
	}
	if (task !== 'question_generation') {
		return availableModels[0];
	}

	const known = availableModels.filter(isKnownModel);
	if (known.length === 0) {
		return availableModels[0];
	}

	return [...known].sort((a, b) => getModelInfo(b).questionQuality - getModelInfo(a).questionQuality)[0];
}
