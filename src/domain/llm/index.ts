// Model catalog
export type { ModelInfo, ModelSize, ModelTask } from './models';
export {
	DEFAULT_MODEL,
	MODEL_CATALOG,
	getBestModelForTask,
	getModelInfo,
	getRecommendedModels,
	isKnownModel,
} from './models';
