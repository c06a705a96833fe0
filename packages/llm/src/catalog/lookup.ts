import { MODEL_CATALOG, type ModelInfo } from './models.js';

function getModelInfo(modelId: string): ModelInfo | null {
  const model = MODEL_CATALOG.find((m) => m.id === modelId);
  return model ?? null;
}

function listModels(provider?: string): ReadonlyArray<ModelInfo> {
  if (provider === undefined) {
    return MODEL_CATALOG;
  }
  return MODEL_CATALOG.filter((m) => m.provider === provider);
}

/**
 * Per-model token budgets, keyed by model id.
 */
function catalogBudgets(): Record<string, number> {
  return Object.fromEntries(MODEL_CATALOG.map((m) => [m.id, m.tokensPerMinute]));
}

export { getModelInfo, listModels, catalogBudgets };
