import type { ProviderKind, RemoteAIModel } from './provider-types.js';

export interface FlagshipModels {
  text: string;
  image: string;
}

export const FLAGSHIP_MODELS: Record<ProviderKind, FlagshipModels> = {
  ollama: { text: 'gemma3', image: 'gemma3' },
  lmstudio: { text: 'gemma3', image: 'gemma3' },
  groq: { text: 'llama-3.3-70b-versatile', image: 'meta-llama/llama-4-maverick-17b-128e-instruct' },
  gemini: { text: 'models/gemini-2.0-flash', image: 'models/gemini-2.0-flash' },
};

/** Substrings that mark a model as vision-capable, matched case-insensitively */
export const VISION_KEYWORDS = [
  'gemini',
  'gemma',
  'llava',
  'vl',
  'vision',
  'minicpm',
  'moondream',
  'llama-4',
] as const;

export function isVisionModel(model: RemoteAIModel): boolean {
  const id = model.id.toLowerCase();
  const name = model.displayName.toLowerCase();
  return VISION_KEYWORDS.some((keyword) => id.includes(keyword) || name.includes(keyword));
}

/**
 * Keep vision-capable models, in catalog order.
 */
export function filterVisionModels(models: RemoteAIModel[]): RemoteAIModel[] {
  return models.filter(isVisionModel);
}

/**
 * Choose the selection after a catalog refresh. A current selection that the
 * catalog still lists is kept; otherwise the flagship (exact id match) wins,
 * then the first catalog entry. Returns undefined when nothing should change.
 */
export function reconcileSelection(
  models: RemoteAIModel[],
  current: string | undefined,
  flagship: string
): string | undefined {
  if (models.length === 0) {
    return undefined;
  }
  if (current && models.some((m) => m.id === current)) {
    return undefined;
  }
  if (models.some((m) => m.id === flagship)) {
    return flagship;
  }
  return models[0].id;
}
