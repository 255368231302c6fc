import * as fs from 'fs';
import { compileSchema, describeViolations, formatViolations } from '../validation/schema-validator.js';

/**
 * Entry of data/curated-models.json
 */
export interface CuratedModelDefinition {
  displayName: string;
  internalName: string;
  size: string;
  accuracyStars: number;
  speedStars: number;
  storageSize: string;
}

export interface CuratedModelInfo {
  displayName: string;
  internalName: string;
  sizeLabel: string;
  accuracyStars: number;
  speedStars: number;
  storageSizeLabel: string;
  isDownloaded: boolean;
}

export interface ModelInfo {
  name: string;
  isDownloaded: boolean;
}

export const FALLBACK_CURATED_MODELS: readonly CuratedModelDefinition[] = [
  {
    displayName: 'Small',
    internalName: 'openai_whisper-tiny-v3-v20240930',
    size: 'Small',
    accuracyStars: 2,
    speedStars: 4,
    storageSize: '100MB',
  },
  {
    displayName: 'Medium',
    internalName: 'openai_whisper-medium-v3-v20240930',
    size: 'Medium',
    accuracyStars: 3,
    speedStars: 3,
    storageSize: '500MB',
  },
  {
    displayName: 'Large',
    internalName: 'openai_whisper-large-v3-v20240930',
    size: 'Large',
    accuracyStars: 4,
    speedStars: 2,
    storageSize: '1GB',
  },
];

const starRating = { type: 'integer', minimum: 0, maximum: 5 };

const validateDefinitions = compileSchema<CuratedModelDefinition[]>({
  type: 'array',
  items: {
    type: 'object',
    required: ['displayName', 'internalName', 'size', 'accuracyStars', 'speedStars', 'storageSize'],
    properties: {
      displayName: { type: 'string' },
      internalName: { type: 'string', minLength: 1 },
      size: { type: 'string' },
      accuracyStars: starRating,
      speedStars: starRating,
      storageSize: { type: 'string' },
    },
  },
});

/**
 * Read curated definitions; a missing or invalid file yields the built-in list.
 */
export function loadCuratedModelDefinitions(filePath: string): CuratedModelDefinition[] {
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (validateDefinitions(parsed)) {
      return parsed;
    }
    console.warn(
      `[CuratedModels] Invalid ${filePath}, using built-in list: ${formatViolations(describeViolations(validateDefinitions.errors))}`
    );
  } catch (error) {
    console.warn(`[CuratedModels] Failed to load ${filePath}, using built-in list: ${error instanceof Error ? error.message : String(error)}`);
  }
  return [...FALLBACK_CURATED_MODELS];
}

/**
 * Attach download status from the fetched model list. Curated models the
 * repository does not list count as not downloaded.
 */
export function buildCuratedModels(
  definitions: readonly CuratedModelDefinition[],
  available: readonly ModelInfo[]
): CuratedModelInfo[] {
  return definitions.map((d) => ({
    displayName: d.displayName,
    internalName: d.internalName,
    sizeLabel: d.size,
    accuracyStars: d.accuracyStars,
    speedStars: d.speedStars,
    storageSizeLabel: d.storageSize,
    isDownloaded: available.find((m) => m.name === d.internalName)?.isDownloaded ?? false,
  }));
}
