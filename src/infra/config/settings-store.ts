import * as fs from 'fs';
import * as path from 'path';
import { getConfigDir } from './config-paths.js';
import type { AppSettings, StoredSettings } from './settings-types.js';
import { DEFAULT_SETTINGS, cloneSettings, mergeSettings } from './settings-types.js';
import { PROVIDER_KINDS } from '../enhancement/provider-types.js';
import type { SchemaViolation } from '../validation/schema-validator.js';
import { compileSchema, describeViolations, formatViolations } from '../validation/schema-validator.js';

/**
 * Settings validation error
 */
export class SettingsValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: SchemaViolation[]
  ) {
    super(message);
    this.name = 'SettingsValidationError';
  }
}

export type SettingsMutator = (settings: AppSettings) => void;

/**
 * Single entry point for reading and writing persisted settings.
 * `update` hands the mutator a private copy and persists the result.
 */
export interface SettingsStore {
  read(): AppSettings;
  update(mutator: SettingsMutator): AppSettings;
}

/**
 * Get the settings file path
 */
export function getSettingsPath(): string {
  return path.join(getConfigDir(), 'settings.json');
}

const providerValueMap = {
  type: 'object',
  propertyNames: { enum: [...PROVIDER_KINDS] },
  additionalProperties: { type: 'string' },
};

const SETTINGS_SCHEMA = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  title: 'voxedit settings',
  type: 'object',
  properties: {
    $schema: { type: 'string' },
    enhancement: {
      type: 'object',
      properties: {
        enabled: { type: 'boolean' },
        activeProvider: { enum: [...PROVIDER_KINDS] },
        credentials: providerValueMap,
        selectedTextModels: providerValueMap,
        selectedImageModels: providerValueMap,
        temperature: { type: 'number', minimum: 0, maximum: 1 },
        prompt: { type: 'string' },
        imageAnalysisPrompt: { type: 'string' },
      },
      additionalProperties: false,
    },
    transcription: {
      type: 'object',
      properties: {
        selectedModel: { type: 'string' },
        warmStatus: { enum: ['cold', 'warming', 'warm'] },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

const validateStoredSettings = compileSchema<StoredSettings>(SETTINGS_SCHEMA);

/**
 * Validate a parsed settings document against the settings schema
 */
export function validateSettings(settings: unknown): StoredSettings {
  if (!validateStoredSettings(settings)) {
    const errors = describeViolations(validateStoredSettings.errors);
    throw new SettingsValidationError(`Invalid settings: ${formatViolations(errors)}`, errors);
  }
  return settings;
}

/**
 * JSON file store. A missing or unreadable file yields defaults;
 * a file that breaks the schema throws SettingsValidationError.
 */
export class FileSettingsStore implements SettingsStore {
  constructor(private readonly filePath: string = getSettingsPath()) {}

  read(): AppSettings {
    let content: string;
    try {
      if (!fs.existsSync(this.filePath)) {
        return cloneSettings(DEFAULT_SETTINGS);
      }
      content = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      console.warn(`[SettingsStore] Failed to read settings: ${error instanceof Error ? error.message : String(error)}`);
      return cloneSettings(DEFAULT_SETTINGS);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      console.warn(`[SettingsStore] Ignoring malformed settings file: ${error instanceof Error ? error.message : String(error)}`);
      return cloneSettings(DEFAULT_SETTINGS);
    }

    return mergeSettings(validateSettings(parsed));
  }

  update(mutator: SettingsMutator): AppSettings {
    const next = this.read();
    mutator(next);
    this.write(next);
    return cloneSettings(next);
  }

  private write(settings: AppSettings): void {
    validateSettings(settings);

    const dir = path.dirname(this.filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    // Credentials live here: owner read/write only
    fs.writeFileSync(this.filePath, JSON.stringify(settings, null, 2), { mode: 0o600 });
  }
}

/**
 * Store kept entirely in memory, for tests and embedders that persist elsewhere
 */
export class InMemorySettingsStore implements SettingsStore {
  private settings: AppSettings;

  constructor(initial: StoredSettings = {}) {
    this.settings = mergeSettings(initial);
  }

  read(): AppSettings {
    return cloneSettings(this.settings);
  }

  update(mutator: SettingsMutator): AppSettings {
    const next = cloneSettings(this.settings);
    mutator(next);
    this.settings = mergeSettings(validateSettings(next));
    return cloneSettings(this.settings);
  }
}
