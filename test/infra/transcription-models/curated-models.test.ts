import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  FALLBACK_CURATED_MODELS,
  buildCuratedModels,
  loadCuratedModelDefinitions,
} from '../../../src/infra/transcription-models/curated-models.js';
import { DEFAULT_RUNTIME_CONFIG } from '../../../src/infra/config/runtime-config.js';

describe('curated models', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'voxedit-curated-'));
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it('should load the bundled list', () => {
    const definitions = loadCuratedModelDefinitions(DEFAULT_RUNTIME_CONFIG.paths.curatedModels);

    expect(definitions.map((d) => d.displayName)).toEqual(['Tiny', 'Small', 'Medium', 'Large', 'Large Turbo']);
    expect(definitions[3].internalName).toBe('openai_whisper-large-v3-v20240930');
  });

  it('should fall back when an entry breaks the schema', () => {
    const filePath = path.join(dir, 'curated.json');
    fs.writeFileSync(filePath, JSON.stringify([{ displayName: 'Broken', internalName: '' }]));

    expect(loadCuratedModelDefinitions(filePath)).toEqual(FALLBACK_CURATED_MODELS);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should fall back when the file is not JSON', () => {
    const filePath = path.join(dir, 'curated.json');
    fs.writeFileSync(filePath, 'tiny, small');

    expect(loadCuratedModelDefinitions(filePath)).toEqual(FALLBACK_CURATED_MODELS);
  });

  it('should return a copy of the fallback list', () => {
    const definitions = loadCuratedModelDefinitions(path.join(dir, 'missing.json'));
    definitions.pop();

    expect(FALLBACK_CURATED_MODELS).toHaveLength(3);
  });

  it('should mark curated entries by download status', () => {
    const curated = buildCuratedModels(FALLBACK_CURATED_MODELS, [
      { name: 'openai_whisper-medium-v3-v20240930', isDownloaded: true },
      { name: 'openai_whisper-large-v3-v20240930', isDownloaded: false },
    ]);

    expect(curated.map((m) => m.isDownloaded)).toEqual([false, true, false]);
    expect(curated[1]).toEqual({
      displayName: 'Medium',
      internalName: 'openai_whisper-medium-v3-v20240930',
      sizeLabel: 'Medium',
      accuracyStars: 3,
      speedStars: 3,
      storageSizeLabel: '500MB',
      isDownloaded: true,
    });
  });
});
