import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import open from 'open';
import { ModelLifecycleManager } from '../../../src/infra/transcription-models/model-lifecycle-manager.js';
import { InMemorySettingsStore } from '../../../src/infra/config/settings-store.js';
import type { StoredSettings } from '../../../src/infra/config/settings-types.js';
import { EventBus } from '../../../src/infra/events/event-bus.js';
import type { VoxeditEvents } from '../../../src/infra/events/index.js';
import type { ModelWarmStatus } from '../../../src/infra/config/settings-types.js';
import { FakeModelRepository } from '../../helpers/fake-model-repository.js';
import { deferred } from '../../helpers/fake-provider.js';

jest.mock('open', () => jest.fn());

const LARGE = 'openai_whisper-large-v3-v20240930';
const TINY = 'openai_whisper-tiny';
const MEDIUM = 'openai_whisper-medium-v3-v20240930';

function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('ModelLifecycleManager', () => {
  let workDir: string;
  let curatedPath: string;
  let repository: FakeModelRepository;
  let store: InMemorySettingsStore;
  let events: EventBus<VoxeditEvents>;
  let manager: ModelLifecycleManager;

  function createManager(initial: StoredSettings = {}, curatedModelsPath = curatedPath): ModelLifecycleManager {
    store = new InMemorySettingsStore(initial);
    manager = new ModelLifecycleManager({ repository, settings: store, curatedModelsPath, events });
    return manager;
  }

  function recordWarmStatuses(): ModelWarmStatus[] {
    const statuses: ModelWarmStatus[] = [];
    events.on('models.state_changed', ({ warmStatus }) => {
      if (statuses[statuses.length - 1] !== warmStatus) {
        statuses.push(warmStatus);
      }
    });
    return statuses;
  }

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'voxedit-models-'));
    curatedPath = path.join(workDir, 'curated-models.json');
    fs.writeFileSync(
      curatedPath,
      JSON.stringify([
        { displayName: 'Tiny', internalName: TINY, size: 'Tiny', accuracyStars: 1, speedStars: 5, storageSize: '75MB' },
        { displayName: 'Large', internalName: LARGE, size: 'Large', accuracyStars: 4, speedStars: 2, storageSize: '1GB' },
      ])
    );
    repository = new FakeModelRepository([TINY, MEDIUM, LARGE], LARGE, path.join(workDir, 'models'));
    events = new EventBus<VoxeditEvents>();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    manager.dispose();
    fs.rmSync(workDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it('should start cold whatever was persisted', () => {
    createManager({ transcription: { selectedModel: TINY, warmStatus: 'warm' } });

    expect(manager.warmStatus).toBe('cold');
    expect(manager.selectedModel).toBe(TINY);
    expect(store.read().transcription.warmStatus).toBe('cold');
  });

  describe('fetchModels', () => {
    it('should list models with download status and curated entries', async () => {
      repository.downloaded.add(LARGE);
      createManager();

      await manager.fetchModels();

      const state = manager.getState();
      expect(state.recommendedModel).toBe(LARGE);
      expect(state.availableModels).toEqual([
        { name: TINY, isDownloaded: false },
        { name: MEDIUM, isDownloaded: false },
        { name: LARGE, isDownloaded: true },
      ]);
      expect(state.curatedModels).toEqual([
        {
          displayName: 'Tiny',
          internalName: TINY,
          sizeLabel: 'Tiny',
          accuracyStars: 1,
          speedStars: 5,
          storageSizeLabel: '75MB',
          isDownloaded: false,
        },
        {
          displayName: 'Large',
          internalName: LARGE,
          sizeLabel: 'Large',
          accuracyStars: 4,
          speedStars: 2,
          storageSizeLabel: '1GB',
          isDownloaded: true,
        },
      ]);
    });

    it('should leave an empty list when the repository fails', async () => {
      repository.getAvailableModels.mockRejectedValue(new Error('engine offline'));
      createManager();

      await manager.fetchModels();

      expect(manager.getState().availableModels).toEqual([]);
      expect(manager.getState().recommendedModel).toBe('');
      expect(manager.getState().curatedModels.every((m) => !m.isDownloaded)).toBe(true);
    });

    it('should keep the newest refresh when an older one finishes last', async () => {
      const stalled = deferred<void>();
      repository.isModelDownloaded.mockImplementationOnce(async () => {
        await stalled.promise;
        return false;
      });
      createManager();

      const older = manager.fetchModels();
      await flushPromises();
      repository.downloaded.add(TINY);
      await manager.fetchModels();
      stalled.resolve();
      await older;

      expect(manager.getState().availableModels).toEqual([
        { name: TINY, isDownloaded: true },
        { name: MEDIUM, isDownloaded: false },
        { name: LARGE, isDownloaded: false },
      ]);
    });

    it('should use the built-in curated list when the file is missing', async () => {
      createManager({}, path.join(workDir, 'missing.json'));

      await manager.fetchModels();

      expect(manager.getState().curatedModels.map((m) => m.displayName)).toEqual(['Small', 'Medium', 'Large']);
    });
  });

  describe('download', () => {
    it('should download the selected model and prewarm it', async () => {
      createManager();
      await manager.fetchModels();
      const warmStatuses = recordWarmStatuses();

      await manager.download();

      const state = manager.getState();
      expect(repository.downloadModel).toHaveBeenCalledWith(LARGE, expect.any(Function), {
        signal: expect.any(AbortSignal),
      });
      expect(state.isDownloading).toBe(false);
      expect(state.downloadProgress).toBe(1);
      expect(state.availableModels.find((m) => m.name === LARGE)?.isDownloaded).toBe(true);
      expect(state.curatedModels.find((m) => m.internalName === LARGE)?.isDownloaded).toBe(true);
      expect(repository.prewarmModel).toHaveBeenCalledTimes(1);
      expect(warmStatuses).toEqual(['cold', 'warming', 'warm']);
      expect(manager.warmStatus).toBe('warm');
    });

    it('should not prewarm a model that is not selected', async () => {
      createManager();

      await manager.download(TINY);

      expect(repository.prewarmModel).not.toHaveBeenCalled();
      expect(manager.warmStatus).toBe('cold');
    });

    it('should report a failed download', async () => {
      repository.downloadModel.mockRejectedValueOnce(new Error('disk full'));
      createManager();

      await manager.download();

      const state = manager.getState();
      expect(state.isDownloading).toBe(false);
      expect(state.downloadProgress).toBe(0);
      expect(state.downloadError).toBe('disk full');
      expect(repository.prewarmModel).not.toHaveBeenCalled();
    });

    it('should ignore a download superseded by a newer one', async () => {
      const stalled = deferred<void>();
      repository.downloadModel.mockImplementationOnce(async (_name, onProgress) => {
        await stalled.promise;
        onProgress(0.9);
      });
      createManager();
      await manager.fetchModels();

      const first = manager.download(MEDIUM);
      await manager.download(TINY);
      stalled.resolve();
      await first;

      const state = manager.getState();
      expect(repository.downloadModel.mock.calls[0][2]?.signal?.aborted).toBe(true);
      expect(state.downloadProgress).toBe(1);
      expect(state.downloadingModelName).toBeUndefined();
      expect(state.availableModels.find((m) => m.name === MEDIUM)?.isDownloaded).toBe(false);
      expect(state.availableModels.find((m) => m.name === TINY)?.isDownloaded).toBe(true);
    });

    it('should stop tracking a cancelled download', async () => {
      const stalled = deferred<void>();
      repository.downloadModel.mockImplementationOnce(() => stalled.promise);
      createManager();

      const running = manager.download();
      expect(manager.getState().isDownloading).toBe(true);
      expect(manager.getState().downloadingModelName).toBe(LARGE);

      manager.cancelDownload();
      stalled.reject(new Error('aborted'));
      await running;

      expect(manager.getState().isDownloading).toBe(false);
      expect(manager.getState().downloadError).toBeUndefined();
      expect(repository.prewarmModel).not.toHaveBeenCalled();
    });
  });

  describe('prewarm', () => {
    it('should fail without touching the repository when the model is not downloaded', async () => {
      createManager();

      await manager.prewarm();

      expect(repository.prewarmModel).not.toHaveBeenCalled();
      expect(manager.getState().prewarmError).toBe(`Model ${LARGE} is not downloaded`);
      expect(manager.getState().isPrewarming).toBe(false);
      expect(manager.warmStatus).toBe('cold');
    });

    it('should return to cold when prewarming fails', async () => {
      repository.downloaded.add(LARGE);
      repository.prewarmModel.mockRejectedValueOnce(new Error('out of memory'));
      createManager();
      const warmStatuses = recordWarmStatuses();

      await manager.prewarm();

      expect(warmStatuses).toEqual(['cold', 'warming', 'cold']);
      expect(manager.getState().prewarmError).toBe('out of memory');
    });

    it('should skip a model that is already warm', async () => {
      repository.downloaded.add(LARGE);
      createManager();

      await manager.prewarm();
      await manager.prewarm();

      expect(repository.prewarmModel).toHaveBeenCalledTimes(1);
      expect(manager.getState().prewarmProgress).toBe(1);
    });

    it('should return the selected model to cold when another prewarm takes over', async () => {
      const stalled = deferred<void>();
      repository.downloaded.add(LARGE);
      repository.downloaded.add(TINY);
      repository.prewarmModel.mockImplementationOnce(() => stalled.promise);
      createManager();

      const warming = manager.prewarm();
      await flushPromises();
      expect(manager.warmStatus).toBe('warming');

      await manager.prewarm(TINY);
      expect(manager.warmStatus).toBe('cold');

      stalled.resolve();
      await warming;

      expect(manager.warmStatus).toBe('cold');
      expect(store.read().transcription.warmStatus).toBe('cold');
      expect(manager.getState().isPrewarming).toBe(false);
    });
  });

  describe('selectModel', () => {
    it('should persist the selection and prewarm a downloaded model', async () => {
      repository.downloaded.add(TINY);
      createManager();

      await manager.selectModel(TINY);

      expect(store.read().transcription).toEqual({ selectedModel: TINY, warmStatus: 'warm' });
      expect(repository.prewarmModel).toHaveBeenCalledWith(TINY, expect.any(Function), {
        signal: expect.any(AbortSignal),
      });
    });

    it('should leave a model that is not downloaded cold', async () => {
      createManager();

      await manager.selectModel(MEDIUM);

      expect(manager.selectedModel).toBe(MEDIUM);
      expect(manager.warmStatus).toBe('cold');
      expect(repository.prewarmModel).not.toHaveBeenCalled();
    });

    it('should abandon a prewarm of the previous selection', async () => {
      const stalled = deferred<void>();
      repository.downloaded.add(LARGE);
      repository.prewarmModel.mockImplementationOnce(() => stalled.promise);
      createManager();

      const warming = manager.prewarm();
      await flushPromises();
      expect(manager.warmStatus).toBe('warming');

      await manager.selectModel(MEDIUM);
      stalled.resolve();
      await warming;

      expect(manager.selectedModel).toBe(MEDIUM);
      expect(manager.warmStatus).toBe('cold');
      expect(manager.getState().isPrewarming).toBe(false);
    });
  });

  describe('delete', () => {
    it('should delete the selected model, mark it cold and refresh', async () => {
      repository.downloaded.add(LARGE);
      createManager();
      await manager.prewarm();
      expect(manager.warmStatus).toBe('warm');

      await manager.delete();

      expect(repository.deleteModel).toHaveBeenCalledWith(LARGE);
      expect(manager.warmStatus).toBe('cold');
      expect(repository.getAvailableModels).toHaveBeenCalledTimes(1);
      expect(manager.getState().availableModels.find((m) => m.name === LARGE)?.isDownloaded).toBe(false);
    });

    it('should keep the warm status when deleting another model', async () => {
      repository.downloaded.add(LARGE);
      repository.downloaded.add(TINY);
      createManager();
      await manager.prewarm();

      await manager.delete(TINY);

      expect(manager.warmStatus).toBe('warm');
    });

    it('should surface a failed delete', async () => {
      repository.deleteModel.mockRejectedValueOnce(new Error('permission denied'));
      createManager();

      await manager.delete(TINY);

      expect(manager.getState().downloadError).toBe('permission denied');
      expect(repository.getAvailableModels).not.toHaveBeenCalled();
    });
  });

  it('should toggle between curated and all models', () => {
    createManager();

    manager.toggleModelDisplay();
    expect(manager.getState().showAllModels).toBe(true);
    manager.toggleModelDisplay();
    expect(manager.getState().showAllModels).toBe(false);
  });

  it('should create and reveal the storage directory', async () => {
    createManager();
    const location = path.join(workDir, 'models');

    await expect(manager.openStorageLocation()).resolves.toBe(location);

    expect(fs.existsSync(location)).toBe(true);
    expect(open).toHaveBeenCalledWith(location);
  });
});
