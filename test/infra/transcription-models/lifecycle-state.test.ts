import { initialLifecycleState, lifecycleReducer } from '../../../src/infra/transcription-models/lifecycle-state.js';
import type { LifecycleState } from '../../../src/infra/transcription-models/lifecycle-state.js';

describe('lifecycleReducer', () => {
  const fetched: LifecycleState = lifecycleReducer(initialLifecycleState, {
    type: 'MODELS_FETCHED',
    payload: {
      recommendedModel: 'openai_whisper-small',
      availableModels: [{ name: 'openai_whisper-small', isDownloaded: false }],
      curatedModels: [
        {
          displayName: 'Small',
          internalName: 'openai_whisper-small',
          sizeLabel: 'Small',
          accuracyStars: 2,
          speedStars: 4,
          storageSizeLabel: '100MB',
          isDownloaded: false,
        },
      ],
    },
  });

  it('should clear a previous error when a download starts', () => {
    const failed = lifecycleReducer(fetched, { type: 'DOWNLOAD_FAILED', payload: { error: 'disk full' } });
    const started = lifecycleReducer(failed, { type: 'DOWNLOAD_STARTED', payload: { name: 'openai_whisper-small' } });

    expect(started.downloadError).toBeUndefined();
    expect(started.isDownloading).toBe(true);
    expect(started.downloadProgress).toBe(0);
    expect(started.downloadingModelName).toBe('openai_whisper-small');
  });

  it('should mark the model downloaded in both lists', () => {
    const done = lifecycleReducer(fetched, { type: 'DOWNLOAD_SUCCEEDED', payload: { name: 'openai_whisper-small' } });

    expect(done.availableModels[0].isDownloaded).toBe(true);
    expect(done.curatedModels[0].isDownloaded).toBe(true);
    expect(done.downloadProgress).toBe(1);
  });

  it('should track prewarm progress and errors', () => {
    const started = lifecycleReducer(fetched, { type: 'PREWARM_STARTED' });
    const progressed = lifecycleReducer(started, { type: 'PREWARM_PROGRESS', payload: 0.4 });
    const failed = lifecycleReducer(progressed, { type: 'PREWARM_FAILED', payload: { error: 'out of memory' } });

    expect(progressed.isPrewarming).toBe(true);
    expect(progressed.prewarmProgress).toBe(0.4);
    expect(failed).toMatchObject({ isPrewarming: false, prewarmProgress: 0, prewarmError: 'out of memory' });
  });

  it('should not mutate the previous state', () => {
    lifecycleReducer(fetched, { type: 'TOGGLE_MODEL_DISPLAY' });
    expect(fetched.showAllModels).toBe(false);
  });
});
