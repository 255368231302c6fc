import {
  FLAGSHIP_MODELS,
  filterVisionModels,
  isVisionModel,
  reconcileSelection,
} from '../../../src/infra/enhancement/model-selection.js';
import type { RemoteAIModel } from '../../../src/infra/enhancement/provider-types.js';

function model(id: string, displayName = id): RemoteAIModel {
  return { id, displayName, ownedBy: 'Local', contextWindowTokens: 8192, maxCompletionTokens: 4096, active: true };
}

describe('model selection', () => {
  describe('isVisionModel', () => {
    it('should match keywords in the id or display name, ignoring case', () => {
      expect(isVisionModel(model('llava:13b'))).toBe(true);
      expect(isVisionModel(model('Qwen2-VL-7B'))).toBe(true);
      expect(isVisionModel(model('models/x-1', 'Gemini Experimental'))).toBe(true);
      expect(isVisionModel(model('meta-llama/Llama-4-Scout'))).toBe(true);
    });

    it('should reject text-only names', () => {
      expect(isVisionModel(model('mistral'))).toBe(false);
      expect(isVisionModel(model('llama-3.3-70b-versatile'))).toBe(false);
    });
  });

  describe('filterVisionModels', () => {
    it('should keep catalog order', () => {
      const catalog = [model('moondream'), model('mistral'), model('gemma3'), model('llava')];
      expect(filterVisionModels(catalog).map((m) => m.id)).toEqual(['moondream', 'gemma3', 'llava']);
    });
  });

  describe('reconcileSelection', () => {
    const catalog = [model('alpha'), model('gemma3'), model('mistral')];

    it('should keep a selection the catalog still lists', () => {
      expect(reconcileSelection(catalog, 'mistral', 'gemma3')).toBeUndefined();
    });

    it('should pick the flagship when nothing is selected', () => {
      expect(reconcileSelection(catalog, undefined, 'gemma3')).toBe('gemma3');
    });

    it('should replace a selection the catalog no longer lists', () => {
      expect(reconcileSelection(catalog, 'removed-model', 'gemma3')).toBe('gemma3');
    });

    it('should pick the first model when the flagship is missing', () => {
      expect(reconcileSelection(catalog, '', 'llama3')).toBe('alpha');
    });

    it('should change nothing for an empty catalog', () => {
      expect(reconcileSelection([], 'mistral', 'gemma3')).toBeUndefined();
    });

    it('should require an exact flagship id', () => {
      const gemini = [model('models/gemini-1.5-pro'), model('models/gemini-2.0-flash')];
      expect(reconcileSelection(gemini, undefined, FLAGSHIP_MODELS.gemini.text)).toBe('models/gemini-2.0-flash');
      expect(reconcileSelection(gemini, undefined, 'gemini-2.0-flash')).toBe('models/gemini-1.5-pro');
    });
  });
});
