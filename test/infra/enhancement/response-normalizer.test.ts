import {
  cleanThinkingTags,
  extractCompletionText,
  fallbackExtractText,
  normalizeOutput,
} from '../../../src/infra/enhancement/response-normalizer.js';
import { ProviderError, ProviderErrorCodes } from '../../../src/infra/enhancement/provider-error.js';

describe('ResponseNormalizer', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('cleanThinkingTags', () => {
    it('should remove every supported tag family', () => {
      expect(cleanThinkingTags('<think>plan</think>Hello')).toBe('Hello');
      expect(cleanThinkingTags('<thinking>plan</thinking>Hello')).toBe('Hello');
      expect(cleanThinkingTags('[thinking]plan[/thinking]Hello')).toBe('Hello');
      expect(cleanThinkingTags('*thinking*plan*/thinking*Hello')).toBe('Hello');
    });

    it('should match tags case-insensitively', () => {
      expect(cleanThinkingTags('<THINK>plan</Think>Hello')).toBe('Hello');
    });

    it('should remove blocks spanning several lines', () => {
      const text = 'Before\n<thinking>\nline one\nline two\n</thinking>\nAfter';
      expect(cleanThinkingTags(text)).toBe('Before\n\nAfter');
    });

    it('should collapse runs of blank lines to one', () => {
      expect(cleanThinkingTags('a\n\n\n\nb')).toBe('a\n\nb');
      expect(cleanThinkingTags('a\n \n\t\nb')).toBe('a\n\nb');
    });

    it('should not let nested tags reassemble after removal', () => {
      expect(cleanThinkingTags('<thi<think>x</think>nk>hidden</think>Text')).toBe('Text');
    });

    it('should leave text without tags untouched', () => {
      expect(cleanThinkingTags('Plain sentence.\n\nSecond paragraph.')).toBe('Plain sentence.\n\nSecond paragraph.');
    });
  });

  describe('normalizeOutput', () => {
    it('should clean and trim', () => {
      expect(normalizeOutput('  <think>draft</think>\n Final answer. \n')).toBe('Final answer.');
    });

    it('should return an empty string when only scratchpad content is present', () => {
      expect(normalizeOutput('<think>only thoughts</think>')).toBe('');
    });

    it('should be idempotent', () => {
      const inputs = [
        '<think>a</think> one\n\n\n\ntwo ',
        '[thinking]x[/thinking]\n\nkeep\n',
        '*thinking*y*/thinking*  *bold* text',
      ];
      for (const input of inputs) {
        const once = normalizeOutput(input);
        expect(normalizeOutput(once)).toBe(once);
      }
    });
  });

  describe('fallbackExtractText', () => {
    it('should read the first candidate part', () => {
      const payload = { candidates: [{ content: { parts: [{ text: 'from parts' }] } }] };
      expect(fallbackExtractText(payload)).toBe('from parts');
    });

    it('should skip candidate parts without text', () => {
      const payload = { candidates: [{ content: { parts: [{ functionCall: { name: 'lookup' } }, { text: 'second' }] } }] };
      expect(fallbackExtractText(payload)).toBe('second');
    });

    it('should read content.text of the first choice', () => {
      const payload = { choices: [{ content: { text: 'direct' } }] };
      expect(fallbackExtractText(payload)).toBe('direct');
    });

    it('should read the legacy output field of the root object', () => {
      expect(fallbackExtractText({ output: 'legacy' })).toBe('legacy');
    });

    it('should return undefined when nothing carries text', () => {
      expect(fallbackExtractText({ choices: [] })).toBeUndefined();
      expect(fallbackExtractText({ output: '' })).toBeUndefined();
      expect(fallbackExtractText('string body')).toBeUndefined();
      expect(fallbackExtractText(null)).toBeUndefined();
    });
  });

  describe('extractCompletionText', () => {
    const decodeResponseField = (payload: unknown): string | undefined =>
      typeof payload === 'object' && payload !== null && 'response' in payload && typeof payload.response === 'string'
        ? payload.response
        : undefined;

    it('should prefer the strict decode', () => {
      const body = JSON.stringify({ response: 'strict', output: 'loose' });
      expect(extractCompletionText('ollama', body, decodeResponseField)).toBe('strict');
    });

    it('should fall back and warn when the strict decode finds nothing', () => {
      const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const body = JSON.stringify({ output: 'loose' });

      expect(extractCompletionText('ollama', body, decodeResponseField)).toBe('loose');
      expect(warnSpy).toHaveBeenCalledTimes(1);
    });

    it('should treat an empty strict result as missing', () => {
      jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const body = JSON.stringify({ response: '', output: 'loose' });
      expect(extractCompletionText('ollama', body, decodeResponseField)).toBe('loose');
    });

    it('should throw EMPTY_RESPONSE when neither tier finds text', () => {
      const attempt = () => extractCompletionText('groq', 'not json', decodeResponseField);

      expect(attempt).toThrow(ProviderError);
      try {
        attempt();
      } catch (error) {
        expect(error).toBeInstanceOf(ProviderError);
        if (error instanceof ProviderError) {
          expect(error.code).toBe(ProviderErrorCodes.EMPTY_RESPONSE);
          expect(error.provider).toBe('groq');
        }
      }
    });
  });
});
