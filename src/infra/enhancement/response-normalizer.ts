import type { ProviderKind } from './provider-types.js';
import { ProviderError } from './provider-error.js';

/**
 * Provider-specific typed decode of a completion body. Returns undefined
 * (or an empty string) when the body does not carry text in the expected place.
 */
export type StrictCompletionDecoder = (payload: unknown) => string | undefined;

const THINKING_TAG_PATTERNS: readonly RegExp[] = [
  /<think>[\s\S]*?<\/think>/gi,
  /<thinking>[\s\S]*?<\/thinking>/gi,
  /\[thinking\][\s\S]*?\[\/thinking\]/gi,
  /\*thinking\*[\s\S]*?\*\/thinking\*/gi,
];

const EXCESS_BLANK_LINES = /\n\s*\n\s*\n/g;

/**
 * Strip model scratchpad annotations and collapse the blank lines they leave.
 * Tag removal repeats until stable so that nested or interleaved tags
 * cannot reassemble into a new tag.
 */
export function cleanThinkingTags(text: string): string {
  let cleaned = text;
  let previous: string;

  do {
    previous = cleaned;
    for (const pattern of THINKING_TAG_PATTERNS) {
      cleaned = cleaned.replace(pattern, '');
    }
  } while (cleaned !== previous);

  return cleaned.replace(EXCESS_BLANK_LINES, '\n\n');
}

/**
 * Final cleanup applied to every successful enhance/analyzeImage result.
 */
export function normalizeOutput(text: string): string {
  return cleanThinkingTags(text).trim();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function firstElement(value: unknown): unknown {
  return Array.isArray(value) && value.length > 0 ? value[0] : undefined;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Untyped walk over a completion body, used when the strict decode found nothing.
 * Looks at the first candidate (or choice, or the root object) and checks
 * the first content part carrying text, then content.text, then the legacy
 * output field.
 */
export function fallbackExtractText(payload: unknown): string | undefined {
  if (!isRecord(payload)) {
    return undefined;
  }

  const candidate = firstElement(payload.candidates) ?? firstElement(payload.choices) ?? payload;
  if (!isRecord(candidate)) {
    return undefined;
  }

  const content = candidate.content;
  if (isRecord(content)) {
    if (Array.isArray(content.parts)) {
      for (const part of content.parts) {
        const partText = isRecord(part) ? nonEmptyString(part.text) : undefined;
        if (partText) return partText;
      }
    }

    const directText = nonEmptyString(content.text);
    if (directText) return directText;
  }

  return nonEmptyString(candidate.output);
}

function parseJson(bodyText: string): unknown {
  try {
    return JSON.parse(bodyText);
  } catch {
    return undefined;
  }
}

/**
 * Two-tier extraction of the completion text from a raw response body.
 * Throws EMPTY_RESPONSE when neither tier finds any text.
 */
export function extractCompletionText(
  provider: ProviderKind,
  bodyText: string,
  strictDecode: StrictCompletionDecoder
): string {
  const payload = parseJson(bodyText);

  const strictText = payload === undefined ? undefined : strictDecode(payload);
  if (strictText) {
    return strictText;
  }

  const fallbackText = fallbackExtractText(payload);
  if (fallbackText) {
    console.warn(`[ResponseNormalizer] ${provider} response did not match its schema, recovered text from fallback walk`);
    return fallbackText;
  }

  throw ProviderError.emptyResponse(provider);
}
