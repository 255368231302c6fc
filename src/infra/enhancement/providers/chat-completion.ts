import type { EnhancementOptions } from '../provider-types.js';
import type { StrictCompletionDecoder } from '../response-normalizer.js';
import { toImageDataUrl } from '../image-encoding.js';
import { compileSchema } from '../../validation/schema-validator.js';

/**
 * OpenAI-compatible chat completion shapes, shared by LM Studio and Groq.
 */
export type ChatContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } };

export interface ChatMessage {
  role: 'system' | 'user';
  content: string | ChatContentPart[];
}

interface ChatCompletionResponse {
  choices: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

const validateChatCompletion = compileSchema<ChatCompletionResponse>({
  type: 'object',
  required: ['choices'],
  properties: {
    choices: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          message: {
            type: 'object',
            properties: {
              content: { type: ['string', 'null'] },
            },
          },
        },
      },
    },
  },
});

export const decodeChatCompletion: StrictCompletionDecoder = (payload) => {
  if (!validateChatCompletion(payload)) {
    return undefined;
  }
  return payload.choices[0]?.message?.content ?? undefined;
};

/**
 * User turn for transcript cleanup: optional context block, then the raw text.
 */
export function buildTranscriptUserContent(text: string, context?: string): string {
  const contextBlock = context ? `<CONTEXT>${context}</CONTEXT>\n\n` : '';
  return `${contextBlock}<RAW_TRANSCRIPTION>${text}</RAW_TRANSCRIPTION>`;
}

export function buildEnhancementMessages(text: string, options: EnhancementOptions): ChatMessage[] {
  return [
    { role: 'system', content: options.systemPrompt },
    { role: 'user', content: buildTranscriptUserContent(text, options.context) },
  ];
}

export function buildVisionMessages(image: Uint8Array, prompt: string, systemPrompt: string): ChatMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    {
      role: 'user',
      content: [
        { type: 'text', text: prompt },
        { type: 'image_url', image_url: { url: toImageDataUrl(image) } },
      ],
    },
  ];
}
