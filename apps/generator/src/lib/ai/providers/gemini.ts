import { z } from 'zod';
import type { ModelCaller, ModelCallRequest, ModelCallResult } from '../model-caller';
import { postModelRequest, type RetryPolicy } from './http';

export const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta';

const GeminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default(() => []),
    }).optional(),
  })).default(() => []),
});

export function extractGeminiText(body: unknown): string | null {
  const parsed = GeminiResponseSchema.safeParse(body);
  if (!parsed.success) return null;
  const parts = parsed.data.candidates[0]?.content?.parts ?? [];
  const texts = parts.flatMap((part) => (part.text === undefined ? [] : [part.text]));
  return texts.length > 0 ? texts.join('') : null;
}

export interface GeminiCallerOptions {
  apiKey: string;
  model: string;
  policy: RetryPolicy;
  baseUrl?: string;
}

export function createGeminiCaller(options: GeminiCallerOptions): ModelCaller {
  const baseUrl = options.baseUrl ?? GEMINI_API_BASE;
  return {
    provider: 'gemini',
    model: options.model,
    call(request: ModelCallRequest): Promise<ModelCallResult> {
      return postModelRequest({
        provider: 'gemini',
        model: options.model,
        url: `${baseUrl}/models/${encodeURIComponent(options.model)}:generateContent`,
        headers: { 'x-goog-api-key': options.apiKey },
        body: {
          systemInstruction: { parts: [{ text: request.systemPrompt }] },
          contents: [{ role: 'user', parts: [{ text: request.userPrompt }] }],
          generationConfig: request.wantJson ? { responseMimeType: 'application/json' } : {},
        },
        policy: options.policy,
        extractText: extractGeminiText,
      });
    },
  };
}
