import { z } from 'zod';
import type { ModelCaller, ModelCallRequest, ModelCallResult } from '../model-caller';
import { postModelRequest, type RetryPolicy } from './http';

export const OPENAI_API_BASE = 'https://api.openai.com/v1';

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }),
  })).default(() => []),
});

export function extractOpenAIText(body: unknown): string | null {
  const parsed = ChatCompletionSchema.safeParse(body);
  if (!parsed.success) return null;
  return parsed.data.choices[0]?.message.content ?? null;
}

export interface OpenAICallerOptions {
  apiKey: string;
  model: string;
  policy: RetryPolicy;
  baseUrl?: string;
}

export function createOpenAICaller(options: OpenAICallerOptions): ModelCaller {
  const baseUrl = options.baseUrl ?? OPENAI_API_BASE;
  return {
    provider: 'openai',
    model: options.model,
    call(request: ModelCallRequest): Promise<ModelCallResult> {
      return postModelRequest({
        provider: 'openai',
        model: options.model,
        url: `${baseUrl}/chat/completions`,
        headers: { Authorization: `Bearer ${options.apiKey}` },
        body: {
          model: options.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt },
          ],
          ...(request.wantJson ? { response_format: { type: 'json_object' } } : {}),
        },
        policy: options.policy,
        extractText: extractOpenAIText,
      });
    },
  };
}
