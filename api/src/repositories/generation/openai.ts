/**
 * OpenAI-compatible chat completions backend
 *
 * Any endpoint that speaks POST {baseUrl}/v1/chat/completions with a
 * Bearer key works here (OpenAI, Azure OpenAI behind a gateway, local
 * servers). Evidence is already folded into the turns by the caller.
 */

import { z } from 'zod';
import type { GenerationBackendConfig } from '@/config';
import { GenerationError, describeError } from '@/errors';
import type { CallOptions, SearchResult } from '@/repositories/search/types';
import type { GenerationRepository, GenerationResult, Turn } from './types';

const completionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative(),
      completion_tokens: z.number().int().nonnegative(),
      total_tokens: z.number().int().nonnegative(),
    })
    .optional(),
});

export class OpenAiGenerationRepository implements GenerationRepository {
  readonly name = 'openai-chat';

  private readonly url: string;
  private readonly apiKey: string;
  private readonly model: string;

  constructor(
    private readonly config: GenerationBackendConfig,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {
    if (!config.apiKey || !config.model) {
      throw new Error('Generation backend requires GENERATION_API_KEY and GENERATION_MODEL');
    }
    this.url = `${config.baseUrl.replace(/\/+$/, '')}/v1/chat/completions`;
    this.apiKey = config.apiKey;
    this.model = config.model;
  }

  async generate(
    turns: Turn[],
    _evidence: SearchResult[],
    temperature: number,
    options: CallOptions = {},
  ): Promise<GenerationResult> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: turns,
          temperature,
          max_tokens: this.config.maxTokens,
        }),
        signal: options.signal,
      });
    } catch (error) {
      throw new GenerationError(`Generation request failed: ${describeError(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new GenerationError(`Generation service responded with ${response.status}`);
    }

    const parsed = completionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GenerationError('Generation service returned a malformed response', {
        cause: parsed.error,
      });
    }

    const { choices, usage, model } = parsed.data;
    return {
      answer: choices[0]?.message.content?.trim() ?? '',
      usage: {
        promptTokens: usage?.prompt_tokens ?? 0,
        completionTokens: usage?.completion_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0,
        model: model ?? this.model,
      },
    };
  }
}
