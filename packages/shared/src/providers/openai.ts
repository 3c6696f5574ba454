/**
 * OpenAI Providers
 *
 * Chat completions for field extraction and page-image transcription.
 * SDK retries are disabled: a failed call fails the request.
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { logger } from '../logger';
import { observeProviderCall } from '../metrics';
import { getTranscriptionPrompt } from '../templates';
import type {
  ImageInput,
  LlmCompletionRequest,
  LlmProvider,
  ProviderCallOptions,
  VisionProvider,
} from './types';

/**
 * The slice of the SDK the providers use; `new OpenAI().chat.completions`
 * satisfies it.
 */
export interface ChatCompletionsClient {
  create(
    body: ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal }
  ): Promise<ChatCompletion>;
}

export interface OpenAiClientOptions {
  apiKey: string;
  timeoutMs: number;
}

export function createOpenAiClient(options: OpenAiClientOptions): OpenAI {
  return new OpenAI({
    apiKey: options.apiKey,
    timeout: options.timeoutMs,
    maxRetries: 0,
  });
}

function firstChoiceContent(response: ChatCompletion): string | null {
  return response.choices[0]?.message?.content ?? null;
}

export class OpenAiLlmProvider implements LlmProvider {
  readonly name = 'openai';

  constructor(
    private readonly completions: ChatCompletionsClient,
    private readonly model: string
  ) {}

  async complete(request: LlmCompletionRequest, options: ProviderCallOptions = {}): Promise<string> {
    const response = await observeProviderCall(this.name, this.model, () =>
      this.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt },
          ],
          response_format: { type: request.responseFormat },
          temperature: request.temperature,
          ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
        },
        { signal: options.signal }
      )
    );

    logger.info('OpenAI completion complete', {
      model: this.model,
      request_id: response.id,
      tokens_used: response.usage?.total_tokens,
      finish_reason: response.choices[0]?.finish_reason,
    });

    return firstChoiceContent(response) ?? '';
  }
}

export class OpenAiVisionProvider implements VisionProvider {
  readonly name = 'openai-vision';

  constructor(
    private readonly completions: ChatCompletionsClient,
    private readonly model: string,
    private readonly maxTokens: number = 4096
  ) {}

  async transcribeImage(image: ImageInput, options: ProviderCallOptions = {}): Promise<string> {
    const prompt = getTranscriptionPrompt();
    const dataUrl = `data:${image.mimeType};base64,${image.data.toString('base64')}`;

    const response = await observeProviderCall(this.name, this.model, () =>
      this.completions.create(
        {
          model: this.model,
          messages: [
            { role: 'system', content: prompt.systemPrompt },
            {
              role: 'user',
              content: [
                { type: 'text', text: prompt.userPrompt },
                { type: 'image_url', image_url: { url: dataUrl, detail: 'high' } },
              ],
            },
          ],
          max_tokens: this.maxTokens,
          temperature: 0,
        },
        { signal: options.signal }
      )
    );

    logger.debug('OpenAI page transcription complete', {
      model: this.model,
      request_id: response.id,
      image_bytes: image.data.length,
    });

    return firstChoiceContent(response) ?? '';
  }
}
