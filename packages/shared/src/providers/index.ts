export * from './types';
export {
  createOpenAiClient,
  OpenAiLlmProvider,
  OpenAiVisionProvider,
  type ChatCompletionsClient,
  type OpenAiClientOptions,
} from './openai';
export { createMistralClient, MistralOcrProvider, type MistralOcrClient } from './mistral';
