/**
 * Provider Contracts
 *
 * The pipeline talks to external services only through these interfaces.
 * Implementations are constructed once at startup and injected, so tests can
 * swap in fakes that return canned responses or errors.
 */

export interface ProviderCallOptions {
  /** Abandons the in-flight request when aborted */
  signal?: AbortSignal;
}

/** One page of OCR output. */
export interface OcrPage {
  /** Zero-based page index as reported by the provider */
  index: number;
  text: string;
}

/**
 * Converts a whole document, given as a data URL, into page text.
 */
export interface OcrProvider {
  readonly name: string;
  process(dataUrl: string, options?: ProviderCallOptions): Promise<OcrPage[]>;
}

export interface ImageInput {
  data: Buffer;
  mimeType: string;
}

/**
 * Transcribes the text of a single image.
 */
export interface VisionProvider {
  readonly name: string;
  transcribeImage(image: ImageInput, options?: ProviderCallOptions): Promise<string>;
}

export interface LlmCompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  /** `json_object` constrains the model to emit a single JSON object */
  responseFormat: 'json_object' | 'text';
  temperature: number;
  maxTokens?: number;
}

/**
 * Chat-style completion returning the raw text of the first choice.
 */
export interface LlmProvider {
  readonly name: string;
  complete(request: LlmCompletionRequest, options?: ProviderCallOptions): Promise<string>;
}
