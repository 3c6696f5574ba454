/**
 * Pipeline wiring
 *
 * Builds the provider clients and the extraction pipeline for a config.
 * Missing provider keys leave the service running without a pipeline.
 */

import {
  createMistralClient,
  createOpenAiClient,
  createTextExtractor,
  documentPolicyOf,
  ExtractionPipeline,
  getExtractionTemplate,
  LlmFieldExtractor,
  logger,
  MistralOcrProvider,
  OpenAiLlmProvider,
  OpenAiVisionProvider,
  type Config,
  type DeploymentMode,
  type TextExtractor,
} from '@policy-extract/shared';

export type ProviderName = 'openai' | 'mistral';

const REQUIRED_PROVIDERS: Record<DeploymentMode, ProviderName[]> = {
  ocr: ['mistral', 'openai'],
  native: ['openai'],
};

export interface ServiceComponents {
  /** null when a required provider key is missing */
  pipeline: ExtractionPipeline | null;
  /** Whether each provider the deployment needs has a key */
  providers: Record<string, boolean>;
}

function providerKey(cfg: Config, provider: ProviderName): string {
  return provider === 'openai' ? cfg.openaiApiKey : cfg.mistralApiKey;
}

export function buildServiceComponents(cfg: Config): ServiceComponents {
  const providers: Record<string, boolean> = {};
  for (const provider of REQUIRED_PROVIDERS[cfg.deploymentMode]) {
    providers[provider] = providerKey(cfg, provider).length > 0;
  }

  const missing = REQUIRED_PROVIDERS[cfg.deploymentMode].filter((provider) => !providers[provider]);
  if (missing.length > 0) {
    logger.warn('Provider API keys not configured, extraction disabled', {
      deployment_mode: cfg.deploymentMode,
      missing,
    });
    return { pipeline: null, providers };
  }

  const openai = createOpenAiClient({
    apiKey: cfg.openaiApiKey,
    timeoutMs: cfg.llmRequestTimeoutMs,
  });

  let textExtractor: TextExtractor;
  if (cfg.deploymentMode === 'ocr') {
    const mistral = createMistralClient(cfg.mistralApiKey);
    textExtractor = createTextExtractor('ocr', {
      ocr: new MistralOcrProvider(mistral.ocr, {
        model: cfg.ocrModel,
        timeoutMs: cfg.ocrRequestTimeoutMs,
      }),
    });
  } else {
    textExtractor = createTextExtractor('native', {
      vision: new OpenAiVisionProvider(openai.chat.completions, cfg.llmModelVision),
    });
  }

  const template = getExtractionTemplate(cfg.promptVariant);
  const fieldExtractor = new LlmFieldExtractor({
    llm: new OpenAiLlmProvider(openai.chat.completions, cfg.llmModelText),
    template,
    maxTokens: cfg.llmMaxTokens,
  });

  logger.info('Extraction pipeline ready', {
    deployment_mode: cfg.deploymentMode,
    prompt_variant: template.variant,
    prompt_version: template.version,
    supported_extensions: cfg.supportedExtensions,
  });

  return {
    pipeline: new ExtractionPipeline({
      textExtractor,
      fieldExtractor,
      policy: documentPolicyOf(cfg),
    }),
    providers,
  };
}
