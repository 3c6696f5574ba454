/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

import type { DeploymentMode, DocumentPolicy } from './types';

export type PromptVariant = 'detailed' | 'compact';

export interface Config {
  // Service
  port: number;
  apiAuthToken: string;
  requestTimeoutMs: number;

  // Deployment
  deploymentMode: DeploymentMode;
  promptVariant: PromptVariant;

  // Documents
  supportedExtensions: string[];
  maxDocumentBytes: number;

  // LLM
  openaiApiKey: string;
  llmModelText: string;
  llmModelVision: string;
  llmMaxTokens: number;
  llmRequestTimeoutMs: number;

  // OCR
  mistralApiKey: string;
  ocrModel: string;
  ocrRequestTimeoutMs: number;
}

const MB = 1024 * 1024;

/**
 * Document acceptance per deployment mode. The OCR provider reads every
 * format below; the native readers only cover PDF, plain text and DOCX.
 */
export const DEPLOYMENT_PROFILES: Record<DeploymentMode, DocumentPolicy> = {
  ocr: {
    supportedExtensions: ['.pdf', '.doc', '.docx', '.txt', '.png', '.jpg', '.jpeg'],
    maxDocumentBytes: 50 * MB,
  },
  native: {
    supportedExtensions: ['.pdf', '.txt', '.docx'],
    maxDocumentBytes: 50 * MB,
  },
};

const DEFAULT_PROMPT_VARIANT: Record<DeploymentMode, PromptVariant> = {
  ocr: 'detailed',
  native: 'compact',
};

type Env = Record<string, string | undefined>;

function parseDeploymentMode(value: string | undefined): DeploymentMode {
  const mode = (value || 'ocr').trim().toLowerCase();
  if (mode !== 'ocr' && mode !== 'native') {
    throw new Error(`Invalid DEPLOYMENT_MODE "${value}" (expected "ocr" or "native")`);
  }
  return mode;
}

function parsePromptVariant(value: string | undefined, mode: DeploymentMode): PromptVariant {
  if (!value) return DEFAULT_PROMPT_VARIANT[mode];
  const variant = value.trim().toLowerCase();
  if (variant !== 'detailed' && variant !== 'compact') {
    throw new Error(`Invalid PROMPT_VARIANT "${value}" (expected "detailed" or "compact")`);
  }
  return variant;
}

/**
 * Parse a comma-separated extension list. Entries are lower-cased and
 * given a leading dot when it is missing.
 */
export function parseExtensionList(value: string): string[] {
  return value
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

function parsePositiveInt(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name} "${value}" (expected a positive integer)`);
  }
  return parsed;
}

/**
 * Build a Config from an environment map. `config` below is this applied
 * to `process.env`; tests and alternative entry points call it directly.
 */
export function loadConfig(env: Env = process.env): Config {
  const deploymentMode = parseDeploymentMode(env.DEPLOYMENT_MODE);
  const profile = DEPLOYMENT_PROFILES[deploymentMode];

  return {
    // Service
    port: parsePositiveInt('PORT', env.PORT, 8000),
    apiAuthToken: env.API_AUTH_TOKEN || '',
    requestTimeoutMs: parsePositiveInt('REQUEST_TIMEOUT_MS', env.REQUEST_TIMEOUT_MS, 180000),

    // Deployment
    deploymentMode,
    promptVariant: parsePromptVariant(env.PROMPT_VARIANT, deploymentMode),

    // Documents
    supportedExtensions: env.SUPPORTED_EXTENSIONS
      ? parseExtensionList(env.SUPPORTED_EXTENSIONS)
      : [...profile.supportedExtensions],
    maxDocumentBytes: parsePositiveInt(
      'MAX_DOCUMENT_BYTES',
      env.MAX_DOCUMENT_BYTES,
      profile.maxDocumentBytes
    ),

    // LLM
    openaiApiKey: env.OPENAI_API_KEY || '',
    llmModelText: env.LLM_MODEL_TEXT || 'gpt-4o-mini',
    llmModelVision: env.LLM_MODEL_VISION || 'gpt-4o-mini',
    llmMaxTokens: parsePositiveInt('LLM_MAX_TOKENS', env.LLM_MAX_TOKENS, 1000),
    llmRequestTimeoutMs: parsePositiveInt('LLM_REQUEST_TIMEOUT_MS', env.LLM_REQUEST_TIMEOUT_MS, 60000),

    // OCR
    mistralApiKey: env.MISTRAL_API_KEY || '',
    ocrModel: env.OCR_MODEL || 'mistral-ocr-latest',
    ocrRequestTimeoutMs: parsePositiveInt('OCR_REQUEST_TIMEOUT_MS', env.OCR_REQUEST_TIMEOUT_MS, 120000),
  };
}

export const config: Config = loadConfig();

/**
 * Document acceptance rules of a config.
 */
export function documentPolicyOf(cfg: Config): DocumentPolicy {
  return {
    supportedExtensions: cfg.supportedExtensions,
    maxDocumentBytes: cfg.maxDocumentBytes,
  };
}

/**
 * Secret values a config carries, for redaction.
 */
export function secretsOf(cfg: Config): string[] {
  return [cfg.openaiApiKey, cfg.mistralApiKey, cfg.apiAuthToken].filter((s) => s.length > 0);
}
