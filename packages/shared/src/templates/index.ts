/**
 * Extraction Templates
 *
 * The rulebooks live as markdown under packages/shared/prompts/ so they can be
 * revised without touching pipeline code. Each variant is a directory holding
 * system.md and user.md; files are read once and cached.
 */

import fs from 'fs';
import path from 'path';
import type { PromptVariant } from '../config';
import type { ExtractionTemplate, TranscriptionPrompt } from './types';

export type { ExtractionTemplate, TranscriptionPrompt } from './types';

const DOCUMENT_TEXT_PLACEHOLDER = '{{document_text}}';

const TEMPLATE_METADATA: Record<PromptVariant, { version: string; description: string }> = {
  detailed: {
    version: '2.0.0',
    description: 'Full rulebook: label variants, plan code splitting, regulatory inference examples',
  },
  compact: {
    version: '1.0.0',
    description: 'Short rulebook for the native-reader deployment, same field semantics',
  },
};

const templateCache = new Map<PromptVariant, ExtractionTemplate>();
let transcriptionPrompt: TranscriptionPrompt | null = null;

function resolvePromptsDir(): string {
  const candidates = [
    // Relative to the shared package sources
    path.join(__dirname, '../../prompts'),
    // Relative to the compiled output under dist/
    path.join(__dirname, '../../../../../packages/shared/prompts'),
    // Relative to the working directory
    path.join(process.cwd(), 'packages/shared/prompts'),
  ];

  for (const dir of candidates) {
    if (fs.existsSync(dir)) {
      return dir;
    }
  }

  throw new Error('Prompt directory not found (expected packages/shared/prompts)');
}

function readPromptFile(relativePath: string): string {
  const filePath = path.join(resolvePromptsDir(), relativePath);
  return fs.readFileSync(filePath, 'utf-8').trim();
}

/**
 * Get the extraction rulebook for a variant.
 */
export function getExtractionTemplate(variant: PromptVariant): ExtractionTemplate {
  const cached = templateCache.get(variant);
  if (cached) {
    return cached;
  }

  const metadata = TEMPLATE_METADATA[variant];
  const template: ExtractionTemplate = {
    variant,
    version: metadata.version,
    description: metadata.description,
    systemPrompt: readPromptFile(path.join(variant, 'system.md')),
    userPromptTemplate: readPromptFile(path.join(variant, 'user.md')),
  };

  if (!template.userPromptTemplate.includes(DOCUMENT_TEXT_PLACEHOLDER)) {
    throw new Error(`Template "${variant}" user prompt lacks ${DOCUMENT_TEXT_PLACEHOLDER}`);
  }

  templateCache.set(variant, template);
  return template;
}

/**
 * Fill the document text into a template's user prompt.
 */
export function renderUserPrompt(template: ExtractionTemplate, documentText: string): string {
  // Function replacer so `$` sequences in the document are taken literally
  return template.userPromptTemplate.replace(DOCUMENT_TEXT_PLACEHOLDER, () => documentText);
}

/**
 * Get the page transcription instructions for vision providers.
 */
export function getTranscriptionPrompt(): TranscriptionPrompt {
  if (!transcriptionPrompt) {
    transcriptionPrompt = {
      systemPrompt: readPromptFile('vision-transcription/system.md'),
      userPrompt: readPromptFile('vision-transcription/user.md'),
    };
  }
  return transcriptionPrompt;
}

/**
 * Get all available rulebook variants
 */
export function getAvailablePromptVariants(): PromptVariant[] {
  return ['detailed', 'compact'];
}
