/**
 * Extraction Template Types
 *
 * Defines the rulebook prompts that drive field extraction.
 */

import type { PromptVariant } from '../config';

/**
 * Versioned rulebook for insurance field extraction.
 */
export interface ExtractionTemplate {
  /** Which rulebook this is */
  variant: PromptVariant;

  /** Rulebook version, reported with every extraction */
  version: string;

  /** Human-readable description of the rulebook */
  description: string;

  /** System prompt carrying the field labels and extraction rules */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{document_text}}: The full extracted document text
   */
  userPromptTemplate: string;
}

/**
 * Instruction pair used to transcribe one page image.
 */
export interface TranscriptionPrompt {
  systemPrompt: string;
  userPrompt: string;
}
