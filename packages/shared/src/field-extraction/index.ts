export { parseLlmJson } from './json';
export {
  LlmFieldExtractor,
  type FieldExtractor,
  type FieldExtractionOptions,
  type LlmFieldExtractorOptions,
} from './llm-extraction';
