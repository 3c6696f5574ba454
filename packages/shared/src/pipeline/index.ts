export { validateDocument } from './validator';
export {
  ExtractionPipeline,
  toPipelineError,
  type ExtractionPipelineOptions,
  type PipelineRunOptions,
  type PipelineStage,
} from './orchestrator';
