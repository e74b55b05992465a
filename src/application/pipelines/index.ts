export {
    PipelineStep,
    PipelineHooks,
    JobContext,
    StageStatus,
    createJobContext,
    executePipeline,
    toStageError,
} from './PipelineInfrastructure';
export { withDegradedRetry, DegradedRetryError } from './DegradedRetry';
export { FetchStep } from './steps/FetchStep';
export { TranscriptionStep } from './steps/TranscriptionStep';
export { PlanningStep } from './steps/PlanningStep';
export { EncodingStep, outputFilename } from './steps/EncodingStep';
export { createRenderSteps, PipelineDependencies } from './JobProcessingPipeline';
