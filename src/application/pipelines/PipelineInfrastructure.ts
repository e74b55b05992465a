/**
 * Pipeline infrastructure for the render stages.
 * Each step owns one stage of the job state machine.
 */

import { VideoJob, VideoJobStatus, OverlayRole } from '../../domain/entities/VideoJob';
import { TranscriptWord, CaptionEvent } from '../../domain/entities/Transcript';
import { ClipWindow, CompositionSpec } from '../../domain/entities/CompositionSpec';
import {
    JobFailureReason,
    StageError,
    VideoJobError,
    errorMessage,
} from '../../domain/errors/VideoJobError';
import { BackgroundSelection } from '../BackgroundClipSelector';

/**
 * Anything holding a cache entry in use until the job ends.
 */
export interface Releasable {
    release(): void;
}

/**
 * JobContext carries all state through the pipeline.
 * Each step returns a new context; `leases` is shared by all of them
 * so the pipeline can release every lease on any exit path.
 */
export interface JobContext {
    readonly jobId: string;
    readonly job: VideoJob;
    readonly workDir: string;
    readonly leases: Releasable[];

    // Fetching
    selection?: BackgroundSelection;
    narrationAudio?: Buffer;
    narrationPath?: string;
    imagePaths?: Partial<Record<OverlayRole, string>>;
    durationSeconds?: number;
    clipWindow?: ClipWindow;

    // Transcribing
    transcript?: TranscriptWord[];
    captions?: CaptionEvent[];

    // Planning
    composition?: CompositionSpec;

    // Encoding
    outputPath?: string;
}

/** Job statuses a step can put the job in while it runs */
export type StageStatus = Exclude<VideoJobStatus, 'queued' | 'admitted' | 'succeeded' | 'failed'>;

/**
 * Pipeline step interface.
 * Each step has exactly one responsibility.
 */
export interface PipelineStep {
    readonly name: string;
    readonly status: StageStatus;
    execute(context: JobContext): Promise<JobContext>;
    shouldSkip?(context: JobContext): boolean;
}

export interface PipelineHooks {
    onStepStart?: (step: PipelineStep, context: JobContext) => void;
    onStepComplete?: (step: PipelineStep, context: JobContext) => void;
}

/**
 * Creates initial context from job.
 */
export function createJobContext(job: VideoJob, workDir: string): JobContext {
    return {
        jobId: job.id,
        job,
        workDir,
        leases: [],
    };
}

/**
 * Returns a context value a previous step must have produced.
 */
export function requireValue<T>(value: T | undefined, name: string, step: string): T {
    if (value === undefined) {
        throw new Error(`${step} requires ${name} from an earlier step`);
    }
    return value;
}

/**
 * Maps any error thrown inside a stage to that stage's failure reason.
 * Errors that already carry a job failure reason keep it.
 */
export function toStageError(reason: JobFailureReason, error: unknown): StageError {
    if (error instanceof StageError) {
        return error;
    }
    if (error instanceof VideoJobError && error.code === 'CategoryNotFound') {
        return new StageError('CategoryNotFound', error.message, error);
    }
    return new StageError(reason, errorMessage(error), error);
}

/**
 * Executes a pipeline of steps sequentially.
 */
export async function executePipeline(
    context: JobContext,
    steps: PipelineStep[],
    hooks: PipelineHooks = {}
): Promise<JobContext> {
    let currentContext = context;

    for (const step of steps) {
        if (step.shouldSkip?.(currentContext)) {
            console.log(`[Pipeline] [${context.jobId}] Skipping ${step.name}`);
            continue;
        }

        hooks.onStepStart?.(step, currentContext);
        console.log(`[Pipeline] [${context.jobId}] Executing ${step.name}...`);
        currentContext = await step.execute(currentContext);
        hooks.onStepComplete?.(step, currentContext);
    }

    return currentContext;
}
