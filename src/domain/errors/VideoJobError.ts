/**
 * Reasons a job can end in the failed state.
 */
export type JobFailureReason =
    | 'CategoryNotFound'
    | 'AssetFetchError'
    | 'TranscriptionError'
    | 'PlanningError'
    | 'EncodingError'
    | 'InternalError';

/**
 * Stable error codes surfaced to callers.
 */
export type VideoErrorCode = JobFailureReason | 'InvalidRequest' | 'NotFound' | 'Expired';

/**
 * Base class for every error the engine reports by code.
 */
export class VideoJobError extends Error {
    constructor(
        public readonly code: VideoErrorCode,
        message: string
    ) {
        super(message);
        this.name = 'VideoJobError';
    }
}

export class InvalidRequestError extends VideoJobError {
    constructor(message: string) {
        super('InvalidRequest', message);
        this.name = 'InvalidRequestError';
    }
}

export class JobNotFoundError extends VideoJobError {
    constructor(jobId: string) {
        super('NotFound', `Job not found: ${jobId}`);
        this.name = 'JobNotFoundError';
    }
}

export class CategoryNotFoundError extends VideoJobError {
    constructor(category: string, detail?: string) {
        super('CategoryNotFound', detail ? `Unknown gameplay category "${category}": ${detail}` : `Unknown gameplay category "${category}"`);
        this.name = 'CategoryNotFoundError';
    }
}

/**
 * Raised by the composition planner for a duration it cannot lay out.
 */
export class InvalidCompositionError extends VideoJobError {
    constructor(message: string) {
        super('PlanningError', message);
        this.name = 'InvalidCompositionError';
    }
}

export class VideoExpiredError extends VideoJobError {
    constructor(filename: string) {
        super('Expired', `Video has expired: ${filename}`);
        this.name = 'VideoExpiredError';
    }
}

/**
 * Failure of one pipeline stage, carrying the job failure reason.
 */
export class StageError extends VideoJobError {
    constructor(
        public readonly reason: JobFailureReason,
        message: string,
        public readonly underlying?: unknown
    ) {
        super(reason, message);
        this.name = 'StageError';
    }
}

/**
 * Extracts a human-readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
