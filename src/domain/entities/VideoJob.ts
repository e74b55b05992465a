import { InvalidRequestError, JobFailureReason } from '../errors/VideoJobError';

/**
 * Video layouts the engine can produce.
 */
export type VideoVariant = 'standard' | 'reddit';

export const VIDEO_VARIANTS: readonly VideoVariant[] = ['standard', 'reddit'];

/**
 * Possible statuses for a VideoJob.
 * 'queued' is waiting for a slot; 'admitted' holds a slot before its first stage starts.
 */
export type VideoJobStatus =
    | 'queued'
    | 'admitted'
    | 'fetching'
    | 'transcribing'
    | 'planning'
    | 'encoding'
    | 'succeeded'
    | 'failed';

/**
 * Input for the standard layout: intro image early, outro image near the end.
 */
export interface StandardVideoInput {
    variant: 'standard';
    /** URL or path of the narration audio */
    audioUrl: string;
    /** Gameplay category used for the background clip */
    gameplayType: string;
    introImageUrl: string;
    outroImageUrl: string;
    /** Optional script text (informational; captions come from the transcript) */
    script?: string;
}

/**
 * Input for the reddit-post layout: post screenshot first, then two images.
 */
export interface RedditVideoInput {
    variant: 'reddit';
    audioUrl: string;
    gameplayType: string;
    redditPostImageUrl: string;
    firstImageUrl: string;
    secondImageUrl: string;
    script?: string;
}

export type VideoJobInput = StandardVideoInput | RedditVideoInput;

/**
 * VideoJob represents the full state of one video generation request.
 */
export interface VideoJob {
    /** Unique identifier for the job */
    id: string;
    variant: VideoVariant;
    input: VideoJobInput;
    status: VideoJobStatus;
    /** Human-readable description of the current step */
    currentStep?: string;
    /** Narration duration in seconds, once probed */
    durationSeconds?: number;
    /** Locator of the finished file; set only when succeeded */
    resultLocator: string | null;
    /** Failure reason code; set only when failed */
    failureReason: JobFailureReason | null;
    /** Short failure description for callers */
    failureMessage?: string;

    /** Timestamps */
    createdAt: Date;
    updatedAt: Date;
    completedAt: Date | null;
}

const REQUIRED_FIELDS: Record<VideoVariant, readonly string[]> = {
    standard: ['audioUrl', 'gameplayType', 'introImageUrl', 'outroImageUrl'],
    reddit: ['audioUrl', 'gameplayType', 'redditPostImageUrl', 'firstImageUrl', 'secondImageUrl'],
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isVariant(value: unknown): value is VideoVariant {
    return typeof value === 'string' && (VIDEO_VARIANTS as readonly string[]).includes(value);
}

function requiredString(body: Record<string, unknown>, field: string): string {
    const value = body[field];
    if (typeof value !== 'string' || value.trim().length === 0) {
        throw new InvalidRequestError(`${field} is required and must be a non-empty string`);
    }
    return value.trim();
}

function optionalString(body: Record<string, unknown>, field: string): string | undefined {
    const value = body[field];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw new InvalidRequestError(`${field} must be a string`);
    }
    return value;
}

/**
 * Validates a raw request body and narrows it to a typed job input.
 * Throws InvalidRequestError naming the first missing or malformed field.
 */
export function parseVideoJobInput(body: unknown): VideoJobInput {
    if (!isRecord(body)) {
        throw new InvalidRequestError('Request body must be a JSON object');
    }
    if (!isVariant(body.variant)) {
        throw new InvalidRequestError(`variant must be one of: ${VIDEO_VARIANTS.join(', ')}`);
    }

    const fields: Record<string, string> = {};
    for (const field of REQUIRED_FIELDS[body.variant]) {
        fields[field] = requiredString(body, field);
    }
    const script = optionalString(body, 'script');

    if (body.variant === 'standard') {
        return {
            variant: 'standard',
            audioUrl: fields.audioUrl,
            gameplayType: fields.gameplayType,
            introImageUrl: fields.introImageUrl,
            outroImageUrl: fields.outroImageUrl,
            script,
        };
    }

    return {
        variant: 'reddit',
        audioUrl: fields.audioUrl,
        gameplayType: fields.gameplayType,
        redditPostImageUrl: fields.redditPostImageUrl,
        firstImageUrl: fields.firstImageUrl,
        secondImageUrl: fields.secondImageUrl,
        script,
    };
}

/**
 * Creates a new VideoJob in the queued state.
 */
export function createVideoJob(id: string, input: VideoJobInput): VideoJob {
    if (!id.trim()) {
        throw new Error('VideoJob id cannot be empty');
    }

    const now = new Date();
    return {
        id: id.trim(),
        variant: input.variant,
        input,
        status: 'queued',
        resultLocator: null,
        failureReason: null,
        createdAt: now,
        updatedAt: now,
        completedAt: null,
    };
}

/**
 * Checks if a job is in a terminal state.
 */
export function isJobTerminal(job: VideoJob): boolean {
    return job.status === 'succeeded' || job.status === 'failed';
}

function assertMutable(job: VideoJob): void {
    if (isJobTerminal(job)) {
        throw new Error(`VideoJob ${job.id} is already ${job.status}`);
    }
}

/**
 * Updates a VideoJob's status and step, returning a new object.
 */
export function updateJobStatus(
    job: VideoJob,
    status: Exclude<VideoJobStatus, 'succeeded' | 'failed'>,
    currentStep?: string
): VideoJob {
    assertMutable(job);
    return {
        ...job,
        status,
        currentStep,
        updatedAt: new Date(),
    };
}

/**
 * Records the narration duration once known.
 */
export function withDuration(job: VideoJob, durationSeconds: number): VideoJob {
    assertMutable(job);
    return { ...job, durationSeconds, updatedAt: new Date() };
}

/**
 * Marks a job as succeeded with its result locator.
 */
export function succeedJob(job: VideoJob, resultLocator: string): VideoJob {
    assertMutable(job);
    const now = new Date();
    return {
        ...job,
        status: 'succeeded',
        currentStep: undefined,
        resultLocator,
        failureReason: null,
        failureMessage: undefined,
        updatedAt: now,
        completedAt: now,
    };
}

/**
 * Marks a job as failed with a reason code and short message.
 */
export function failJob(job: VideoJob, reason: JobFailureReason, message: string): VideoJob {
    assertMutable(job);
    const now = new Date();
    return {
        ...job,
        status: 'failed',
        currentStep: undefined,
        resultLocator: null,
        failureReason: reason,
        failureMessage: message,
        updatedAt: now,
        completedAt: now,
    };
}

/**
 * Overlay image locators of a job input, keyed by their role in the layout.
 */
export function overlayImageUrls(input: VideoJobInput): Partial<Record<OverlayRole, string>> {
    if (input.variant === 'standard') {
        return { intro: input.introImageUrl, outro: input.outroImageUrl };
    }
    return {
        reddit_post: input.redditPostImageUrl,
        first_image: input.firstImageUrl,
        second_image: input.secondImageUrl,
    };
}

/**
 * Role of an overlay image within a layout.
 */
export type OverlayRole = 'intro' | 'outro' | 'reddit_post' | 'first_image' | 'second_image';
