import { v4 as uuidv4 } from 'uuid';
import {
    VideoJob,
    createVideoJob,
    failJob,
    isJobTerminal,
    parseVideoJobInput,
    succeedJob,
    updateJobStatus,
    withDuration,
} from '../domain/entities/VideoJob';
import {
    JobFailureReason,
    JobNotFoundError,
    StageError,
    VideoJobError,
    errorMessage,
} from '../domain/errors/VideoJobError';
import { StageStatus } from './pipelines/PipelineInfrastructure';

/**
 * Callbacks a runner uses to report progress on the job it owns.
 */
export interface JobProgress {
    stage(status: StageStatus, step: string): void;
    duration(seconds: number): void;
}

/**
 * Executes one admitted job and resolves to its result locator.
 */
export interface JobRunner {
    run(job: VideoJob, progress: JobProgress): Promise<string>;
}

export interface SchedulerStats {
    running: number;
    queued: number;
    concurrencyLimit: number;
}

const FAILURE_REASONS: readonly string[] = [
    'CategoryNotFound',
    'AssetFetchError',
    'TranscriptionError',
    'PlanningError',
    'EncodingError',
    'InternalError',
];

function isFailureReason(code: string): code is JobFailureReason {
    return FAILURE_REASONS.includes(code);
}

/**
 * Failure reason and caller-facing message for anything a runner throws.
 */
export function describeFailure(error: unknown): { reason: JobFailureReason; message: string } {
    if (error instanceof StageError) {
        return { reason: error.reason, message: error.message };
    }
    if (error instanceof VideoJobError && isFailureReason(error.code)) {
        return { reason: error.code, message: error.message };
    }
    return { reason: 'InternalError', message: 'Internal error while processing the job' };
}

export function generateJobId(): string {
    return `job_${uuidv4().substring(0, 8)}`;
}

/**
 * Admission control for video jobs.
 * At most `concurrencyLimit` jobs run at once; the rest wait in FIFO order.
 * The running counter and the queue are only touched synchronously, so no
 * two completions can interleave inside an admission.
 */
export class JobScheduler {
    private readonly jobs: Map<string, VideoJob> = new Map();
    private readonly queue: string[] = [];
    private running = 0;
    private idleWaiters: Array<() => void> = [];

    constructor(
        private readonly runner: JobRunner,
        readonly concurrencyLimit: number,
        private readonly generateId: () => string = generateJobId
    ) {
        if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
            throw new Error(`Concurrency limit must be a positive integer, got ${concurrencyLimit}`);
        }
    }

    /**
     * Validates the request, records the job and admits or queues it.
     * @throws InvalidRequestError when a variant field is missing or malformed
     */
    submit(request: unknown): string {
        const input = parseVideoJobInput(request);
        const job = createVideoJob(this.generateId(), input);
        this.jobs.set(job.id, job);
        this.queue.push(job.id);

        console.log(`[Scheduler] Submitted ${job.id} (${job.variant}, ${input.gameplayType})`);
        this.admit();
        return job.id;
    }

    /**
     * @throws JobNotFoundError for an unknown id
     */
    status(jobId: string): VideoJob {
        const job = this.jobs.get(jobId);
        if (!job) {
            throw new JobNotFoundError(jobId);
        }
        return job;
    }

    getAllJobs(): VideoJob[] {
        return Array.from(this.jobs.values());
    }

    stats(): SchedulerStats {
        return {
            running: this.running,
            queued: this.queue.length,
            concurrencyLimit: this.concurrencyLimit,
        };
    }

    /**
     * Resolves once no job is running or queued.
     */
    onIdle(): Promise<void> {
        if (this.isIdle()) {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.idleWaiters.push(resolve);
        });
    }

    private isIdle(): boolean {
        return this.running === 0 && this.queue.length === 0;
    }

    private admit(): void {
        while (this.running < this.concurrencyLimit) {
            const jobId = this.queue.shift();
            if (jobId === undefined) {
                return;
            }
            this.running++;
            this.update(jobId, (job) => updateJobStatus(job, 'admitted', 'Starting'));
            console.log(`[Scheduler] Admitted ${jobId} (${this.running}/${this.concurrencyLimit} running, ${this.queue.length} queued)`);
            this.execute(jobId).catch((error: unknown) => {
                console.error(`[Scheduler] Unexpected error finishing ${jobId}:`, error);
            });
        }
    }

    private async execute(jobId: string): Promise<void> {
        try {
            const locator = await this.runner.run(this.status(jobId), this.progressFor(jobId));
            this.update(jobId, (job) => succeedJob(job, locator));
            console.log(`[Scheduler] ${jobId} succeeded: ${locator}`);
        } catch (error: unknown) {
            const { reason, message } = describeFailure(error);
            this.update(jobId, (job) => failJob(job, reason, message));
            console.error(`[Scheduler] ${jobId} failed (${reason}): ${errorMessage(error)}`);
        } finally {
            this.running--;
            this.admit();
            this.notifyIfIdle();
        }
    }

    private progressFor(jobId: string): JobProgress {
        return {
            stage: (status, step) => this.update(jobId, (job) => updateJobStatus(job, status, step)),
            duration: (seconds) => this.update(jobId, (job) => withDuration(job, seconds)),
        };
    }

    /**
     * Applies a transition unless the job already reached a terminal state.
     */
    private update(jobId: string, transition: (job: VideoJob) => VideoJob): void {
        const job = this.jobs.get(jobId);
        if (!job || isJobTerminal(job)) {
            return;
        }
        this.jobs.set(jobId, transition(job));
    }

    private notifyIfIdle(): void {
        if (!this.isIdle()) {
            return;
        }
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        waiters.forEach((resolve) => resolve());
    }
}
