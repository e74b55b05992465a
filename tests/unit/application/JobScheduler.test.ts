import { JobProgress, JobRunner, JobScheduler, describeFailure, generateJobId } from '../../../src/application/JobScheduler';
import { VideoJob } from '../../../src/domain/entities/VideoJob';
import { CategoryNotFoundError, InvalidRequestError, JobNotFoundError, StageError } from '../../../src/domain/errors/VideoJobError';
import { flushPromises } from '../../helpers/testConfig';

interface Deferred {
    resolve(locator: string): void;
    reject(error: unknown): void;
}

/**
 * Runner whose jobs finish only when the test says so.
 */
class ControlledRunner implements JobRunner {
    readonly started: string[] = [];
    readonly progress: Map<string, JobProgress> = new Map();
    private readonly pending: Map<string, Deferred> = new Map();
    private active = 0;
    maxActive = 0;

    run(job: VideoJob, progress: JobProgress): Promise<string> {
        this.started.push(job.id);
        this.progress.set(job.id, progress);
        this.active++;
        this.maxActive = Math.max(this.maxActive, this.active);
        return new Promise<string>((resolve, reject) => {
            this.pending.set(job.id, { resolve, reject });
        }).finally(() => {
            this.active--;
        });
    }

    finish(jobId: string, locator = `http://test.local/videos/${jobId}.mp4`): void {
        this.take(jobId).resolve(locator);
    }

    fail(jobId: string, error: unknown): void {
        this.take(jobId).reject(error);
    }

    private take(jobId: string): Deferred {
        const deferred = this.pending.get(jobId);
        if (!deferred) {
            throw new Error(`${jobId} is not running`);
        }
        this.pending.delete(jobId);
        return deferred;
    }
}

function standardRequest(gameplayType = 'minecraft') {
    return {
        variant: 'standard',
        audioUrl: 'http://assets.local/narration.mp3',
        gameplayType,
        introImageUrl: 'http://assets.local/intro.png',
        outroImageUrl: 'http://assets.local/outro.png',
    };
}

function sequentialIds(): () => string {
    let next = 0;
    return () => `job_${++next}`;
}

describe('JobScheduler', () => {
    let runner: ControlledRunner;
    let logSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        runner = new ControlledRunner();
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        logSpy.mockRestore();
        errorSpy.mockRestore();
    });

    it('should reject a concurrency limit below one', () => {
        expect(() => new JobScheduler(runner, 0)).toThrow('Concurrency limit must be a positive integer, got 0');
        expect(() => new JobScheduler(runner, 1.5)).toThrow('Concurrency limit must be a positive integer, got 1.5');
    });

    it('should never run more than the limit and admit in FIFO order', async () => {
        const scheduler = new JobScheduler(runner, 2, sequentialIds());

        const ids = [1, 2, 3, 4, 5].map(() => scheduler.submit(standardRequest()));

        expect(ids).toEqual(['job_1', 'job_2', 'job_3', 'job_4', 'job_5']);
        expect(runner.started).toEqual(['job_1', 'job_2']);
        expect(scheduler.stats()).toEqual({ running: 2, queued: 3, concurrencyLimit: 2 });
        expect(scheduler.status('job_1')).toMatchObject({ status: 'admitted', currentStep: 'Starting' });
        expect(scheduler.status('job_3').status).toBe('queued');

        runner.finish('job_2');
        await flushPromises();
        expect(runner.started).toEqual(['job_1', 'job_2', 'job_3']);

        runner.finish('job_1');
        runner.finish('job_3');
        await flushPromises();
        expect(runner.started).toEqual(['job_1', 'job_2', 'job_3', 'job_4', 'job_5']);

        runner.finish('job_4');
        runner.finish('job_5');
        await scheduler.onIdle();

        expect(runner.maxActive).toBe(2);
        expect(scheduler.stats()).toEqual({ running: 0, queued: 0, concurrencyLimit: 2 });
    });

    it('should record the result locator of a successful job', async () => {
        const scheduler = new JobScheduler(runner, 1, sequentialIds());
        const id = scheduler.submit(standardRequest());

        runner.finish(id, 'http://test.local/videos/video_job_1.mp4');
        await scheduler.onIdle();

        const job = scheduler.status(id);
        expect(job.status).toBe('succeeded');
        expect(job.resultLocator).toBe('http://test.local/videos/video_job_1.mp4');
        expect(job.failureReason).toBeNull();
        expect(job.completedAt).toBeInstanceOf(Date);
    });

    it('should apply progress reported by the runner', () => {
        const scheduler = new JobScheduler(runner, 1, sequentialIds());
        const id = scheduler.submit(standardRequest());
        const progress = runner.progress.get(id);
        if (!progress) throw new Error('runner did not start');

        progress.stage('transcribing', 'Transcription');
        progress.duration(42.5);

        expect(scheduler.status(id)).toMatchObject({
            status: 'transcribing',
            currentStep: 'Transcription',
            durationSeconds: 42.5,
        });
    });

    it('should fail a job with the reason carried by a stage error and free its slot', async () => {
        const scheduler = new JobScheduler(runner, 1, sequentialIds());
        const first = scheduler.submit(standardRequest('nonexistent'));
        const second = scheduler.submit(standardRequest());

        runner.fail(first, new StageError('CategoryNotFound', 'Unknown gameplay category "nonexistent"'));
        await flushPromises();

        expect(scheduler.status(first)).toMatchObject({
            status: 'failed',
            failureReason: 'CategoryNotFound',
            failureMessage: 'Unknown gameplay category "nonexistent"',
            resultLocator: null,
        });
        expect(runner.started).toEqual([first, second]);
        expect(scheduler.stats().running).toBe(1);
    });

    it('should report unexpected runner errors as InternalError', async () => {
        const scheduler = new JobScheduler(runner, 1, sequentialIds());
        const id = scheduler.submit(standardRequest());

        runner.fail(id, new TypeError('cannot read properties of undefined'));
        await scheduler.onIdle();

        expect(scheduler.status(id)).toMatchObject({
            status: 'failed',
            failureReason: 'InternalError',
            failureMessage: 'Internal error while processing the job',
        });
    });

    it('should release the slot when the runner throws synchronously', async () => {
        const throwing: JobRunner = {
            run: () => {
                throw new Error('boom');
            },
        };
        const scheduler = new JobScheduler(throwing, 1, sequentialIds());

        const first = scheduler.submit(standardRequest());
        const second = scheduler.submit(standardRequest());
        await scheduler.onIdle();

        expect(scheduler.status(first).failureReason).toBe('InternalError');
        expect(scheduler.status(second).failureReason).toBe('InternalError');
        expect(scheduler.stats()).toEqual({ running: 0, queued: 0, concurrencyLimit: 1 });
    });

    it('should ignore progress reported after the job finished', async () => {
        const scheduler = new JobScheduler(runner, 1, sequentialIds());
        const id = scheduler.submit(standardRequest());
        const progress = runner.progress.get(id);
        if (!progress) throw new Error('runner did not start');

        runner.finish(id);
        await scheduler.onIdle();
        progress.stage('encoding', 'Encoding');

        expect(scheduler.status(id).status).toBe('succeeded');
    });

    it('should reject an invalid request without creating a job', () => {
        const scheduler = new JobScheduler(runner, 1, sequentialIds());

        expect(() => scheduler.submit({ variant: 'standard', audioUrl: 'x' })).toThrow(InvalidRequestError);
        expect(scheduler.getAllJobs()).toEqual([]);
        expect(runner.started).toEqual([]);
    });

    it('should throw JobNotFoundError for an unknown id', () => {
        const scheduler = new JobScheduler(runner, 1);

        expect(() => scheduler.status('job_missing')).toThrow(JobNotFoundError);
        expect(() => scheduler.status('job_missing')).toThrow('Job not found: job_missing');
    });

    it('should resolve onIdle immediately when nothing is pending', async () => {
        const scheduler = new JobScheduler(runner, 1);

        await expect(scheduler.onIdle()).resolves.toBeUndefined();
    });
});

describe('describeFailure', () => {
    it('should keep the reason of a coded job error', () => {
        expect(describeFailure(new CategoryNotFoundError('gta'))).toEqual({
            reason: 'CategoryNotFound',
            message: 'Unknown gameplay category "gta"',
        });
    });

    it('should not treat request errors as job failure reasons', () => {
        expect(describeFailure(new InvalidRequestError('bad')).reason).toBe('InternalError');
    });

    it('should hide non-domain errors', () => {
        expect(describeFailure('oops')).toEqual({
            reason: 'InternalError',
            message: 'Internal error while processing the job',
        });
    });
});

describe('generateJobId', () => {
    it('should produce short prefixed ids', () => {
        expect(generateJobId()).toMatch(/^job_[0-9a-f]{8}$/);
    });
});
