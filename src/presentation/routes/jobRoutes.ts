import { Router, Request, Response } from 'express';
import { JobScheduler } from '../../application/JobScheduler';
import { VideoJob } from '../../domain/entities/VideoJob';

/**
 * Public view of a job. Failures expose only the reason code and message.
 */
export function toJobResponse(job: VideoJob): Record<string, unknown> {
    const response: Record<string, unknown> = {
        jobId: job.id,
        variant: job.variant,
        status: job.status,
        createdAt: job.createdAt.toISOString(),
        updatedAt: job.updatedAt.toISOString(),
        completedAt: job.completedAt ? job.completedAt.toISOString() : null,
    };

    // Add current step for in-progress jobs
    if (job.currentStep) {
        response.step = job.currentStep;
    }
    if (job.durationSeconds !== undefined) {
        response.durationSeconds = job.durationSeconds;
    }
    if (job.status === 'succeeded') {
        response.videoUrl = job.resultLocator;
    }
    if (job.status === 'failed') {
        response.error = { code: job.failureReason, message: job.failureMessage };
    }

    return response;
}

/**
 * Creates job status routes with dependency injection.
 */
export function createJobRoutes(scheduler: JobScheduler): Router {
    const router = Router();

    /**
     * GET /jobs/:jobId
     *
     * Returns the current status and result of a job.
     */
    router.get('/jobs/:jobId', (req: Request, res: Response) => {
        res.json(toJobResponse(scheduler.status(req.params.jobId)));
    });

    /**
     * GET /jobs
     *
     * Lists all jobs with scheduler counters (for monitoring).
     */
    router.get('/jobs', (_req: Request, res: Response) => {
        const jobs = scheduler.getAllJobs().map((job) => ({
            jobId: job.id,
            variant: job.variant,
            status: job.status,
            currentStep: job.currentStep,
            createdAt: job.createdAt.toISOString(),
            updatedAt: job.updatedAt.toISOString(),
        }));

        res.json({ jobs, total: jobs.length, ...scheduler.stats() });
    });

    return router;
}
