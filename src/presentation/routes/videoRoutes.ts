import { Router, Request, Response } from 'express';
import { JobScheduler } from '../../application/JobScheduler';
import { BackgroundClipSelector } from '../../application/BackgroundClipSelector';
import { VideoVariant } from '../../domain/entities/VideoJob';

/**
 * Tags a request body with the variant its route implies.
 * Non-object bodies pass through so validation can reject them.
 */
function withVariant(body: unknown, variant: VideoVariant): unknown {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
        return body;
    }
    return { ...body, variant };
}

/**
 * Creates video submission routes with dependency injection.
 */
export function createVideoRoutes(scheduler: JobScheduler, selector: BackgroundClipSelector): Router {
    const router = Router();

    const submit = (variant: VideoVariant) => (req: Request, res: Response) => {
        const body: unknown = req.body;
        const jobId = scheduler.submit(withVariant(body, variant));
        const job = scheduler.status(jobId);

        res.status(202).json({
            jobId,
            status: job.status,
            statusUrl: `${req.baseUrl}/jobs/${jobId}`,
        });
    };

    /**
     * POST /create-video
     *
     * Starts a standard video job (intro and outro images).
     * Returns immediately with job ID for polling.
     */
    router.post('/create-video', submit('standard'));

    /**
     * POST /create-reddit-video
     *
     * Starts a reddit-post video job (post screenshot plus two images).
     */
    router.post('/create-reddit-video', submit('reddit'));

    /**
     * GET /categories
     */
    router.get('/categories', (_req: Request, res: Response) => {
        res.json({ categories: selector.listCategories() });
    });

    return router;
}
