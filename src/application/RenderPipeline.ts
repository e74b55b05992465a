import fs from 'fs/promises';
import path from 'path';
import { VideoJob } from '../domain/entities/VideoJob';
import { errorMessage } from '../domain/errors/VideoJobError';
import {
    JobContext,
    PipelineHooks,
    PipelineStep,
    createJobContext,
    executePipeline,
} from './pipelines/PipelineInfrastructure';

/**
 * Runs a job through the render stages inside a private temp directory.
 * Whatever the outcome, the directory is removed and every cache lease
 * the job took is released.
 */
export class RenderPipeline {
    constructor(
        private readonly steps: PipelineStep[],
        private readonly tempRoot: string
    ) { }

    async run(job: VideoJob, hooks: PipelineHooks = {}): Promise<JobContext> {
        await fs.mkdir(this.tempRoot, { recursive: true });
        const workDir = await fs.mkdtemp(path.join(this.tempRoot, `${job.id}-`));
        const context = createJobContext(job, workDir);

        try {
            return await executePipeline(context, this.steps, hooks);
        } finally {
            for (const lease of context.leases) {
                lease.release();
            }
            await fs.rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
                // The sweeper removes orphaned temp directories on a later pass.
                console.warn(`[Pipeline] [${job.id}] Could not remove ${workDir}: ${errorMessage(error)}`);
            });
        }
    }
}
