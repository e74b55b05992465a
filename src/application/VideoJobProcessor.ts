import path from 'path';
import { VideoJob } from '../domain/entities/VideoJob';
import { JobProgress, JobRunner } from './JobScheduler';
import { OutputFileTracker } from './OutputFileTracker';
import { RenderPipeline } from './RenderPipeline';
import { requireValue } from './pipelines/PipelineInfrastructure';

/**
 * Runs admitted jobs through the render pipeline and hands finished
 * files to retention tracking.
 */
export class VideoJobProcessor implements JobRunner {
    constructor(
        private readonly pipeline: RenderPipeline,
        private readonly tracker: OutputFileTracker,
        private readonly publicBaseUrl: string
    ) { }

    async run(job: VideoJob, progress: JobProgress): Promise<string> {
        const context = await this.pipeline.run(job, {
            onStepStart: (step) => progress.stage(step.status, step.name),
            onStepComplete: (_step, ctx) => {
                if (ctx.durationSeconds !== undefined) {
                    progress.duration(ctx.durationSeconds);
                }
            },
        });

        const outputPath = requireValue(context.outputPath, 'output path', 'Result');
        this.tracker.track(job.id, outputPath);
        return this.locatorFor(outputPath);
    }

    locatorFor(outputPath: string): string {
        return `${this.publicBaseUrl}/videos/${encodeURIComponent(path.basename(outputPath))}`;
    }
}
