/**
 * Encoding step - renders the composition, with one emergency retry at reduced quality.
 * Each attempt encodes into its own directory; only a complete, non-empty
 * file is moved into the output directory.
 */

import fs from 'fs/promises';
import path from 'path';
import { PipelineStep, JobContext, requireValue, toStageError } from '../PipelineInfrastructure';
import { AttemptKind, DegradedRetryPlan, withDegradedRetry } from '../DegradedRetry';
import { IVideoRenderer } from '../../../domain/ports/IVideoRenderer';
import { VideoVariant } from '../../../domain/entities/VideoJob';
import { CompositionSpec } from '../../../domain/entities/CompositionSpec';
import { errorMessage } from '../../../domain/errors/VideoJobError';
import { EncoderQuality } from '../../../config';

export function outputFilename(variant: VideoVariant, jobId: string): string {
    return variant === 'reddit' ? `reddit_video_${jobId}.mp4` : `video_${jobId}.mp4`;
}

export class EncodingStep implements PipelineStep {
    readonly name = 'Encoding';
    readonly status = 'encoding';

    constructor(
        private readonly renderer: IVideoRenderer,
        private readonly quality: DegradedRetryPlan<EncoderQuality>,
        private readonly outputDir: string
    ) { }

    async execute(context: JobContext): Promise<JobContext> {
        try {
            const spec = requireValue(context.composition, 'composition', this.name);
            const filename = outputFilename(context.job.variant, context.jobId);

            const { value: encodedPath, attempt } = await withDegradedRetry(
                this.quality,
                (quality, kind) => this.encode(context, spec, filename, quality, kind),
                (error) => console.warn(`[${context.jobId}] Encoding failed, retrying with emergency settings: ${errorMessage(error)}`)
            );

            await fs.mkdir(this.outputDir, { recursive: true });
            const outputPath = path.join(this.outputDir, filename);
            await fs.rename(encodedPath, outputPath);

            console.log(`[${context.jobId}] Encoded ${filename} (${attempt} settings)`);
            return { ...context, outputPath };
        } catch (error: unknown) {
            throw toStageError('EncodingError', error);
        }
    }

    private async encode(
        context: JobContext,
        spec: CompositionSpec,
        filename: string,
        quality: EncoderQuality,
        kind: AttemptKind
    ): Promise<string> {
        const attemptDir = path.join(context.workDir, `encode-${kind}`);
        await fs.rm(attemptDir, { recursive: true, force: true });
        await fs.mkdir(attemptDir, { recursive: true });

        const target = path.join(attemptDir, filename);
        const result = await this.renderer.render({ spec, workDir: attemptDir, outputPath: target, quality });

        const stats = await fs.stat(result.outputPath).catch(() => null);
        if (!stats || stats.size === 0) {
            throw new Error(`Encoder produced no output at ${result.outputPath}`);
        }
        return result.outputPath;
    }
}
