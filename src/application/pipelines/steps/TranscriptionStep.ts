/**
 * Transcription step - word timestamps for the narration, then the caption timeline.
 */

import path from 'path';
import { PipelineStep, JobContext, requireValue, toStageError } from '../PipelineInfrastructure';
import { AssetCache, CacheLease, cacheKey } from '../../AssetCache';
import { CaptionTimelineBuilder } from '../../CaptionTimelineBuilder';
import { withDegradedRetry } from '../DegradedRetry';
import { ITranscriptionClient, TranscriptionCapability } from '../../../domain/ports/ITranscriptionClient';
import { TranscriptWord } from '../../../domain/entities/Transcript';
import { errorMessage } from '../../../domain/errors/VideoJobError';
import { withTimeout } from '../../../infrastructure/resilience/RetryUtils';

export interface TranscriptionStepOptions {
    timeoutMs: number;
    /**
     * Parameters that change the transcript for the same audio; part of the cache key
     * together with the capability that produced it.
     */
    cacheParams: Record<string, string>;
}

export class TranscriptionStep implements PipelineStep {
    readonly name = 'Transcription';
    readonly status = 'transcribing';

    constructor(
        private readonly transcriptionClient: ITranscriptionClient,
        private readonly transcriptCache: AssetCache<TranscriptWord[]>,
        private readonly captionBuilder: CaptionTimelineBuilder,
        private readonly options: TranscriptionStepOptions
    ) { }

    async execute(context: JobContext): Promise<JobContext> {
        try {
            const audio = requireValue(context.narrationAudio, 'narration audio', this.name);
            const narrationPath = requireValue(context.narrationPath, 'narration path', this.name);
            const durationSeconds = requireValue(context.durationSeconds, 'duration', this.name);

            const lease = await this.transcribe(context, audio, path.basename(narrationPath));
            context.leases.push(lease);

            const transcript = lease.payload;
            if (transcript.length === 0) {
                console.warn(`[${context.jobId}] Transcript has no words; rendering without captions`);
            }
            const captions = this.captionBuilder.build(transcript, durationSeconds);
            console.log(`[${context.jobId}] ${transcript.length} words -> ${captions.length} caption events`);

            return { ...context, transcript, captions };
        } catch (error: unknown) {
            throw toStageError('TranscriptionError', error);
        }
    }

    /**
     * Primary and degraded transcripts are cached under separate keys, so a
     * degraded result never stands in for a later job's primary attempt.
     */
    private async transcribe(
        context: JobContext,
        audio: Buffer,
        filename: string
    ): Promise<CacheLease<TranscriptWord[]>> {
        const { jobId } = context;
        const { value, attempt } = await withDegradedRetry<TranscriptionCapability, CacheLease<TranscriptWord[]>>(
            { primary: 'standard', degraded: 'degraded' },
            (capability) => {
                const key = cacheKey(context.job.input.audioUrl, {
                    kind: 'transcript',
                    capability,
                    ...this.options.cacheParams,
                });
                return this.transcriptCache.getOrFetch(key, () =>
                    withTimeout(
                        (signal) => this.transcriptionClient.transcribe(audio, { capability, filename, signal }),
                        this.options.timeoutMs,
                        'Transcription'
                    )
                );
            },
            (error) => console.warn(`[${jobId}] Transcription failed, retrying degraded: ${errorMessage(error)}`)
        );
        if (attempt === 'degraded') {
            console.warn(`[${jobId}] Transcript produced by degraded configuration`);
        }
        return value;
    }
}
