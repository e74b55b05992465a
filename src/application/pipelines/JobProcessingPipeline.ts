import { PipelineStep } from './PipelineInfrastructure';
import { DegradedRetryPlan } from './DegradedRetry';
import { FetchStep } from './steps/FetchStep';
import { TranscriptionStep } from './steps/TranscriptionStep';
import { PlanningStep } from './steps/PlanningStep';
import { EncodingStep } from './steps/EncodingStep';

import { AssetCache } from '../AssetCache';
import { BackgroundClipSelector } from '../BackgroundClipSelector';
import { CaptionTimelineBuilder } from '../CaptionTimelineBuilder';
import { CompositionPlanner } from '../CompositionPlanner';
import { IAssetSource } from '../../domain/ports/IAssetSource';
import { IMediaProbe } from '../../domain/ports/IMediaProbe';
import { ITranscriptionClient } from '../../domain/ports/ITranscriptionClient';
import { IVideoRenderer } from '../../domain/ports/IVideoRenderer';
import { TranscriptWord } from '../../domain/entities/Transcript';
import { EncoderQuality } from '../../config';

// Dependencies needed for pipeline creation
export interface PipelineDependencies {
    selector: BackgroundClipSelector;
    assetCache: AssetCache<Buffer>;
    transcriptCache: AssetCache<TranscriptWord[]>;
    assetSource: IAssetSource;
    probe: IMediaProbe;
    transcriptionClient: ITranscriptionClient;
    captionBuilder: CaptionTimelineBuilder;
    planner: CompositionPlanner;
    renderer: IVideoRenderer;
    /** Popup sound played at each overlay start; null = none */
    popupSoundPath: string | null;
    encoderQuality: DegradedRetryPlan<EncoderQuality>;
    outputDir: string;
    fetchTimeoutMs: number;
    transcriptionTimeoutMs: number;
    /** Settings that change a transcript for the same audio (model, language) */
    transcriptionCacheParams: Record<string, string>;
}

/**
 * Fetching -> Transcribing -> Planning -> Encoding.
 */
export function createRenderSteps(deps: PipelineDependencies): PipelineStep[] {
    return [
        new FetchStep(deps.selector, deps.assetCache, deps.assetSource, deps.probe, deps.fetchTimeoutMs),
        new TranscriptionStep(deps.transcriptionClient, deps.transcriptCache, deps.captionBuilder, {
            timeoutMs: deps.transcriptionTimeoutMs,
            cacheParams: deps.transcriptionCacheParams,
        }),
        new PlanningStep(deps.planner, deps.popupSoundPath),
        new EncodingStep(deps.renderer, deps.encoderQuality, deps.outputDir),
    ];
}
