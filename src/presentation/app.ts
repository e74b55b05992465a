import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import fs from 'fs';
import path from 'path';
import { Config } from '../config';
import { AssetCache } from '../application/AssetCache';
import { BackgroundClipSelector } from '../application/BackgroundClipSelector';
import { CaptionTimelineBuilder } from '../application/CaptionTimelineBuilder';
import { CompositionPlanner } from '../application/CompositionPlanner';
import { JobScheduler } from '../application/JobScheduler';
import { OutputFileTracker } from '../application/OutputFileTracker';
import { RenderPipeline } from '../application/RenderPipeline';
import { RetentionSweeper } from '../application/RetentionSweeper';
import { VideoJobProcessor } from '../application/VideoJobProcessor';
import { createRenderSteps } from '../application/pipelines';
import { TranscriptWord } from '../domain/entities/Transcript';

// Infrastructure imports
import { HttpAssetSource } from '../infrastructure/assets/HttpAssetSource';
import { DirectoryMediaLibrary, MUSIC_EXTENSIONS, createCategoryRegistry } from '../infrastructure/media/DirectoryMediaLibrary';
import { FFprobeMediaProbe } from '../infrastructure/media/FFprobeMediaProbe';
import { WhisperTranscriptionClient } from '../infrastructure/transcription/WhisperTranscriptionClient';
import { FFmpegVideoRenderer } from '../infrastructure/video/FFmpegVideoRenderer';

// Route imports
import { createVideoRoutes } from './routes/videoRoutes';
import { createJobRoutes } from './routes/jobRoutes';
import { createOutputRoutes } from './routes/outputRoutes';
import { NotFoundError, errorHandler } from './middleware/errorHandler';

export const API_PREFIX = '/api/v1';

/**
 * Services the HTTP layer talks to.
 */
export interface AppDependencies {
    scheduler: JobScheduler;
    selector: BackgroundClipSelector;
    tracker: OutputFileTracker;
}

export interface ServiceContainer extends AppDependencies {
    sweeper: RetentionSweeper;
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, deps: AppDependencies): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: '25mb' }));

    // Health check
    app.get('/health', (_req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: '1.0.0',
        });
    });

    // Routes
    app.use(API_PREFIX, createVideoRoutes(deps.scheduler, deps.selector));
    app.use(API_PREFIX, createJobRoutes(deps.scheduler));
    app.use(createOutputRoutes(config.processedVideosDir, deps.tracker));

    app.use((req: Request) => {
        throw new NotFoundError(`Route not found: ${req.method} ${req.path}`);
    });

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

function optionalFile(filePath: string, label: string): string | null {
    if (fs.existsSync(filePath)) {
        return filePath;
    }
    console.warn(`[Bootstrap] ${label} not found at ${filePath}; continuing without it`);
    return null;
}

/**
 * Wires the scheduler, pipeline and adapters from configuration.
 */
export async function createDependencies(config: Config): Promise<ServiceContainer> {
    const categories = await createCategoryRegistry(config.backgroundDir);
    console.log(`[Bootstrap] Gameplay categories: ${Array.from(categories.keys()).sort().join(', ') || '(none)'}`);

    const selector = new BackgroundClipSelector(
        categories,
        new DirectoryMediaLibrary(config.musicDir, MUSIC_EXTENSIONS)
    );
    const tracker = new OutputFileTracker();
    const tempDir = path.join(config.processedVideosDir, 'temp');

    const steps = createRenderSteps({
        selector,
        assetCache: new AssetCache<Buffer>({ maxSize: config.maxCacheSize, name: 'AssetCache' }),
        transcriptCache: new AssetCache<TranscriptWord[]>({ maxSize: config.maxCacheSize, name: 'TranscriptCache' }),
        assetSource: new HttpAssetSource({
            timeoutMs: config.fetchTimeoutMs,
            localRoot: config.localAssetDir || undefined,
        }),
        probe: new FFprobeMediaProbe(),
        transcriptionClient: new WhisperTranscriptionClient(config.transcriptionApiKey, {
            baseUrl: config.transcriptionBaseUrl,
            model: config.whisperModel,
            fallbackModel: config.whisperFallbackModel,
            language: config.transcriptionLanguage,
            timeoutMs: config.transcriptionTimeoutMs,
        }),
        captionBuilder: new CaptionTimelineBuilder({
            mergeGapSeconds: config.captionMergeGapSeconds,
            maxCharacters: config.captionMaxCharacters,
        }),
        planner: new CompositionPlanner(),
        renderer: new FFmpegVideoRenderer({ timeoutMs: config.encodeTimeoutMs }),
        popupSoundPath: optionalFile(path.join(config.soundsDir, 'popup.mp3'), 'Popup sound'),
        encoderQuality: { primary: config.encoder, degraded: config.fallbackEncoder },
        outputDir: config.processedVideosDir,
        fetchTimeoutMs: config.fetchTimeoutMs,
        transcriptionTimeoutMs: config.transcriptionTimeoutMs,
        transcriptionCacheParams: {
            model: config.whisperModel,
            language: config.transcriptionLanguage,
        },
    });

    const processor = new VideoJobProcessor(new RenderPipeline(steps, tempDir), tracker, config.publicBaseUrl);
    const scheduler = new JobScheduler(processor, config.maxConcurrentVideos);
    const sweeper = new RetentionSweeper(tracker, {
        retentionMinutes: config.videoRetentionMinutes,
        intervalSeconds: config.sweepIntervalSeconds,
        tempDir,
        tempFileMaxAgeMinutes: config.tempFileMaxAgeMinutes,
    });

    return { scheduler, selector, tracker, sweeper };
}
