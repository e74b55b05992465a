import ffmpeg from 'fluent-ffmpeg';
import path from 'path';
import { IVideoRenderer, RenderRequest, RenderResult } from '../../domain/ports/IVideoRenderer';
import {
    CompositionSpec,
    backgroundLayer,
    captionLayer,
    overlayLayers,
} from '../../domain/entities/CompositionSpec';
import { EncoderQuality } from '../../config';
import { writeAssFile } from '../subtitles/AssSubtitleWriter';

/** Overlay images are fitted into a square of this size */
export const OVERLAY_BOX = 900;
/** Distance of overlay images from the top edge */
export const OVERLAY_TOP = 300;

export interface RenderInput {
    path: string;
    options: string[];
}

export interface RenderGraph {
    inputs: RenderInput[];
    filters: string[];
}

function seconds(value: number): string {
    return String(Number(value.toFixed(3)));
}

/**
 * Escapes a path for use inside a filtergraph option value.
 */
export function escapeFilterPath(filePath: string): string {
    return filePath.replace(/\\/g, '/').replace(/:/g, '\\:').replace(/'/g, "\\'");
}

/**
 * Translates a composition into ffmpeg inputs and a filter graph producing
 * `[vout]` and `[aout]`. Pure; `subtitlesPath` is the rendered caption file, if any.
 */
export function buildRenderGraph(spec: CompositionSpec, subtitlesPath: string | null): RenderGraph {
    const { width, height } = spec.resolution;
    const inputs: RenderInput[] = [];
    const filters: string[] = [];

    const background = backgroundLayer(spec);
    if (!background) {
        throw new Error('Composition has no background layer');
    }
    inputs.push({
        path: background.clipPath,
        options: background.window.loop ? ['-stream_loop -1'] : [`-ss ${seconds(background.window.offsetSeconds)}`],
    });
    filters.push(
        `[0:v]scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height},setsar=1,setpts=PTS-STARTPTS[bg]`
    );

    let current = 'bg';
    if (subtitlesPath) {
        filters.push(`[bg]subtitles='${escapeFilterPath(subtitlesPath)}'[bg_sub]`);
        current = 'bg_sub';
    }

    overlayLayers(spec).forEach((layer, i) => {
        const index = inputs.length;
        inputs.push({ path: layer.imagePath, options: ['-loop 1'] });
        filters.push(`[${index}:v]scale=${OVERLAY_BOX}:${OVERLAY_BOX}:force_original_aspect_ratio=decrease,format=rgba[img${i}]`);
        filters.push(
            `[${current}][img${i}]overlay=(W-w)/2:${OVERLAY_TOP}:enable='between(t,${seconds(layer.window.start)},${seconds(layer.window.end)})'[v${i}]`
        );
        current = `v${i}`;
    });
    filters.push(`[${current}]format=yuv420p[vout]`);

    const audioLabels: string[] = [];
    spec.audioTracks.forEach((track, i) => {
        const index = inputs.length;
        inputs.push({ path: track.path, options: track.loop ? ['-stream_loop -1'] : [] });

        let chain = `[${index}:a]volume=${track.volume}`;
        if (track.startSeconds > 0) {
            const delayMs = Math.round(track.startSeconds * 1000);
            chain += `,adelay=${delayMs}|${delayMs}`;
        }
        filters.push(`${chain}[a${i}]`);
        audioLabels.push(`[a${i}]`);
    });
    if (audioLabels.length === 0) {
        throw new Error('Composition has no audio tracks');
    }
    // The first track is the narration; it decides when the mix ends.
    filters.push(`${audioLabels.join('')}amix=inputs=${audioLabels.length}:duration=first:normalize=0[aout]`);

    return { inputs, filters };
}

export function buildOutputOptions(spec: CompositionSpec, quality: EncoderQuality): string[] {
    return [
        '-map [vout]',
        '-map [aout]',
        '-c:v libx264',
        `-preset ${quality.preset}`,
        `-crf ${quality.crf}`,
        '-pix_fmt yuv420p',
        '-c:a aac',
        `-b:a ${quality.audioBitrate}`,
        `-t ${seconds(spec.durationSeconds)}`,
        '-movflags +faststart',
        `-threads ${quality.threads}`,
    ];
}

export interface FFmpegRendererOptions {
    /** ffmpeg is killed when a render runs longer than this */
    timeoutMs?: number;
}

/**
 * Renders compositions locally using FFmpeg.
 * Requires 'ffmpeg' to be installed in the system.
 */
export class FFmpegVideoRenderer implements IVideoRenderer {
    private readonly timeoutSeconds?: number;

    constructor(options: FFmpegRendererOptions = {}) {
        if (options.timeoutMs && options.timeoutMs > 0) {
            this.timeoutSeconds = Math.ceil(options.timeoutMs / 1000);
        }
    }

    async render(request: RenderRequest): Promise<RenderResult> {
        const { spec, workDir, outputPath, quality } = request;

        const captions = captionLayer(spec);
        const subtitlesPath = captions && captions.events.length > 0
            ? await writeAssFile(path.join(workDir, 'captions.ass'), captions.events, spec.resolution)
            : null;

        const graph = buildRenderGraph(spec, subtitlesPath);
        console.log(`[FFmpeg] Rendering ${spec.variant} video (${seconds(spec.durationSeconds)}s, crf ${quality.crf}, ${quality.preset})`);
        await this.run(graph, buildOutputOptions(spec, quality), outputPath);

        return { outputPath };
    }

    private run(graph: RenderGraph, outputOptions: string[], outputPath: string): Promise<void> {
        return new Promise((resolve, reject) => {
            const cmd = this.timeoutSeconds ? ffmpeg({ timeout: this.timeoutSeconds }) : ffmpeg();

            for (const input of graph.inputs) {
                cmd.input(input.path);
                if (input.options.length > 0) {
                    cmd.inputOptions(input.options);
                }
            }

            cmd.complexFilter(graph.filters)
                .outputOptions(outputOptions)
                .output(outputPath)
                .on('start', (commandLine: string) => {
                    console.log(`[FFmpeg] Spawned: ${commandLine}`);
                })
                .on('end', () => resolve())
                .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
                    const detail = stderr ? `\n${stderr.split('\n').slice(-5).join('\n')}` : '';
                    reject(new Error(`FFmpeg failed: ${err.message}${detail}`));
                })
                .run();
        });
    }
}
