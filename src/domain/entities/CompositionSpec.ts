import { VideoVariant, OverlayRole } from './VideoJob';
import { CaptionEvent } from './Transcript';

/**
 * A [start, end] window in seconds of output time.
 */
export interface TimeWindow {
    readonly start: number;
    readonly end: number;
}

/**
 * The part of a background clip used for one render.
 */
export interface ClipWindow {
    /** Offset into the source clip where the window begins */
    readonly offsetSeconds: number;
    /** Length of output time the background must cover */
    readonly durationSeconds: number;
    /** True when the clip is shorter than the output and replays from its start */
    readonly loop: boolean;
}

export interface BackgroundLayer {
    readonly kind: 'background';
    readonly clipPath: string;
    readonly window: ClipWindow;
}

export interface CaptionLayer {
    readonly kind: 'captions';
    readonly events: readonly CaptionEvent[];
}

export interface OverlayImageLayer {
    readonly kind: 'overlay_image';
    readonly role: OverlayRole;
    readonly imagePath: string;
    readonly window: TimeWindow;
}

export type VisualLayer = BackgroundLayer | CaptionLayer | OverlayImageLayer;

export type AudioTrackKind = 'narration' | 'music' | 'sound_effect';

export interface AudioTrack {
    readonly kind: AudioTrackKind;
    readonly path: string;
    /** Linear gain applied before mixing */
    readonly volume: number;
    /** Output time at which the track starts */
    readonly startSeconds: number;
    /** Replay the source until the output ends */
    readonly loop: boolean;
}

export interface Resolution {
    readonly width: number;
    readonly height: number;
}

/**
 * Declarative description of one render, handed to the encoder.
 * Visual layers are ordered bottom to top.
 */
export interface CompositionSpec {
    readonly variant: VideoVariant;
    readonly durationSeconds: number;
    readonly resolution: Resolution;
    readonly layers: readonly VisualLayer[];
    readonly audioTracks: readonly AudioTrack[];
}

export const VERTICAL_1080P: Resolution = { width: 1080, height: 1920 };

export function overlayLayers(spec: CompositionSpec): OverlayImageLayer[] {
    return spec.layers.filter((layer): layer is OverlayImageLayer => layer.kind === 'overlay_image');
}

export function captionLayer(spec: CompositionSpec): CaptionLayer | undefined {
    return spec.layers.find((layer): layer is CaptionLayer => layer.kind === 'captions');
}

export function backgroundLayer(spec: CompositionSpec): BackgroundLayer | undefined {
    return spec.layers.find((layer): layer is BackgroundLayer => layer.kind === 'background');
}
