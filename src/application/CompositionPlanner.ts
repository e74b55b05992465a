import { InvalidCompositionError } from '../domain/errors/VideoJobError';
import { OverlayRole, VideoVariant } from '../domain/entities/VideoJob';
import { CaptionEvent } from '../domain/entities/Transcript';
import {
    AudioTrack,
    ClipWindow,
    CompositionSpec,
    OverlayImageLayer,
    Resolution,
    TimeWindow,
    VERTICAL_1080P,
    VisualLayer,
} from '../domain/entities/CompositionSpec';

/** Seconds each overlay image stays on screen */
export const OVERLAY_SECONDS = 5;

export const MIX_LEVELS = {
    narration: 1.5,
    music: 0.8,
    soundEffect: 5.0,
} as const;

export interface PlannedOverlay {
    role: OverlayRole;
    window: TimeWindow;
}

export interface PlanInput {
    variant: VideoVariant;
    durationSeconds: number;
    narrationPath: string;
    images: Partial<Record<OverlayRole, string>>;
    captions: readonly CaptionEvent[];
    clipPath: string;
    clipWindow: ClipWindow;
    musicPath: string | null;
    popupSoundPath: string | null;
    resolution?: Resolution;
}

/**
 * Raw overlay windows for a layout, before clamping and overlap resolution.
 */
export function layoutWindows(variant: VideoVariant, total: number): PlannedOverlay[] {
    if (variant === 'standard') {
        return [
            { role: 'intro', window: { start: 5, end: 10 } },
            { role: 'outro', window: { start: total - 10, end: total - 5 } },
        ];
    }

    const middle = total / 2;
    return [
        { role: 'reddit_post', window: { start: 1, end: 6 } },
        { role: 'first_image', window: { start: middle - OVERLAY_SECONDS / 2, end: middle + OVERLAY_SECONDS / 2 } },
        { role: 'second_image', window: { start: total - 10, end: total - 5 } },
    ];
}

/**
 * Clamps a window into [0, total]. A window that would start before zero
 * keeps its end (clamped) and starts at zero; one that ends past the total is cut.
 */
export function clampWindow(window: TimeWindow, total: number): TimeWindow {
    const start = Math.min(Math.max(0, window.start), total);
    const end = Math.min(Math.max(start, window.end), total);
    return { start, end };
}

function overlaps(a: TimeWindow, b: TimeWindow): boolean {
    return a.start < b.end && b.start < a.end;
}

/**
 * Clamps every window, then moves each one that collides with an earlier
 * overlay to the earliest non-overlapping start at or after its own start.
 * Overlays keep their order; windows pushed past the end shrink, possibly to zero.
 */
export function resolveOverlayWindows(overlays: readonly PlannedOverlay[], total: number): PlannedOverlay[] {
    const resolved: PlannedOverlay[] = [];

    for (const overlay of overlays) {
        const clamped = clampWindow(overlay.window, total);
        const length = clamped.end - clamped.start;

        const candidates = [clamped.start, ...resolved.map((r) => r.window.end)]
            .filter((start) => start >= clamped.start)
            .sort((a, b) => a - b);

        let placed: TimeWindow = { start: total, end: total };
        for (const start of candidates) {
            const window = clampWindow({ start, end: start + length }, total);
            if (!resolved.some((r) => overlaps(r.window, window))) {
                placed = window;
                break;
            }
        }

        resolved.push({ role: overlay.role, window: placed });
    }

    return resolved;
}

/**
 * Builds the immutable composition spec for one render. Performs no I/O.
 */
export class CompositionPlanner {
    plan(input: PlanInput): CompositionSpec {
        const total = input.durationSeconds;
        if (!Number.isFinite(total) || total <= 0) {
            throw new InvalidCompositionError(`Total duration must be positive, got ${total}`);
        }

        const overlays = resolveOverlayWindows(layoutWindows(input.variant, total), total)
            .filter((overlay) => overlay.window.end > overlay.window.start);

        const overlayLayers: OverlayImageLayer[] = [];
        for (const overlay of overlays) {
            const imagePath = input.images[overlay.role];
            if (!imagePath) {
                throw new InvalidCompositionError(`Missing image for overlay "${overlay.role}"`);
            }
            overlayLayers.push({ kind: 'overlay_image', role: overlay.role, imagePath, window: overlay.window });
        }

        const layers: VisualLayer[] = [
            {
                kind: 'background',
                clipPath: input.clipPath,
                window: { ...input.clipWindow, durationSeconds: total },
            },
        ];
        if (input.captions.length > 0) {
            layers.push({ kind: 'captions', events: input.captions.map((event) => ({ ...event })) });
        }
        layers.push(...overlayLayers);

        const audioTracks: AudioTrack[] = [
            { kind: 'narration', path: input.narrationPath, volume: MIX_LEVELS.narration, startSeconds: 0, loop: false },
        ];
        if (input.musicPath) {
            audioTracks.push({ kind: 'music', path: input.musicPath, volume: MIX_LEVELS.music, startSeconds: 0, loop: true });
        }
        if (input.popupSoundPath) {
            for (const overlay of overlayLayers) {
                audioTracks.push({
                    kind: 'sound_effect',
                    path: input.popupSoundPath,
                    volume: MIX_LEVELS.soundEffect,
                    startSeconds: overlay.window.start,
                    loop: false,
                });
            }
        }

        return deepFreeze({
            variant: input.variant,
            durationSeconds: total,
            resolution: { ...(input.resolution ?? VERTICAL_1080P) },
            layers,
            audioTracks,
        });
    }
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
