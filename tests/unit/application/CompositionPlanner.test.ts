import {
    CompositionPlanner,
    PlanInput,
    clampWindow,
    layoutWindows,
    resolveOverlayWindows,
} from '../../../src/application/CompositionPlanner';
import { InvalidCompositionError } from '../../../src/domain/errors/VideoJobError';
import { backgroundLayer, captionLayer, overlayLayers } from '../../../src/domain/entities/CompositionSpec';

function standardInput(durationSeconds: number): PlanInput {
    return {
        variant: 'standard',
        durationSeconds,
        narrationPath: '/work/narration.mp3',
        images: { intro: '/work/intro.png', outro: '/work/outro.png' },
        captions: [{ text: 'hello', start: 0, end: 0.5 }],
        clipPath: '/bg/minecraft/clip.mp4',
        clipWindow: { offsetSeconds: 12, durationSeconds, loop: false },
        musicPath: '/music/track.mp3',
        popupSoundPath: '/sounds/popup.mp3',
    };
}

function redditInput(durationSeconds: number): PlanInput {
    return {
        ...standardInput(durationSeconds),
        variant: 'reddit',
        images: {
            reddit_post: '/work/reddit_post.png',
            first_image: '/work/first_image.png',
            second_image: '/work/second_image.png',
        },
    };
}

describe('CompositionPlanner', () => {
    const planner = new CompositionPlanner();

    describe('standard variant', () => {
        it('should place intro at 5-10s and outro 10s before the end', () => {
            const spec = planner.plan(standardInput(30));

            expect(overlayLayers(spec).map((layer) => [layer.role, layer.window])).toEqual([
                ['intro', { start: 5, end: 10 }],
                ['outro', { start: 20, end: 25 }],
            ]);
        });

        it('should clamp windows for an 8 second narration', () => {
            const spec = planner.plan(standardInput(8));
            const windows = overlayLayers(spec).map((layer) => layer.window);

            expect(windows).toEqual([
                { start: 5, end: 8 },
                { start: 0, end: 3 },
            ]);
            windows.forEach((window) => {
                expect(window.start).toBeGreaterThanOrEqual(0);
                expect(window.end).toBeLessThanOrEqual(8);
            });
        });

        it('should drop overlays that collapse to nothing', () => {
            const spec = planner.plan(standardInput(3));

            expect(overlayLayers(spec)).toEqual([]);
            expect(spec.audioTracks.map((track) => track.kind)).toEqual(['narration', 'music']);
        });
    });

    describe('reddit variant', () => {
        it('should resolve a 20 second narration without overlapping overlays', () => {
            const spec = planner.plan(redditInput(20));
            const layers = overlayLayers(spec);

            expect(layers.map((layer) => [layer.role, layer.window])).toEqual([
                ['reddit_post', { start: 1, end: 6 }],
                ['first_image', { start: 7.5, end: 12.5 }],
                ['second_image', { start: 12.5, end: 17.5 }],
            ]);
            for (let i = 0; i < layers.length; i++) {
                for (let j = i + 1; j < layers.length; j++) {
                    const a = layers[i].window;
                    const b = layers[j].window;
                    expect(a.start < b.end && b.start < a.end).toBe(false);
                }
            }
        });

        it('should schedule a popup at each overlay start', () => {
            const spec = planner.plan(redditInput(20));

            expect(spec.audioTracks).toEqual([
                { kind: 'narration', path: '/work/narration.mp3', volume: 1.5, startSeconds: 0, loop: false },
                { kind: 'music', path: '/music/track.mp3', volume: 0.8, startSeconds: 0, loop: true },
                { kind: 'sound_effect', path: '/sounds/popup.mp3', volume: 5, startSeconds: 1, loop: false },
                { kind: 'sound_effect', path: '/sounds/popup.mp3', volume: 5, startSeconds: 7.5, loop: false },
                { kind: 'sound_effect', path: '/sounds/popup.mp3', volume: 5, startSeconds: 12.5, loop: false },
            ]);
        });
    });

    describe('layers', () => {
        it('should order background, captions, then overlays', () => {
            const spec = planner.plan(standardInput(30));

            expect(spec.layers.map((layer) => layer.kind)).toEqual(['background', 'captions', 'overlay_image', 'overlay_image']);
            expect(backgroundLayer(spec)).toEqual({
                kind: 'background',
                clipPath: '/bg/minecraft/clip.mp4',
                window: { offsetSeconds: 12, durationSeconds: 30, loop: false },
            });
            expect(spec.resolution).toEqual({ width: 1080, height: 1920 });
            expect(spec.durationSeconds).toBe(30);
        });

        it('should omit the caption layer when there are no captions', () => {
            const spec = planner.plan({ ...standardInput(30), captions: [] });

            expect(captionLayer(spec)).toBeUndefined();
        });

        it('should omit music and popups when none are available', () => {
            const spec = planner.plan({ ...standardInput(30), musicPath: null, popupSoundPath: null });

            expect(spec.audioTracks.map((track) => track.kind)).toEqual(['narration']);
        });

        it('should return an immutable spec', () => {
            const spec = planner.plan(standardInput(30));

            expect(Object.isFrozen(spec)).toBe(true);
            expect(Object.isFrozen(spec.layers)).toBe(true);
            expect(Object.isFrozen(spec.audioTracks[0])).toBe(true);
        });
    });

    describe('invalid input', () => {
        it.each([0, -4, Number.NaN])('should reject a total duration of %p', (duration) => {
            expect(() => planner.plan(standardInput(duration))).toThrow(InvalidCompositionError);
        });

        it('should report planning failures with the PlanningError code', () => {
            expect(() => planner.plan(standardInput(0))).toThrow('Total duration must be positive, got 0');
            expect(new InvalidCompositionError('x').code).toBe('PlanningError');
        });

        it('should reject a missing overlay image', () => {
            expect(() => planner.plan({ ...standardInput(30), images: { intro: '/work/intro.png' } }))
                .toThrow('Missing image for overlay "outro"');
        });
    });

    describe('window helpers', () => {
        it('should compute raw reddit windows around the midpoint', () => {
            expect(layoutWindows('reddit', 20)).toEqual([
                { role: 'reddit_post', window: { start: 1, end: 6 } },
                { role: 'first_image', window: { start: 7.5, end: 12.5 } },
                { role: 'second_image', window: { start: 10, end: 15 } },
            ]);
        });

        it('should never produce a negative-length window', () => {
            expect(clampWindow({ start: -2, end: 3 }, 8)).toEqual({ start: 0, end: 3 });
            expect(clampWindow({ start: 5, end: 10 }, 3)).toEqual({ start: 3, end: 3 });
            expect(clampWindow({ start: -7, end: -2 }, 3)).toEqual({ start: 0, end: 0 });
        });

        it('should shift a colliding window to the end of the one it hits', () => {
            expect(resolveOverlayWindows([
                { role: 'intro', window: { start: 2, end: 6 } },
                { role: 'outro', window: { start: 4, end: 8 } },
            ], 20)).toEqual([
                { role: 'intro', window: { start: 2, end: 6 } },
                { role: 'outro', window: { start: 6, end: 10 } },
            ]);
        });
    });
});
