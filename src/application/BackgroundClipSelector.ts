import { CategoryNotFoundError } from '../domain/errors/VideoJobError';
import { ClipWindow } from '../domain/entities/CompositionSpec';
import { IMediaLibrary } from '../domain/ports/IMediaLibrary';

export interface BackgroundSelection {
    category: string;
    clipPath: string;
    /** null when no music is available; the video is then rendered without music */
    musicPath: string | null;
}

/**
 * Picks a gameplay clip for a category and a music track from the shared set.
 * Categories are registered by name, so adding one needs no code change here.
 * Selections are independent per call; several jobs may share a clip.
 */
export class BackgroundClipSelector {
    private readonly categories: Map<string, IMediaLibrary>;
    private readonly music: IMediaLibrary | null;
    private readonly random: () => number;

    constructor(
        categories: Map<string, IMediaLibrary> = new Map(),
        music: IMediaLibrary | null = null,
        random: () => number = Math.random
    ) {
        this.categories = new Map(categories);
        this.music = music;
        this.random = random;
    }

    register(category: string, library: IMediaLibrary): void {
        this.categories.set(category, library);
    }

    listCategories(): string[] {
        return Array.from(this.categories.keys()).sort();
    }

    async select(category: string): Promise<BackgroundSelection> {
        const library = this.categories.get(category);
        if (!library) {
            throw new CategoryNotFoundError(category);
        }

        const clips = await library.list();
        if (clips.length === 0) {
            throw new CategoryNotFoundError(category, 'no clips available');
        }

        const tracks = this.music ? await this.music.list() : [];
        if (tracks.length === 0) {
            console.warn('No background music available. Video will be rendered without music.');
        }

        return {
            category,
            clipPath: this.pick(clips),
            musicPath: tracks.length > 0 ? this.pick(tracks) : null,
        };
    }

    /**
     * Chooses which part of a clip covers the narration. A long enough clip
     * gets a random offset with the window fully inside it; a shorter clip
     * starts at zero and loops.
     */
    selectWindow(clipDurationSeconds: number, narrationDurationSeconds: number): ClipWindow {
        if (!(clipDurationSeconds > narrationDurationSeconds)) {
            return { offsetSeconds: 0, durationSeconds: narrationDurationSeconds, loop: true };
        }
        const maxOffset = clipDurationSeconds - narrationDurationSeconds;
        return {
            offsetSeconds: this.random() * maxOffset,
            durationSeconds: narrationDurationSeconds,
            loop: false,
        };
    }

    private pick(paths: string[]): string {
        const index = Math.min(paths.length - 1, Math.floor(this.random() * paths.length));
        return paths[index];
    }
}
