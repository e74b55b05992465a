import { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { IMediaLibrary } from '../../domain/ports/IMediaLibrary';

export const CLIP_EXTENSIONS: readonly string[] = ['.webm', '.mp4', '.mov'];
export const MUSIC_EXTENSIONS: readonly string[] = ['.mp3'];

function isMissing(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Media pool backed by one directory. The directory is re-read on every
 * call, so files dropped in at runtime become available immediately.
 */
export class DirectoryMediaLibrary implements IMediaLibrary {
    constructor(
        readonly directory: string,
        private readonly extensions: readonly string[]
    ) { }

    async list(): Promise<string[]> {
        let entries: Dirent[];
        try {
            entries = await fs.readdir(this.directory, { withFileTypes: true });
        } catch (error: unknown) {
            if (isMissing(error)) {
                return [];
            }
            throw error;
        }

        return entries
            .filter((entry) => entry.isFile() && this.extensions.includes(path.extname(entry.name).toLowerCase()))
            .map((entry) => path.join(this.directory, entry.name))
            .sort();
    }
}

/**
 * One clip library per sub-directory of `backgroundDir`, keyed by directory name.
 */
export async function createCategoryRegistry(backgroundDir: string): Promise<Map<string, IMediaLibrary>> {
    const registry = new Map<string, IMediaLibrary>();

    let entries: Dirent[];
    try {
        entries = await fs.readdir(backgroundDir, { withFileTypes: true });
    } catch (error: unknown) {
        if (isMissing(error)) {
            console.warn(`[Media] Background directory ${backgroundDir} does not exist; no categories registered`);
            return registry;
        }
        throw error;
    }

    for (const entry of entries) {
        if (entry.isDirectory()) {
            registry.set(entry.name, new DirectoryMediaLibrary(path.join(backgroundDir, entry.name), CLIP_EXTENSIONS));
        }
    }
    return registry;
}
