/**
 * IMediaLibrary - an enumerable pool of read-only media files,
 * such as one gameplay category's clips or the music set.
 * Implementations: DirectoryMediaLibrary
 */
export interface IMediaLibrary {
    /** Paths of the available files; empty when the pool has none */
    list(): Promise<string[]>;
}
