/**
 * IMediaProbe - Port for reading media metadata.
 * Implementations: FFprobeMediaProbe
 */
export interface IMediaProbe {
    /** Duration of an audio or video file in seconds */
    getDurationSeconds(filePath: string): Promise<number>;
}
