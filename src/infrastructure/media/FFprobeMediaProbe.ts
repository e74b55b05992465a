import ffmpeg from 'fluent-ffmpeg';
import { IMediaProbe } from '../../domain/ports/IMediaProbe';

/**
 * Reads media durations with ffprobe (via fluent-ffmpeg).
 */
export class FFprobeMediaProbe implements IMediaProbe {
    getDurationSeconds(filePath: string): Promise<number> {
        return new Promise((resolve, reject) => {
            ffmpeg.ffprobe(filePath, (err, data) => {
                if (err) {
                    reject(new Error(`ffprobe failed for ${filePath}: ${err.message}`));
                    return;
                }
                const duration = Number(data.format.duration);
                if (!Number.isFinite(duration) || duration <= 0) {
                    reject(new Error(`Could not determine duration of ${filePath}`));
                    return;
                }
                resolve(duration);
            });
        });
    }
}
