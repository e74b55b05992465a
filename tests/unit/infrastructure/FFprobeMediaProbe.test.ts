const mockFfprobe = jest.fn();

jest.mock('fluent-ffmpeg', () => ({
    ffprobe: (...args: unknown[]) => mockFfprobe(...args),
}));

import { FFprobeMediaProbe } from '../../../src/infrastructure/media/FFprobeMediaProbe';

type ProbeCallback = (err: Error | null, data: unknown) => void;

describe('FFprobeMediaProbe', () => {
    const probe = new FFprobeMediaProbe();

    beforeEach(() => {
        mockFfprobe.mockReset();
    });

    it('should resolve the container duration', async () => {
        mockFfprobe.mockImplementation((_file: string, callback: ProbeCallback) => {
            callback(null, { format: { duration: 12.48 }, streams: [] });
        });

        await expect(probe.getDurationSeconds('/work/narration.mp3')).resolves.toBe(12.48);
        expect(mockFfprobe).toHaveBeenCalledWith('/work/narration.mp3', expect.any(Function));
    });

    it('should reject when ffprobe fails', async () => {
        mockFfprobe.mockImplementation((_file: string, callback: ProbeCallback) => {
            callback(new Error('Invalid data found when processing input'), undefined);
        });

        await expect(probe.getDurationSeconds('/work/broken.mp3'))
            .rejects.toThrow('ffprobe failed for /work/broken.mp3: Invalid data found when processing input');
    });

    it.each([undefined, 'N/A', 0])('should reject an unusable duration (%p)', async (duration) => {
        mockFfprobe.mockImplementation((_file: string, callback: ProbeCallback) => {
            callback(null, { format: { duration }, streams: [] });
        });

        await expect(probe.getDurationSeconds('/work/odd.mp3')).rejects.toThrow('Could not determine duration of /work/odd.mp3');
    });
});
