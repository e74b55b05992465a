import { Router, Request, Response, NextFunction } from 'express';
import fs from 'fs/promises';
import path from 'path';
import { OutputFileTracker } from '../../application/OutputFileTracker';
import { VideoExpiredError } from '../../domain/errors/VideoJobError';
import { asyncHandler, NotFoundError } from '../middleware/errorHandler';

function isPlainFilename(filename: string): boolean {
    return filename.length > 0 && !/[\\/]/.test(filename) && filename !== '.' && filename !== '..';
}

/**
 * Creates routes serving finished videos from the output directory.
 */
export function createOutputRoutes(outputDir: string, tracker: OutputFileTracker): Router {
    const router = Router();
    const root = path.resolve(outputDir);

    /**
     * GET /videos/:filename
     *
     * Streams a finished video (range requests supported).
     * 410 once retention removed it.
     */
    router.get(
        '/videos/:filename',
        asyncHandler(async (req: Request, res: Response, next: NextFunction) => {
            const { filename } = req.params;
            if (!isPlainFilename(filename)) {
                throw new NotFoundError(`Video not found: ${filename}`);
            }
            if (tracker.isExpired(filename)) {
                throw new VideoExpiredError(filename);
            }

            const stats = await fs.stat(path.join(root, filename)).catch(() => null);
            if (!stats || !stats.isFile()) {
                throw new NotFoundError(`Video not found: ${filename}`);
            }

            res.sendFile(filename, { root, acceptRanges: true }, (err?: Error) => {
                if (err && !res.headersSent) {
                    next(err);
                }
            });
        })
    );

    return router;
}
