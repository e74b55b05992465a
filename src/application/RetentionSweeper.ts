/**
 * RetentionSweeper - timer-driven removal of expired outputs.
 *
 * Each pass deletes tracked outputs older than the retention window and
 * orphaned temp entries older than the temp cutoff. Names of deleted outputs
 * are remembered as expired for one further retention window.
 */
import fs from 'fs/promises';
import path from 'path';
import { OutputFileTracker } from './OutputFileTracker';
import { errorMessage } from '../domain/errors/VideoJobError';

export interface RetentionSweeperConfig {
    retentionMinutes: number;
    intervalSeconds: number;
    /** Directory holding per-job temp directories; omitted = no temp sweep */
    tempDir?: string;
    tempFileMaxAgeMinutes: number;
}

export interface SweepResult {
    deleted: string[];
    skipped: { filePath: string; error: string }[];
    orphansRemoved: string[];
}

const DEFAULT_CONFIG: RetentionSweeperConfig = {
    retentionMinutes: 1440,
    intervalSeconds: 60,
    tempFileMaxAgeMinutes: 60,
};

export class RetentionSweeper {
    private readonly config: RetentionSweeperConfig;
    private timer: NodeJS.Timeout | null = null;
    private activeSweep: Promise<SweepResult> | null = null;

    constructor(
        private readonly tracker: OutputFileTracker,
        config?: Partial<RetentionSweeperConfig>,
        private readonly now: () => number = Date.now
    ) {
        this.config = { ...DEFAULT_CONFIG, ...config };
    }

    start(): void {
        if (this.timer) {
            return;
        }
        this.timer = setInterval(() => {
            this.sweep().catch((error: unknown) => {
                console.error('[Sweeper] Sweep failed:', error);
            });
        }, this.config.intervalSeconds * 1000);
        this.timer.unref();
        console.log(`[Sweeper] Started (retention ${this.config.retentionMinutes} min, every ${this.config.intervalSeconds}s)`);
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
            console.log('[Sweeper] Stopped');
        }
    }

    isRunning(): boolean {
        return this.timer !== null;
    }

    hasRetentionElapsed(createdAt: Date): boolean {
        return this.now() - createdAt.getTime() > this.retentionMs();
    }

    private retentionMs(): number {
        return this.config.retentionMinutes * 60 * 1000;
    }

    /**
     * Runs one pass. Overlapping calls share the pass already in progress.
     */
    sweep(): Promise<SweepResult> {
        if (!this.activeSweep) {
            this.activeSweep = this.runPass().finally(() => {
                this.activeSweep = null;
            });
        }
        return this.activeSweep;
    }

    private async runPass(): Promise<SweepResult> {
        const result: SweepResult = { deleted: [], skipped: [], orphansRemoved: [] };

        for (const output of this.tracker.list()) {
            if (!this.hasRetentionElapsed(output.createdAt)) {
                continue;
            }
            try {
                await fs.unlink(output.filePath);
                this.tracker.markExpired(output.filePath, new Date(this.now()));
                result.deleted.push(output.filePath);
            } catch (error: unknown) {
                if (isErrorCode(error, 'ENOENT')) {
                    // Already gone: nothing left to retry.
                    this.tracker.markExpired(output.filePath, new Date(this.now()));
                    result.deleted.push(output.filePath);
                    console.warn(`[Sweeper] ${output.filePath} was already removed`);
                    continue;
                }
                result.skipped.push({ filePath: output.filePath, error: errorMessage(error) });
                console.warn(`[Sweeper] Could not delete ${output.filePath}, will retry next pass: ${errorMessage(error)}`);
            }
        }

        this.tracker.forgetExpiredBefore(new Date(this.now() - this.retentionMs()));

        if (this.config.tempDir) {
            result.orphansRemoved = await this.removeOrphanedTemp(this.config.tempDir);
        }

        if (result.deleted.length > 0 || result.orphansRemoved.length > 0) {
            console.log(`[Sweeper] Removed ${result.deleted.length} expired videos, ${result.orphansRemoved.length} orphaned temp entries`);
        }
        return result;
    }

    private async removeOrphanedTemp(tempDir: string): Promise<string[]> {
        const removed: string[] = [];
        let names: string[];
        try {
            names = await fs.readdir(tempDir);
        } catch (error: unknown) {
            if (!isErrorCode(error, 'ENOENT')) {
                console.warn(`[Sweeper] Cannot read temp directory ${tempDir}: ${errorMessage(error)}`);
            }
            return removed;
        }

        const cutoff = this.config.tempFileMaxAgeMinutes * 60 * 1000;
        for (const name of names) {
            const entryPath = path.join(tempDir, name);
            try {
                const stats = await fs.stat(entryPath);
                if (this.now() - stats.mtimeMs > cutoff) {
                    await fs.rm(entryPath, { recursive: true, force: true });
                    removed.push(entryPath);
                }
            } catch (error: unknown) {
                console.warn(`[Sweeper] Skipping temp entry ${entryPath}: ${errorMessage(error)}`);
            }
        }
        return removed;
    }
}

function isErrorCode(error: unknown, code: string): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
