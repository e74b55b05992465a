import path from 'path';

/**
 * A finished video on disk, owned by the retention sweeper.
 */
export interface TrackedOutput {
    jobId: string;
    filePath: string;
    createdAt: Date;
}

/**
 * Store of finished outputs awaiting retention expiry. It is the only state
 * shared between the job pipeline (which adds) and the sweeper (which removes).
 */
export class OutputFileTracker {
    private readonly outputs: Map<string, TrackedOutput> = new Map();
    /** Filenames removed by retention, with the time of removal */
    private readonly expired: Map<string, Date> = new Map();

    track(jobId: string, filePath: string, createdAt: Date = new Date()): TrackedOutput {
        const output: TrackedOutput = { jobId, filePath, createdAt };
        this.outputs.set(filePath, output);
        this.expired.delete(path.basename(filePath));
        return output;
    }

    list(): TrackedOutput[] {
        return Array.from(this.outputs.values());
    }

    get(filePath: string): TrackedOutput | undefined {
        return this.outputs.get(filePath);
    }

    /**
     * Drops the tracking record after the file was removed by retention.
     */
    markExpired(filePath: string, at: Date = new Date()): void {
        this.outputs.delete(filePath);
        this.expired.set(path.basename(filePath), at);
    }

    isExpired(filename: string): boolean {
        return this.expired.has(filename);
    }

    /**
     * Forgets expired filenames removed before `cutoff`; they then read as unknown.
     */
    forgetExpiredBefore(cutoff: Date): void {
        for (const [filename, expiredAt] of this.expired) {
            if (expiredAt.getTime() < cutoff.getTime()) {
                this.expired.delete(filename);
            }
        }
    }

    size(): number {
        return this.outputs.size;
    }
}
