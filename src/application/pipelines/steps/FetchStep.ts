/**
 * Fetch step - selects the background and materializes every input in the work directory.
 */

import fs from 'fs/promises';
import path from 'path';
import { PipelineStep, JobContext, toStageError } from '../PipelineInfrastructure';
import { AssetCache, cacheKey } from '../../AssetCache';
import { BackgroundClipSelector } from '../../BackgroundClipSelector';
import { IAssetSource } from '../../../domain/ports/IAssetSource';
import { IMediaProbe } from '../../../domain/ports/IMediaProbe';
import { OverlayRole, overlayImageUrls } from '../../../domain/entities/VideoJob';
import { withTimeout } from '../../../infrastructure/resilience/RetryUtils';

const OVERLAY_ROLES: readonly OverlayRole[] = ['intro', 'outro', 'reddit_post', 'first_image', 'second_image'];

const MIME_EXTENSIONS: Record<string, string> = {
    'audio/mpeg': '.mp3',
    'audio/mp3': '.mp3',
    'audio/wav': '.wav',
    'audio/x-wav': '.wav',
    'audio/ogg': '.ogg',
    'audio/mp4': '.m4a',
    'image/png': '.png',
    'image/jpeg': '.jpg',
    'image/webp': '.webp',
    'image/gif': '.gif',
};

/**
 * File extension for a locator, so the encoder can detect the format.
 */
export function extensionFor(locator: string, fallback: string): string {
    if (locator.startsWith('data:')) {
        const mime = locator.slice(5).split(/[;,]/)[0].toLowerCase();
        return MIME_EXTENSIONS[mime] ?? fallback;
    }

    let pathname = locator;
    if (/^https?:\/\//i.test(locator)) {
        try {
            pathname = new URL(locator).pathname;
        } catch {
            return fallback;
        }
    }
    const ext = path.extname(pathname).toLowerCase();
    return /^\.[a-z0-9]{1,5}$/.test(ext) ? ext : fallback;
}

export class FetchStep implements PipelineStep {
    readonly name = 'Fetching';
    readonly status = 'fetching';

    constructor(
        private readonly selector: BackgroundClipSelector,
        private readonly assetCache: AssetCache<Buffer>,
        private readonly assetSource: IAssetSource,
        private readonly probe: IMediaProbe,
        private readonly fetchTimeoutMs: number
    ) { }

    async execute(context: JobContext): Promise<JobContext> {
        try {
            return await this.fetchAll(context);
        } catch (error: unknown) {
            throw toStageError('AssetFetchError', error);
        }
    }

    private async fetchAll(context: JobContext): Promise<JobContext> {
        const { input } = context.job;
        const selection = await this.selector.select(input.gameplayType);

        const urls = overlayImageUrls(input);
        const roles: OverlayRole[] = [];
        const wanted = [{ name: 'narration', locator: input.audioUrl, fallbackExt: '.mp3' }];
        for (const role of OVERLAY_ROLES) {
            const locator = urls[role];
            if (locator) {
                roles.push(role);
                wanted.push({ name: role, locator, fallbackExt: '.png' });
            }
        }

        // Settle every fetch before failing so each acquired lease is recorded for release.
        const settled = await Promise.allSettled(wanted.map((asset) => this.acquire(context, asset.locator)));
        const payloads: Buffer[] = [];
        for (const result of settled) {
            if (result.status === 'rejected') {
                throw result.reason;
            }
            payloads.push(result.value);
        }

        const written = await Promise.all(
            wanted.map(async (asset, index) => {
                const filePath = path.join(context.workDir, `${asset.name}${extensionFor(asset.locator, asset.fallbackExt)}`);
                await fs.writeFile(filePath, payloads[index]);
                return filePath;
            })
        );

        const narrationPath = written[0];
        const imagePaths: Partial<Record<OverlayRole, string>> = {};
        roles.forEach((role, index) => {
            imagePaths[role] = written[index + 1];
        });

        const durationSeconds = await this.probe.getDurationSeconds(narrationPath);
        const clipDuration = await this.probe.getDurationSeconds(selection.clipPath);
        const clipWindow = this.selector.selectWindow(clipDuration, durationSeconds);

        console.log(
            `[${context.jobId}] Narration ${durationSeconds.toFixed(2)}s, clip ${path.basename(selection.clipPath)} ` +
            `from ${clipWindow.offsetSeconds.toFixed(2)}s${clipWindow.loop ? ' (looped)' : ''}`
        );

        return {
            ...context,
            selection,
            narrationAudio: payloads[0],
            narrationPath,
            imagePaths,
            durationSeconds,
            clipWindow,
        };
    }

    private async acquire(context: JobContext, locator: string): Promise<Buffer> {
        const lease = await this.assetCache.getOrFetch(cacheKey(locator), () =>
            withTimeout((signal) => this.assetSource.fetch(locator, { signal }), this.fetchTimeoutMs, 'Asset fetch')
        );
        context.leases.push(lease);
        return lease.payload;
    }
}
