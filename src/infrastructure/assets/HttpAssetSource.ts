import axios from 'axios';
import fs from 'fs/promises';
import path from 'path';
import { AssetFetchOptions, IAssetSource } from '../../domain/ports/IAssetSource';
import { withRetry, isRetryableHttpError } from '../resilience/RetryUtils';

export interface HttpAssetSourceOptions {
    /** Per-request timeout (ms) */
    timeoutMs?: number;
    /** Attempts for transient HTTP failures */
    maxAttempts?: number;
    initialBackoffMs?: number;
    /** Directory local paths are resolved in; local paths are refused when unset */
    localRoot?: string;
}

/**
 * Decodes a data: URL (base64 or percent-encoded).
 */
export function decodeDataUrl(locator: string): Buffer {
    const match = locator.match(/^data:([^,]*),(.*)$/s);
    if (!match) {
        throw new Error('Invalid data URL');
    }
    const [, meta, payload] = match;
    if (meta.split(';').includes('base64')) {
        return Buffer.from(payload, 'base64');
    }
    return Buffer.from(decodeURIComponent(payload), 'utf-8');
}

/**
 * True when `target` is `root` itself or lies inside it.
 */
function isWithin(root: string, target: string): boolean {
    const relative = path.relative(root, target);
    return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Asset source for http(s) URLs, data: URLs and files under a local asset directory.
 * HTTP downloads retry network errors, 429 and 5xx with exponential backoff.
 */
export class HttpAssetSource implements IAssetSource {
    private readonly timeoutMs: number;
    private readonly maxAttempts: number;
    private readonly initialBackoffMs: number;
    private readonly localRoot: string | null;

    constructor(options: HttpAssetSourceOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? 60000;
        this.maxAttempts = options.maxAttempts ?? 3;
        this.initialBackoffMs = options.initialBackoffMs ?? 1000;
        this.localRoot = options.localRoot ? path.resolve(options.localRoot) : null;
    }

    async fetch(locator: string, options: AssetFetchOptions = {}): Promise<Buffer> {
        const payload = await this.read(locator, options.signal);
        if (payload.length === 0) {
            throw new Error(`Asset is empty: ${describeLocator(locator)}`);
        }
        return payload;
    }

    private async read(locator: string, signal?: AbortSignal): Promise<Buffer> {
        if (locator.startsWith('data:')) {
            return decodeDataUrl(locator);
        }
        if (/^https?:\/\//i.test(locator)) {
            return this.download(locator, signal);
        }
        return this.readLocal(locator, signal);
    }

    /**
     * Reads a file that resolves, after following symlinks, inside the local root.
     */
    private async readLocal(locator: string, signal?: AbortSignal): Promise<Buffer> {
        const root = this.localRoot;
        if (!root) {
            throw new Error(`Local file assets are disabled: ${locator}`);
        }
        const target = path.resolve(root, locator);
        if (!isWithin(root, target) || !isWithin(await fs.realpath(root), await fs.realpath(target))) {
            throw new Error(`Asset path is outside the local asset directory: ${locator}`);
        }
        return fs.readFile(target, { signal });
    }

    private async download(url: string, signal?: AbortSignal): Promise<Buffer> {
        try {
            return await withRetry(
                async () => {
                    const response = await axios.get<ArrayBuffer>(url, {
                        responseType: 'arraybuffer',
                        timeout: this.timeoutMs,
                        signal,
                        maxContentLength: Infinity,
                    });
                    return Buffer.from(response.data);
                },
                {
                    maxAttempts: this.maxAttempts,
                    initialBackoffMs: this.initialBackoffMs,
                    isRetryable: isRetryableHttpError,
                    signal,
                    onRetry: (attempt, error, delay) => {
                        console.warn(`[Assets] Download of ${url} failed (attempt ${attempt}), retrying in ${Math.round(delay)}ms: ${describeHttpError(error)}`);
                    },
                }
            );
        } catch (error: unknown) {
            throw new Error(`Failed to download ${url}: ${describeHttpError(error)}`);
        }
    }
}

function describeHttpError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        return error.response ? `HTTP ${error.response.status}` : error.message;
    }
    return error instanceof Error ? error.message : String(error);
}

function describeLocator(locator: string): string {
    return locator.startsWith('data:') ? 'data URL' : locator;
}
