import axios from 'axios';
import FormData from 'form-data';
import { ITranscriptionClient, TranscriptionOptions } from '../../domain/ports/ITranscriptionClient';
import { TranscriptWord } from '../../domain/entities/Transcript';
import { withRetry, isRetryableHttpError } from '../resilience/RetryUtils';

export interface WhisperClientOptions {
    baseUrl?: string;
    /** Model for standard requests */
    model?: string;
    /** Model for degraded requests */
    fallbackModel?: string;
    language?: string;
    timeoutMs?: number;
    maxAttempts?: number;
    initialBackoffMs?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toWord(value: unknown): TranscriptWord | null {
    if (!isRecord(value)) return null;
    const { word, start, end } = value;
    if (typeof word !== 'string' || typeof start !== 'number' || typeof end !== 'number') {
        return null;
    }
    return { word, start, end };
}

/**
 * Spreads a segment's words evenly across the segment.
 */
export function spreadSegmentWords(text: string, start: number, end: number): TranscriptWord[] {
    const words = text.split(/\s+/).filter(Boolean);
    if (words.length === 0) {
        return [];
    }
    const step = Math.max(0, end - start) / words.length;
    return words.map((word, i) => ({
        word,
        start: start + i * step,
        end: start + (i + 1) * step,
    }));
}

/**
 * Extracts timed words from a verbose_json transcription response.
 * Falls back to segment timestamps when word timestamps are absent.
 */
export function parseVerboseTranscription(data: unknown): TranscriptWord[] {
    if (!isRecord(data)) {
        throw new Error('Unexpected transcription response');
    }

    if (Array.isArray(data.words) && data.words.length > 0) {
        return data.words.map(toWord).filter((word): word is TranscriptWord => word !== null);
    }

    if (Array.isArray(data.segments)) {
        const words: TranscriptWord[] = [];
        for (const segment of data.segments) {
            if (!isRecord(segment)) continue;
            const { text, start, end } = segment;
            if (typeof text === 'string' && typeof start === 'number' && typeof end === 'number') {
                words.push(...spreadSegmentWords(text, start, end));
            }
        }
        return words;
    }

    return [];
}

function describeError(error: unknown): string {
    if (axios.isAxiosError(error)) {
        const body: unknown = error.response?.data;
        if (isRecord(body) && isRecord(body.error) && typeof body.error.message === 'string') {
            return body.error.message;
        }
        return error.response ? `HTTP ${error.response.status}` : error.message;
    }
    return error instanceof Error ? error.message : String(error);
}

/**
 * Whisper-based transcription client with word timestamps.
 * Uses the OpenAI-compatible /v1/audio/transcriptions endpoint.
 * A degraded request uses the fallback model and segment-level timestamps only.
 */
export class WhisperTranscriptionClient implements ITranscriptionClient {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;
    private readonly fallbackModel: string;
    private readonly language: string;
    private readonly timeoutMs: number;
    private readonly maxAttempts: number;
    private readonly initialBackoffMs: number;

    constructor(apiKey: string, options: WhisperClientOptions = {}) {
        if (!apiKey) {
            throw new Error('Whisper API key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = (options.baseUrl ?? 'https://api.openai.com').replace(/\/+$/, '');
        this.model = options.model ?? 'whisper-1';
        this.fallbackModel = options.fallbackModel ?? this.model;
        this.language = options.language ?? 'en';
        this.timeoutMs = options.timeoutMs ?? 300000;
        this.maxAttempts = options.maxAttempts ?? 3;
        this.initialBackoffMs = options.initialBackoffMs ?? 2000;
    }

    async transcribe(audio: Buffer, options: TranscriptionOptions): Promise<TranscriptWord[]> {
        if (audio.length === 0) {
            throw new Error('Audio is empty');
        }
        const degraded = options.capability === 'degraded';
        const model = degraded ? this.fallbackModel : this.model;

        console.log(`[Whisper] Sending ${(audio.length / 1024).toFixed(0)}KB to ${model}${degraded ? ' (degraded)' : ''}...`);

        try {
            const data = await withRetry(
                async () => {
                    // A stream body cannot be replayed, so each attempt builds its own form.
                    const formData = new FormData();
                    formData.append('file', audio, { filename: options.filename ?? 'narration.mp3' });
                    formData.append('model', model);
                    formData.append('response_format', 'verbose_json');
                    formData.append('language', this.language);
                    formData.append('timestamp_granularities[]', 'segment');
                    if (!degraded) {
                        formData.append('timestamp_granularities[]', 'word');
                    }

                    const response = await axios.post<unknown>(`${this.baseUrl}/v1/audio/transcriptions`, formData, {
                        headers: {
                            ...formData.getHeaders(),
                            Authorization: `Bearer ${this.apiKey}`,
                        },
                        timeout: this.timeoutMs,
                        signal: options.signal,
                        maxContentLength: Infinity,
                        maxBodyLength: Infinity,
                    });
                    return response.data;
                },
                {
                    maxAttempts: this.maxAttempts,
                    initialBackoffMs: this.initialBackoffMs,
                    isRetryable: isRetryableHttpError,
                    signal: options.signal,
                    onRetry: (attempt, error, delay) => {
                        console.warn(`[Whisper] Transient error (${describeError(error)}), retrying in ${(delay / 1000).toFixed(1)}s (Attempt ${attempt}/${this.maxAttempts})...`);
                    },
                }
            );

            const words = parseVerboseTranscription(data);
            console.log(`[Whisper] Received ${words.length} timed words`);
            return words;
        } catch (error: unknown) {
            const message = describeError(error);
            console.error('[Whisper] Error:', message);
            throw new Error(`Transcription failed: ${message}`);
        }
    }
}
