import { CaptionEvent, TranscriptWord } from '../domain/entities/Transcript';

export interface CaptionTimelineOptions {
    /** Adjacent words closer than this (seconds) may share one caption */
    mergeGapSeconds: number;
    /** A merged caption never grows beyond this many characters */
    maxCharacters: number;
}

export const DEFAULT_CAPTION_OPTIONS: CaptionTimelineOptions = {
    mergeGapSeconds: 0.1,
    maxCharacters: 12,
};

interface TimedText {
    text: string;
    start: number;
    end: number;
}

/**
 * Turns a word-level transcript into ordered, non-overlapping caption events.
 */
export class CaptionTimelineBuilder {
    private readonly options: CaptionTimelineOptions;

    constructor(options: Partial<CaptionTimelineOptions> = {}) {
        this.options = { ...DEFAULT_CAPTION_OPTIONS, ...options };
    }

    /**
     * Builds caption events from `transcript`.
     * When `totalDurationSeconds` is given, events are cut to end by then and
     * words starting at or after it are dropped.
     */
    build(transcript: readonly TranscriptWord[], totalDurationSeconds?: number): CaptionEvent[] {
        const words = this.normalize(transcript, totalDurationSeconds);
        if (words.length === 0) {
            return [];
        }

        const groups = this.group(words);

        // Each event ends no later than the next one starts.
        return groups.map((group, index) => {
            const next = groups[index + 1];
            const end = next ? Math.min(group.end, next.start) : group.end;
            return { text: group.text, start: group.start, end };
        });
    }

    private normalize(transcript: readonly TranscriptWord[], totalDurationSeconds?: number): TimedText[] {
        const limit = totalDurationSeconds ?? Number.POSITIVE_INFINITY;

        const words: TimedText[] = [];
        for (const entry of transcript) {
            const text = entry.word.trim();
            if (!text || !Number.isFinite(entry.start) || !Number.isFinite(entry.end)) {
                continue;
            }
            const start = Math.max(0, entry.start);
            if (start >= limit) {
                continue;
            }
            const end = Math.min(Math.max(start, entry.end), limit);
            words.push({ text, start, end });
        }

        // Array.prototype.sort is stable: equal starts keep transcript order.
        return words.sort((a, b) => a.start - b.start);
    }

    private group(words: TimedText[]): TimedText[] {
        const groups: TimedText[] = [];
        let current: TimedText = { ...words[0] };

        for (const word of words.slice(1)) {
            if (this.shouldMerge(current, word)) {
                current = {
                    text: `${current.text} ${word.text}`,
                    start: current.start,
                    end: Math.max(current.end, word.end),
                };
                continue;
            }
            groups.push(current);
            current = { ...word };
        }
        groups.push(current);

        return groups;
    }

    private shouldMerge(current: TimedText, next: TimedText): boolean {
        // Words sharing a start time cannot be shown one after another.
        if (next.start <= current.start) {
            return true;
        }
        const gap = next.start - current.end;
        const mergedLength = current.text.length + 1 + next.text.length;
        return gap < this.options.mergeGapSeconds && mergedLength <= this.options.maxCharacters;
    }
}
