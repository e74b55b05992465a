/**
 * One recognized word with its timing, in seconds from narration start.
 */
export interface TranscriptWord {
    word: string;
    start: number;
    end: number;
}

/**
 * One caption to display: a word or a short group of words.
 * Offsets are seconds from narration start.
 */
export interface CaptionEvent {
    text: string;
    start: number;
    end: number;
}
