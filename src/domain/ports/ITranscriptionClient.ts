import { TranscriptWord } from '../entities/Transcript';

/**
 * Capability hint for the speech-to-text engine.
 * 'degraded' asks for a lighter, faster configuration.
 */
export type TranscriptionCapability = 'standard' | 'degraded';

export interface TranscriptionOptions {
    capability: TranscriptionCapability;
    /** Filename hint used to infer the audio format */
    filename?: string;
    /** Aborts the request, including any pending retries */
    signal?: AbortSignal;
}

/**
 * ITranscriptionClient - Port for speech-to-text with word timestamps.
 * Implementations: WhisperTranscriptionClient
 */
export interface ITranscriptionClient {
    /**
     * Transcribes narration audio into timed words.
     * @param audio Raw audio bytes
     * @returns Words ordered by start time
     */
    transcribe(audio: Buffer, options: TranscriptionOptions): Promise<TranscriptWord[]>;
}
