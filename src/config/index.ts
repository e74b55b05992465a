import dotenv from 'dotenv';
import os from 'os';

// Load environment variables
dotenv.config();

/**
 * Encoder settings for one encode attempt.
 */
export interface EncoderQuality {
    crf: number;
    preset: string;
    audioBitrate: string;
    threads: number;
}

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    publicBaseUrl: string;

    // Scheduling & retention
    maxConcurrentVideos: number;
    videoRetentionMinutes: number;
    sweepIntervalSeconds: number;
    tempFileMaxAgeMinutes: number;
    maxCacheSize: number;

    // Paths
    backgroundDir: string;
    musicDir: string;
    soundsDir: string;
    processedVideosDir: string;
    /** Root for local-path asset locators; empty disables them */
    localAssetDir: string;

    // Encoder
    encoder: EncoderQuality;
    fallbackEncoder: EncoderQuality;

    // Transcription (OpenAI-compatible speech-to-text)
    transcriptionApiKey: string;
    transcriptionBaseUrl: string;
    whisperModel: string;
    whisperFallbackModel: string;
    transcriptionLanguage: string;

    // Captions
    captionMergeGapSeconds: number;
    captionMaxCharacters: number;

    // Timeouts (ms)
    fetchTimeoutMs: number;
    transcriptionTimeoutMs: number;
    encodeTimeoutMs: number;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

/**
 * Resolves a configured worker count: 0 (or less) means one per CPU.
 */
export function resolveConcurrency(configured: number, cpuCount: number = os.cpus().length): number {
    if (configured > 0) {
        return Math.floor(configured);
    }
    return Math.max(1, cpuCount);
}

function resolveThreads(configured: number): number {
    return configured > 0 ? Math.floor(configured) : Math.max(2, os.cpus().length);
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const port = getEnvVarNumber('PORT', 3000);
    const threads = resolveThreads(getEnvVarNumber('FFMPEG_THREADS', 0));
    const audioBitrate = getEnvVar('AUDIO_BITRATE', '192k');

    return {
        // Server
        port,
        environment: getEnvVar('NODE_ENV', 'development'),
        publicBaseUrl: getEnvVar('PUBLIC_BASE_URL', `http://localhost:${port}`).replace(/\/+$/, ''),

        // Scheduling & retention
        maxConcurrentVideos: resolveConcurrency(getEnvVarNumber('MAX_CONCURRENT_VIDEOS', 0)),
        videoRetentionMinutes: getEnvVarNumber('VIDEO_RETENTION_MINUTES', 1440),
        sweepIntervalSeconds: getEnvVarNumber('SWEEP_INTERVAL_SECONDS', 60),
        tempFileMaxAgeMinutes: getEnvVarNumber('TEMP_FILE_MAX_AGE_MINUTES', 60),
        maxCacheSize: getEnvVarNumber('MAX_CACHE_SIZE', 100),

        // Paths
        backgroundDir: getEnvVar('BACKGROUND_DIR', './background'),
        musicDir: getEnvVar('MUSIC_DIR', './music'),
        soundsDir: getEnvVar('SOUNDS_DIR', './sounds'),
        processedVideosDir: getEnvVar('PROCESSED_VIDEOS_DIR', './processed_videos'),
        localAssetDir: getEnvVar('LOCAL_ASSET_DIR', ''),

        // Encoder
        encoder: {
            crf: getEnvVarNumber('VIDEO_CRF', 26),
            preset: getEnvVar('VIDEO_PRESET', 'ultrafast'),
            audioBitrate,
            threads,
        },
        fallbackEncoder: {
            crf: getEnvVarNumber('FALLBACK_VIDEO_CRF', 32),
            preset: getEnvVar('FALLBACK_VIDEO_PRESET', 'ultrafast'),
            audioBitrate,
            threads: Math.max(1, Math.floor(threads / 2)),
        },

        // Transcription
        transcriptionApiKey: getEnvVar('TRANSCRIPTION_API_KEY', ''),
        transcriptionBaseUrl: getEnvVar('TRANSCRIPTION_BASE_URL', 'https://api.openai.com'),
        whisperModel: getEnvVar('WHISPER_MODEL', 'whisper-1'),
        whisperFallbackModel: getEnvVar('WHISPER_FALLBACK_MODEL', 'whisper-1'),
        transcriptionLanguage: getEnvVar('TRANSCRIPTION_LANGUAGE', 'en'),

        // Captions
        captionMergeGapSeconds: getEnvVarNumber('CAPTION_MERGE_GAP_SECONDS', 0.1),
        captionMaxCharacters: getEnvVarNumber('CAPTION_MAX_CHARACTERS', 12),

        // Timeouts
        fetchTimeoutMs: getEnvVarNumber('FETCH_TIMEOUT_MS', 60000),
        transcriptionTimeoutMs: getEnvVarNumber('TRANSCRIPTION_TIMEOUT_MS', 300000),
        encodeTimeoutMs: getEnvVarNumber('ENCODE_TIMEOUT_MS', 900000),
    };
}

/**
 * Validates loaded configuration. Returns a list of problems (empty when valid).
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.transcriptionApiKey) {
        errors.push('TRANSCRIPTION_API_KEY is required for caption timing');
    }
    if (config.maxConcurrentVideos < 1) {
        errors.push('MAX_CONCURRENT_VIDEOS must resolve to at least 1');
    }
    if (config.videoRetentionMinutes <= 0) {
        errors.push('VIDEO_RETENTION_MINUTES must be positive');
    }
    if (config.sweepIntervalSeconds <= 0) {
        errors.push('SWEEP_INTERVAL_SECONDS must be positive');
    }
    if (config.maxCacheSize < 1) {
        errors.push('MAX_CACHE_SIZE must be at least 1');
    }

    return errors;
}
