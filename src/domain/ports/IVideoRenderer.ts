import { CompositionSpec } from '../entities/CompositionSpec';
import { EncoderQuality } from '../../config';

export interface RenderRequest {
    spec: CompositionSpec;
    /** Fresh per-attempt working directory for intermediate files */
    workDir: string;
    /** Where the encoded video must be written */
    outputPath: string;
    quality: EncoderQuality;
}

/**
 * RenderResult from the encoding engine.
 */
export interface RenderResult {
    outputPath: string;
}

/**
 * IVideoRenderer - Port for the encoding/compositing engine.
 * Implementations: FFmpegVideoRenderer
 */
export interface IVideoRenderer {
    render(request: RenderRequest): Promise<RenderResult>;
}
