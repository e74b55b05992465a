import fs from 'fs/promises';
import { CaptionEvent } from '../../domain/entities/Transcript';
import { Resolution, VERTICAL_1080P } from '../../domain/entities/CompositionSpec';

/**
 * Formats seconds as an ASS timestamp (h:mm:ss.cc).
 */
export function formatAssTime(seconds: number): string {
    const centis = Math.round(Math.max(0, seconds) * 100);
    const h = Math.floor(centis / 360000);
    const m = Math.floor((centis % 360000) / 6000);
    const s = Math.floor((centis % 6000) / 100);
    const cs = centis % 100;
    return `${h}:${String(m).padStart(2, '0')}:${String(s).padStart(2, '0')}.${String(cs).padStart(2, '0')}`;
}

export function escapeAssText(text: string): string {
    return text.replace(/\\/g, '\\\\').replace(/\{/g, '\\{').replace(/\}/g, '\\}').replace(/\r?\n/g, ' ');
}

/**
 * Short pop-in: scale up and tilt during the first sixth, settle by the first third.
 */
function popInTags(durationSeconds: number): string {
    const ms = Math.max(0, Math.round(durationSeconds * 1000));
    const peak = Math.round(ms / 6);
    const settle = Math.round(ms / 3);
    return `{\\bord9\\shad0\\t(0,${peak},\\fscx125\\fscy125\\frz-5)\\t(${peak},${settle},\\fscx100\\fscy100\\frz0)}`;
}

/**
 * Builds an ASS document with one dialogue line per caption event.
 */
export function buildAssDocument(events: readonly CaptionEvent[], resolution: Resolution = VERTICAL_1080P): string {
    const header = [
        '[Script Info]',
        'ScriptType: v4.00+',
        `PlayResX: ${resolution.width}`,
        `PlayResY: ${resolution.height}`,
        'ScaledBorderAndShadow: yes',
        '',
        '[V4+ Styles]',
        'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, Shadow, Alignment, MarginL, MarginR, MarginV, Encoding',
        'Style: Default,Arial,160,&H00FFFFFF,&H000000FF,&H00000000,&H00000000,1,0,0,0,100,100,0,0,1,9,0,2,10,10,180,1',
        '',
        '[Events]',
        'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text',
    ];

    const dialogue = events.map((event) =>
        `Dialogue: 0,${formatAssTime(event.start)},${formatAssTime(event.end)},Default,,0,0,0,,` +
        `${popInTags(event.end - event.start)}${escapeAssText(event.text)}`
    );

    return [...header, ...dialogue, ''].join('\n');
}

export async function writeAssFile(
    filePath: string,
    events: readonly CaptionEvent[],
    resolution: Resolution = VERTICAL_1080P
): Promise<string> {
    await fs.writeFile(filePath, buildAssDocument(events, resolution), 'utf-8');
    return filePath;
}
