import { FormatError } from './errors';
import { CaptionSource, TranscriptionResult } from './types';
import { isSrtContent, parseSrtContent } from '../subtitles';

export const ASS_SCRIPT_INFO_MARKER = '[Script Info]';

/** Display time for plain text captions when the video duration is unknown */
export const PLAIN_TEXT_FALLBACK_DURATION = 10;

/**
 * Lazily evaluated inputs for the transcription path. Each one may need the
 * video, so they are only called when the source kind requires them.
 */
export interface TranscriptionInputs {
  probeDuration(): Promise<number | null>;
  transcribe(language: string): Promise<TranscriptionResult>;
}

/**
 * Checks whether a string is an http(s) URL
 */
export function isUrl(text: string): boolean {
  try {
    const url = new URL(text);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * Classifies caption content; the first matching kind wins
 * @param content - Caption text, or undefined when none was supplied
 */
export function classifyCaptionSource(content: string | undefined | null): CaptionSource {
  if (!content) {
    return { kind: 'none' };
  }
  if (content.includes(ASS_SCRIPT_INFO_MARKER)) {
    return { kind: 'ass', content };
  }
  if (isSrtContent(content)) {
    return { kind: 'srt', content };
  }
  return { kind: 'plain_text', content };
}

/**
 * One segment per SRT block, without word timings
 */
export function srtToTranscription(content: string, logPrefix: string = ''): TranscriptionResult {
  const segments = parseSrtContent(content, { strict: true }).map((entry) => ({
    start: entry.startTime,
    end: entry.endTime,
    text: entry.text.trim(),
    words: [],
  }));

  console.info(`${logPrefix}Converted SRT content to transcription result.`);
  return { segments };
}

/**
 * A single segment showing the text for the whole video
 * @param text - Caption text
 * @param duration - Video duration in seconds, null when unknown
 */
export function plainTextToTranscription(
  text: string,
  duration: number | null,
  logPrefix: string = ''
): TranscriptionResult {
  let end = duration ?? 0;
  if (end <= 0) {
    end = PLAIN_TEXT_FALLBACK_DURATION;
    console.warn(
      `${logPrefix}Video duration not available, using ${PLAIN_TEXT_FALLBACK_DURATION} seconds as fallback.`
    );
  }

  console.info(`${logPrefix}Converted plain text to transcription result (duration: ${end}s).`);
  return { segments: [{ start: 0, end, text: text.trim(), words: [] }] };
}

/**
 * Produces the transcription for every source kind except ASS pass-through
 * @param source - Classified caption source
 * @param styleName - Requested style name; SRT sources only allow classic
 * @param inputs - Duration probe and transcriber
 * @param language - Language hint for the transcriber
 */
export async function resolveTranscription(
  source: Exclude<CaptionSource, { kind: 'ass' }>,
  styleName: string,
  inputs: TranscriptionInputs,
  language: string = 'auto',
  logPrefix: string = ''
): Promise<TranscriptionResult> {
  switch (source.kind) {
    case 'srt':
      if (styleName.toLowerCase() !== 'classic') {
        throw new FormatError("Only 'classic' style is supported for SRT captions.");
      }
      return srtToTranscription(source.content, logPrefix);

    case 'plain_text':
      return plainTextToTranscription(source.content, await inputs.probeDuration(), logPrefix);

    case 'none':
      console.info(`${logPrefix}No captions provided, generating transcription.`);
      return inputs.transcribe(language);
  }
}
