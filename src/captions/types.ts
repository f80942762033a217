/**
 * Timing for a single recognized word
 */
export interface WordTiming {
  word: string;
  /** Start time in seconds */
  start: number;
  /** End time in seconds */
  end: number;
}

/**
 * A contiguous transcribed phrase
 */
export interface Segment {
  /** Start time in seconds */
  start: number;
  /** End time in seconds, always greater than start */
  end: number;
  text: string;
  /** Word-level timings; empty when the source has none (SRT, plain text) */
  words: WordTiming[];
}

/**
 * Uniform transcription model consumed by the style handlers
 */
export interface TranscriptionResult {
  segments: Segment[];
}

/**
 * Supported caption rendering styles
 */
export type CaptionStyle = 'classic' | 'karaoke' | 'highlight' | 'underline' | 'word_by_word';

export type VerticalPosition = 'top' | 'middle' | 'bottom';
export type HorizontalAlignment = 'left' | 'center' | 'right';

/**
 * One of the nine cells of the 3x3 placement grid
 */
export type SubtitlePosition = `${VerticalPosition}_${HorizontalAlignment}`;

/**
 * Fully resolved style configuration. Produced once per request by
 * normalizeStyleOptions; the font size stays undefined until the video
 * resolution is known.
 */
export interface ResolvedStyleOptions {
  fontFamily: string;
  fontSize?: number;
  lineColor: string;
  wordColor: string;
  backColor: string;
  outlineColor: string;
  bold: boolean;
  italic: boolean;
  underline: boolean;
  strikeout: boolean;
  scaleX: number;
  scaleY: number;
  spacing: number;
  angle: number;
  borderStyle: number;
  outlineWidth: number;
  shadowOffset: number;
  box: boolean;
  marginL: number;
  marginR: number;
  marginV: number;
  position: SubtitlePosition;
  alignment: HorizontalAlignment;
  x?: number;
  y?: number;
  allCaps: boolean;
  maxWordsPerLine: number;
  /** Requested style name as given; unknown names fall back to classic */
  style: string;
}

/**
 * Case-insensitive find/replace rule applied to caption text
 */
export interface ReplaceRule {
  find: string;
  replace: string;
}

/**
 * Time range whose subtitles are removed from the output, in seconds
 */
export interface ExcludeRange {
  start: number;
  end: number;
}

/**
 * Raw exclude range as received from the caller
 */
export interface RawExcludeRange {
  start: unknown;
  end: unknown;
}

export interface VideoResolution {
  width: number;
  height: number;
}

/**
 * Resolved anchor code (\an) and absolute pixel position (\pos)
 */
export interface AlignmentResult {
  /** Numpad-style anchor 1-9 */
  anchorCode: number;
  x: number;
  y: number;
}

/**
 * A single ASS dialogue event before serialization
 */
export interface DialogueEvent {
  layer: number;
  /** ASS time string H:MM:SS.cc */
  start: string;
  end: string;
  positionTag: string;
  colorOverrides: string;
  text: string;
}

/**
 * Kind of subtitle document handled by the exclusion filter
 */
export type SubtitleKind = 'ass' | 'srt';

/**
 * Caption input classified once at request entry
 */
export type CaptionSource =
  | { kind: 'ass'; content: string }
  | { kind: 'srt'; content: string }
  | { kind: 'plain_text'; content: string }
  | { kind: 'none' };

/**
 * A caption generation request as accepted by the pipeline. Style settings,
 * replace rules and exclude ranges stay raw here and are validated by the
 * pipeline before any work starts.
 */
export interface CaptionRequest {
  videoUrl: string;
  /** URL of a caption file, or raw ASS / SRT / plain text */
  captions?: string;
  settings?: unknown;
  replace?: unknown;
  excludeTimeRanges?: unknown;
  /** Transcription language hint, 'auto' by default */
  language?: string;
  /** Explicit script resolution; both must be given to skip probing */
  playResX?: number;
  playResY?: number;
}
