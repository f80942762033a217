import { determineAlignmentCode, formatPositionTag } from './alignment';
import { generateAssHeader } from './assHeader';
import { rgbToAssColor } from './colorCodec';
import { ASS_LINE_BREAK, chunk, processSubtitleText, splitLines } from './textProcessing';
import { formatAssTime } from './timeCodec';
import {
  CaptionStyle,
  DialogueEvent,
  ReplaceRule,
  ResolvedStyleOptions,
  Segment,
  TranscriptionResult,
  VideoResolution,
  WordTiming,
} from './types';
import { FontSnapshot } from '../fonts/fontCatalog';

export const CAPTION_STYLES: readonly CaptionStyle[] = [
  'classic',
  'karaoke',
  'highlight',
  'underline',
  'word_by_word',
];

/**
 * Values shared by every event of one style run
 */
interface StyleContext {
  options: ResolvedStyleOptions;
  rules: ReplaceRule[];
  positionTag: string;
  lineColor: string;
  wordColor: string;
}

interface ProcessedWord {
  text: string;
  start: number;
  end: number;
}

type StyleHandler = (segments: Segment[], context: StyleContext) => DialogueEvent[];

const colorTag = (assColor: string): string => `{\\c${assColor}}`;

function processWord(word: WordTiming, context: StyleContext): string {
  return processSubtitleText(word.word.trim(), context.rules, context.options.allCaps);
}

/**
 * Processed words of a segment; words that end up empty are dropped
 */
function processWords(words: WordTiming[], context: StyleContext): ProcessedWord[] {
  return words
    .map((word) => ({ text: processWord(word, context), start: word.start, end: word.end }))
    .filter((word) => word.text);
}

function event(
  layer: number,
  start: number,
  end: number,
  context: StyleContext,
  colorOverrides: string,
  text: string
): DialogueEvent {
  return {
    layer,
    start: formatAssTime(start),
    end: formatAssTime(end),
    positionTag: context.positionTag,
    colorOverrides,
    text,
  };
}

/**
 * One event per segment with the whole (optionally wrapped) text
 */
const handleClassic: StyleHandler = (segments, context) => {
  const { rules, options } = context;

  return segments.map((segment) => {
    const text = processSubtitleText(segment.text.trim().replace(/\n/g, ' '), rules, options.allCaps);
    const lines = splitLines(text, options.maxWordsPerLine);
    return event(0, segment.start, segment.end, context, '', lines.join(ASS_LINE_BREAK));
  });
};

/**
 * One event per segment with a \k duration tag before every word
 */
const handleKaraoke: StyleHandler = (segments, context) => {
  const events: DialogueEvent[] = [];

  for (const segment of segments) {
    const first = segment.words[0];
    const last = segment.words[segment.words.length - 1];
    if (!first || !last) continue;

    const taggedWords = segment.words.map((word) => {
      const durationCs = Math.round((word.end - word.start) * 100);
      return `{\\k${durationCs}}${processWord(word, context)}`;
    });
    const lines = chunk(taggedWords, context.options.maxWordsPerLine).map((line) =>
      line.join(' ').trim()
    );

    events.push(
      event(0, first.start, last.end, context, colorTag(context.wordColor), lines.join(ASS_LINE_BREAK))
    );
  }

  return events;
};

/**
 * Layer 0 keeps each line visible; layer 1 re-renders the line once per word
 * with that word recolored
 */
const handleHighlight: StyleHandler = (segments, context) => {
  const events: DialogueEvent[] = [];
  const lineTag = colorTag(context.lineColor);
  const wordTag = colorTag(context.wordColor);

  for (const segment of segments) {
    const words = processWords(segment.words, context);

    for (const line of chunk(words, context.options.maxWordsPerLine)) {
      const first = line[0];
      const last = line[line.length - 1];
      if (!first || !last) continue;

      const baseText = line.map((word) => word.text).join(' ');
      events.push(event(0, first.start, last.end, context, lineTag, baseText));

      line.forEach((current, index) => {
        const highlighted = line
          .map((word, i) => (i === index ? `${wordTag}${word.text}${lineTag}` : word.text))
          .join(' ');
        events.push(event(1, current.start, current.end, context, lineTag, highlighted));
      });
    }
  }

  return events;
};

/**
 * One event per word, re-rendering its line with only that word underlined
 */
const handleUnderline: StyleHandler = (segments, context) => {
  const events: DialogueEvent[] = [];
  const lineTag = colorTag(context.lineColor);

  for (const segment of segments) {
    const words = processWords(segment.words, context);

    for (const line of chunk(words, context.options.maxWordsPerLine)) {
      line.forEach((current, index) => {
        const text = line
          .map((word, i) => (i === index ? `{\\u1}${word.text}{\\u0}` : word.text))
          .join(' ');
        events.push(event(0, current.start, current.end, context, lineTag, text));
      });
    }
  }

  return events;
};

/**
 * One event per word showing only that word
 */
const handleWordByWord: StyleHandler = (segments, context) => {
  const events: DialogueEvent[] = [];
  const wordTag = colorTag(context.wordColor);

  for (const segment of segments) {
    for (const group of chunk(processWords(segment.words, context), context.options.maxWordsPerLine)) {
      for (const word of group) {
        events.push(event(0, word.start, word.end, context, wordTag, word.text));
      }
    }
  }

  return events;
};

const STYLE_HANDLERS: Record<CaptionStyle, StyleHandler> = {
  classic: handleClassic,
  karaoke: handleKaraoke,
  highlight: handleHighlight,
  underline: handleUnderline,
  word_by_word: handleWordByWord,
};

function isCaptionStyle(name: string): name is CaptionStyle {
  return (CAPTION_STYLES as readonly string[]).includes(name);
}

/**
 * Maps a requested style name to a style; unknown names fall back to classic
 */
export function resolveCaptionStyle(name: string, logPrefix: string = ''): CaptionStyle {
  const normalized = name.toLowerCase();
  if (isCaptionStyle(normalized)) {
    return normalized;
  }
  console.warn(`${logPrefix}Unknown style '${name}', defaulting to 'classic'.`);
  return 'classic';
}

/**
 * Runs the handler for the requested style over a transcription
 * @returns Dialogue events in input order
 */
export function generateDialogueEvents(
  transcription: TranscriptionResult,
  styleName: string,
  options: ResolvedStyleOptions,
  rules: ReplaceRule[],
  resolution: VideoResolution,
  logPrefix: string = ''
): DialogueEvent[] {
  const style = resolveCaptionStyle(styleName, logPrefix);
  const alignment = determineAlignmentCode(
    options.position,
    options.alignment,
    options.x,
    options.y,
    resolution.width,
    resolution.height
  );

  console.info(
    `${logPrefix}[${style}] position=${options.position}, alignment=${options.alignment}, ` +
      `x=${alignment.x}, y=${alignment.y}, an=${alignment.anchorCode}`
  );

  const events = STYLE_HANDLERS[style](transcription.segments, {
    options,
    rules,
    positionTag: formatPositionTag(alignment),
    lineColor: rgbToAssColor(options.lineColor),
    wordColor: rgbToAssColor(options.wordColor),
  });

  console.info(`${logPrefix}Handled ${events.length} dialogues in ${style} style.`);
  return events;
}

/**
 * Serializes an event to a "Dialogue:" line using the Default style
 */
export function formatDialogueEvent(dialogue: DialogueEvent): string {
  return (
    `Dialogue: ${dialogue.layer},${dialogue.start},${dialogue.end},Default,,0,0,0,,` +
    `${dialogue.positionTag}${dialogue.colorOverrides}${dialogue.text}`
  );
}

/**
 * Builds a complete ASS document: header, Default style and one line per event
 */
export function buildAssDocument(
  transcription: TranscriptionResult,
  styleName: string,
  options: ResolvedStyleOptions,
  rules: ReplaceRule[],
  resolution: VideoResolution,
  fonts: FontSnapshot,
  logPrefix: string = ''
): string {
  const header = generateAssHeader(options, resolution, fonts);
  const events = generateDialogueEvents(transcription, styleName, options, rules, resolution, logPrefix);
  return header + events.map(formatDialogueEvent).join('\n') + '\n';
}
