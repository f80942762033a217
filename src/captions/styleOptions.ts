import { ValidationError } from './errors';
import {
  HorizontalAlignment,
  ReplaceRule,
  ResolvedStyleOptions,
  SubtitlePosition,
} from './types';
import { isRecord, UnknownRecord } from '../utils/guards';

const SUBTITLE_POSITIONS: readonly SubtitlePosition[] = [
  'top_left',
  'top_center',
  'top_right',
  'middle_left',
  'middle_center',
  'middle_right',
  'bottom_left',
  'bottom_center',
  'bottom_right',
];

const HORIZONTAL_ALIGNMENTS: readonly HorizontalAlignment[] = ['left', 'center', 'right'];

type RawOptions = UnknownRecord;

function isPosition(value: string): value is SubtitlePosition {
  return (SUBTITLE_POSITIONS as readonly string[]).includes(value);
}

function isAlignment(value: string): value is HorizontalAlignment {
  return (HORIZONTAL_ALIGNMENTS as readonly string[]).includes(value);
}

function readString(options: RawOptions, key: string): string | undefined {
  const value = options[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`'${key}' must be a string.`);
  }
  return value;
}

function readNumber(options: RawOptions, key: string): number | undefined {
  const value = options[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  throw new ValidationError(`'${key}' must be a number.`);
}

function readBoolean(options: RawOptions, key: string): boolean | undefined {
  const value = options[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ValidationError(`'${key}' must be a boolean.`);
  }
  return value;
}

/**
 * Renames hyphenated keys to their underscore form and folds the deprecated
 * highlight_color into word_color
 */
export function normalizeOptionKeys(settings: RawOptions, logPrefix: string = ''): RawOptions {
  const normalized: RawOptions = {};
  for (const [key, value] of Object.entries(settings)) {
    normalized[key.replace(/-/g, '_')] = value;
  }

  if ('highlight_color' in normalized) {
    console.warn(`${logPrefix}'highlight_color' is deprecated; merging into 'word_color'.`);
    normalized.word_color = normalized.highlight_color;
    delete normalized.highlight_color;
  }

  return normalized;
}

/**
 * Turns the caller's settings object into a fully typed style configuration.
 * Every default is applied here except the font size, which depends on the
 * video height and is filled in by resolveFontSize.
 * @param settings - Raw settings from the request
 * @param logPrefix - Prefix for warnings, e.g. "Job 123: "
 */
export function normalizeStyleOptions(settings: unknown, logPrefix: string = ''): ResolvedStyleOptions {
  if (settings === undefined || settings === null) {
    settings = {};
  }
  if (!isRecord(settings)) {
    throw new ValidationError("'settings' should be a dictionary.");
  }

  const options = normalizeOptionKeys(settings, logPrefix);

  const position = (readString(options, 'position') ?? 'middle_center').toLowerCase();
  if (!isPosition(position)) {
    throw new ValidationError(
      `'position' must be one of: ${SUBTITLE_POSITIONS.join(', ')}.`
    );
  }

  const alignment = (readString(options, 'alignment') ?? 'center').toLowerCase();
  if (!isAlignment(alignment)) {
    throw new ValidationError(`'alignment' must be one of: ${HORIZONTAL_ALIGNMENTS.join(', ')}.`);
  }

  const maxWordsPerLine = readNumber(options, 'max_words_per_line') ?? 0;
  if (!Number.isInteger(maxWordsPerLine) || maxWordsPerLine < 0) {
    throw new ValidationError("'max_words_per_line' must be a non-negative integer.");
  }

  const fontSize = readNumber(options, 'font_size');
  if (fontSize !== undefined && fontSize <= 0) {
    throw new ValidationError("'font_size' must be positive.");
  }

  return {
    fontFamily: readString(options, 'font_family') ?? 'Arial',
    fontSize,
    lineColor: readString(options, 'line_color') ?? '#FFFFFF',
    wordColor: readString(options, 'word_color') ?? '#FFFF00',
    // back_color takes precedence over box_color
    backColor: readString(options, 'back_color') || readString(options, 'box_color') || '#000000',
    outlineColor: readString(options, 'outline_color') ?? '#000000',
    bold: readBoolean(options, 'bold') ?? false,
    italic: readBoolean(options, 'italic') ?? false,
    underline: readBoolean(options, 'underline') ?? false,
    strikeout: readBoolean(options, 'strikeout') ?? false,
    scaleX: readNumber(options, 'scale_x') ?? 100,
    scaleY: readNumber(options, 'scale_y') ?? 100,
    spacing: readNumber(options, 'spacing') ?? 0,
    angle: readNumber(options, 'angle') ?? 0,
    borderStyle: readNumber(options, 'border_style') ?? 1,
    outlineWidth: readNumber(options, 'outline_width') ?? 2,
    shadowOffset: readNumber(options, 'shadow_offset') ?? 0,
    box: readBoolean(options, 'box') ?? false,
    marginL: readNumber(options, 'margin_l') ?? 20,
    marginR: readNumber(options, 'margin_r') ?? 20,
    marginV: readNumber(options, 'margin_v') ?? 20,
    position,
    alignment,
    x: readNumber(options, 'x'),
    y: readNumber(options, 'y'),
    allCaps: readBoolean(options, 'all_caps') ?? false,
    maxWordsPerLine,
    style: (readString(options, 'style') ?? 'classic').toLowerCase(),
  };
}

/**
 * Fills in the default font size (5% of the video height) when none was requested
 */
export function resolveFontSize(options: ResolvedStyleOptions, videoHeight: number): number {
  return options.fontSize ?? Math.floor(videoHeight * 0.05);
}

/**
 * Validates the replace list; entries without string find/replace are skipped
 * @param replace - Raw replace list from the request
 * @param logPrefix - Prefix for warnings
 */
export function parseReplaceRules(replace: unknown, logPrefix: string = ''): ReplaceRule[] {
  if (replace === undefined || replace === null) {
    return [];
  }
  if (!Array.isArray(replace)) {
    throw new ValidationError("'replace' should be a list of objects with 'find' and 'replace' keys.");
  }

  const rules: ReplaceRule[] = [];
  for (const item of replace) {
    if (isRecord(item) && typeof item.find === 'string' && typeof item.replace === 'string') {
      rules.push({ find: item.find, replace: item.replace });
    } else {
      console.warn(`${logPrefix}Invalid replace item ${JSON.stringify(item)}. Skipping.`);
    }
  }
  return rules;
}
