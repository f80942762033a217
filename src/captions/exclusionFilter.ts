import { ValidationError } from './errors';
import { isRecord } from '../utils/guards';
import { parseAssTime, parseTimeString } from './timeCodec';
import { ExcludeRange, RawExcludeRange, SubtitleKind } from './types';
import { generateSrtContent, parseSrtContent } from '../subtitles';

const DIALOGUE_PREFIX = 'Dialogue:';

function isRawExcludeRange(value: unknown): value is RawExcludeRange {
  return isRecord(value) && 'start' in value && 'end' in value;
}

/**
 * Validates and parses exclude ranges given as time strings
 * @param raw - Array of { start, end } time strings, or undefined for none
 * @returns Ranges in seconds, in input order
 */
export function normalizeExcludeRanges(raw: unknown): ExcludeRange[] {
  if (raw === undefined || raw === null) {
    return [];
  }
  if (!Array.isArray(raw)) {
    throw new ValidationError("'exclude_time_ranges' must be a list of {start, end} objects.");
  }

  return raw.map((item: unknown) => {
    if (!isRawExcludeRange(item) || typeof item.start !== 'string' || typeof item.end !== 'string') {
      throw new ValidationError(
        `Invalid exclude range ${JSON.stringify(item)}: 'start' and 'end' must be time strings.`
      );
    }

    const start = parseTimeString(item.start);
    const end = parseTimeString(item.end);

    if (start < 0 || end < 0) {
      throw new ValidationError(`Exclude range ${item.start}-${item.end} must not be negative.`);
    }
    if (end <= start) {
      throw new ValidationError(`Exclude range ${item.start}-${item.end} must end after it starts.`);
    }

    return { start, end };
  });
}

/**
 * Half-open overlap: touching a range boundary does not count
 */
export function overlapsAnyRange(start: number, end: number, ranges: ExcludeRange[]): boolean {
  return ranges.some((range) => start < range.end && end > range.start);
}

function keepAssLine(line: string, ranges: ExcludeRange[]): boolean {
  if (!line.startsWith(DIALOGUE_PREFIX)) {
    return true;
  }

  const fields = line.split(',');
  const start = parseAssTime(fields[1] ?? '');
  const end = parseAssTime(fields[2] ?? '');

  // Lines with unreadable timings are left alone
  if (start === null || end === null) {
    return true;
  }

  return !overlapsAnyRange(start, end, ranges);
}

/**
 * Removes subtitles that overlap any excluded range
 * @param content - ASS or SRT document
 * @param ranges - Excluded ranges in seconds
 * @param kind - Document format
 * @returns The filtered document; unchanged when ranges is empty
 */
export function filterSubtitleLines(content: string, ranges: ExcludeRange[], kind: SubtitleKind): string {
  if (ranges.length === 0) {
    return content;
  }

  if (kind === 'ass') {
    return content
      .split('\n')
      .filter((line) => keepAssLine(line, ranges))
      .join('\n');
  }

  const entries = parseSrtContent(content, { strict: true });
  const kept = entries.filter((entry) => !overlapsAnyRange(entry.startTime, entry.endTime, ranges));
  return generateSrtContent(kept);
}
