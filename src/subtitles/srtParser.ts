import { SrtEntry, SrtParseOptions } from './types';
import { FormatError } from '../captions/errors';

/**
 * Raised by the strict parser for content that is not SRT
 */
export class SrtParseError extends FormatError {}

const SRT_TIMESTAMP_LINE =
  /^\s*(\d+:\d{2}:\d{2}(?:[,.]\d{1,3})?)\s*-->\s*(\d+:\d{2}:\d{2}(?:[,.]\d{1,3})?)/;

/**
 * Converts SRT timestamp format (HH:MM:SS,mmm) to seconds
 * @param timestamp - Timestamp in format "HH:MM:SS,mmm" or "HH:MM:SS.mmm"
 * @returns Time in seconds (float)
 */
export function srtTimeToSeconds(timestamp: string): number {
  // Normalize separator (SRT uses comma, some use period)
  const normalized = timestamp.replace(',', '.');
  const parts = normalized.split(':');

  if (parts.length !== 3) {
    throw new SrtParseError(`Invalid SRT timestamp format: ${timestamp}`);
  }

  const hours = parseInt(parts[0] ?? '0', 10);
  const minutes = parseInt(parts[1] ?? '0', 10);
  const secondsParts = (parts[2] ?? '0').split('.');
  const seconds = parseInt(secondsParts[0] ?? '0', 10);
  const milliseconds = parseInt((secondsParts[1] ?? '0').padEnd(3, '0'), 10);

  if ([hours, minutes, seconds, milliseconds].some((value) => isNaN(value))) {
    throw new SrtParseError(`Invalid SRT timestamp format: ${timestamp}`);
  }

  return hours * 3600 + minutes * 60 + seconds + milliseconds / 1000;
}

/**
 * Converts seconds to SRT timestamp format (HH:MM:SS,mmm)
 * @param seconds - Time in seconds
 * @returns Timestamp in format "HH:MM:SS,mmm"
 */
export function secondsToSrtTime(seconds: number): string {
  const totalMs = Math.round(Math.max(0, seconds) * 1000);
  const hours = Math.floor(totalMs / 3600000);
  const minutes = Math.floor((totalMs % 3600000) / 60000);
  const secs = Math.floor((totalMs % 60000) / 1000);
  const ms = totalMs % 1000;

  return (
    `${hours.toString().padStart(2, '0')}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${secs.toString().padStart(2, '0')},` +
    `${ms.toString().padStart(3, '0')}`
  );
}

/**
 * Parses one block; returns null (or throws in strict mode) when malformed
 */
function parseBlock(block: string, strict: boolean): SrtEntry | null {
  const fail = (reason: string): null => {
    if (strict) {
      throw new SrtParseError(`Invalid SRT block (${reason}): ${block.split('\n')[0] ?? ''}`);
    }
    return null;
  };

  const lines = block.split('\n').filter((line) => line.trim());

  if (lines.length < 2) {
    return fail('expected index and timestamp lines');
  }

  // First line should be the index number
  const indexLine = (lines[0] ?? '').trim();
  if (!/^\d+$/.test(indexLine)) {
    return fail('missing index');
  }
  const index = parseInt(indexLine, 10);

  // Second line should be the timestamp
  const timestampMatch = (lines[1] ?? '').match(SRT_TIMESTAMP_LINE);
  if (!timestampMatch?.[1] || !timestampMatch[2]) {
    return fail('invalid timestamp');
  }

  const startTime = srtTimeToSeconds(timestampMatch[1]);
  const endTime = srtTimeToSeconds(timestampMatch[2]);

  // Remaining lines are the subtitle text
  const text = lines.slice(2).join('\n').trim();

  if (!text && !strict) {
    return null;
  }

  return { index, startTime, endTime, text };
}

/**
 * Parses an SRT file content into an array of subtitle entries
 * @param content - The raw SRT file content
 * @param options - strict: throw SrtParseError on malformed blocks instead of skipping them
 * @returns Array of parsed subtitle entries
 */
export function parseSrtContent(content: string, options: SrtParseOptions = {}): SrtEntry[] {
  const entries: SrtEntry[] = [];

  // Normalize line endings and split into blocks
  const normalizedContent = content.replace(/^\uFEFF/, '').replace(/\r\n/g, '\n').replace(/\r/g, '\n');
  const blocks = normalizedContent.split(/\n\s*\n/).filter((block) => block.trim());

  for (const block of blocks) {
    const entry = parseBlock(block, options.strict ?? false);
    if (entry) {
      entries.push(entry);
    }
  }

  return entries;
}

/**
 * Checks whether content is well-formed SRT with at least one block
 */
export function isSrtContent(content: string): boolean {
  if (!content.trim()) {
    return false;
  }

  try {
    return parseSrtContent(content, { strict: true }).length > 0;
  } catch (error) {
    if (error instanceof SrtParseError) {
      return false;
    }
    throw error;
  }
}

/**
 * Generates SRT content from subtitle entries
 * @param entries - Array of subtitle entries
 * @returns SRT file content as string
 */
export function generateSrtContent(entries: SrtEntry[]): string {
  return entries
    .map((entry, index) => {
      const num = index + 1;
      const start = secondsToSrtTime(entry.startTime);
      const end = secondsToSrtTime(entry.endTime);
      return `${num}\n${start} --> ${end}\n${entry.text}`;
    })
    .join('\n\n');
}
