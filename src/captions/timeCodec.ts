import { ValidationError } from './errors';

/**
 * Converts seconds to ASS time format (H:MM:SS.cc)
 * Centiseconds are rounded; a round-up to 100 carries into the seconds field.
 * @param seconds - Time in seconds
 * @returns Timestamp in format "H:MM:SS.cc"
 */
export function formatAssTime(seconds: number): string {
  const totalCentiseconds = Math.round(Math.max(0, seconds) * 100);
  const hours = Math.floor(totalCentiseconds / 360000);
  const minutes = Math.floor((totalCentiseconds % 360000) / 6000);
  const secs = Math.floor((totalCentiseconds % 6000) / 100);
  const centiseconds = totalCentiseconds % 100;

  return (
    `${hours}:` +
    `${minutes.toString().padStart(2, '0')}:` +
    `${secs.toString().padStart(2, '0')}.` +
    `${centiseconds.toString().padStart(2, '0')}`
  );
}

const CLOCK_TIME_PATTERN = /^(?:(\d+):)?(\d{1,2}):(\d{2}(?:\.\d{1,3})?)$/;
const BARE_SECONDS_PATTERN = /^-?\d+(?:\.\d+)?$/;

/**
 * Parses a user supplied time string to seconds
 * @param text - "H:MM:SS[.ms]", "MM:SS[.ms]" or bare "SS[.ms]"
 * @returns Time in seconds (float)
 */
export function parseTimeString(text: string): number {
  const trimmed = text.trim();
  const match = CLOCK_TIME_PATTERN.exec(trimmed);

  if (match) {
    const hours = parseInt(match[1] ?? '0', 10);
    const minutes = parseInt(match[2] ?? '0', 10);
    const seconds = parseFloat(match[3] ?? '0');
    return hours * 3600 + minutes * 60 + seconds;
  }

  if (BARE_SECONDS_PATTERN.test(trimmed)) {
    return parseFloat(trimmed);
  }

  throw new ValidationError(`Invalid time string: ${text}`);
}

const ASS_TIME_PATTERN = /^(\d+):(\d{1,2}):(\d{1,2})\.(\d{1,2})$/;

/**
 * Converts an ASS timestamp (H:MM:SS.cc) back to seconds
 * @returns Time in seconds, or null when the text is not an ASS timestamp
 */
export function parseAssTime(text: string): number | null {
  const match = ASS_TIME_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const hours = parseInt(match[1] ?? '0', 10);
  const minutes = parseInt(match[2] ?? '0', 10);
  const seconds = parseInt(match[3] ?? '0', 10);
  const centiseconds = parseInt((match[4] ?? '0').padEnd(2, '0'), 10);

  return hours * 3600 + minutes * 60 + seconds + centiseconds / 100;
}
