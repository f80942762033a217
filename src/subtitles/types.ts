/**
 * Represents a single subtitle block parsed from an SRT file
 */
export interface SrtEntry {
  /** Subtitle index (1-based from SRT) */
  index: number;
  /** Start time in seconds */
  startTime: number;
  /** End time in seconds */
  endTime: number;
  /** The subtitle text content */
  text: string;
}

/**
 * Options for parseSrtContent
 */
export interface SrtParseOptions {
  /** Throw on the first malformed block instead of skipping it */
  strict?: boolean;
}
