/**
 * Structured failure returned to callers of the caption pipeline
 */
export interface CaptionFailure {
  error: string;
  /** Present only when the requested font could not be resolved */
  availableFonts?: string[];
}

/**
 * Base class for every failure the caption pipeline reports to its caller
 */
export class CaptionError extends Error {
  /** HTTP status used when the failure is returned over the API */
  readonly statusCode: number = 500;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Malformed settings, replace rules or exclude ranges
 */
export class ValidationError extends CaptionError {
  override readonly statusCode = 400;
}

/**
 * Requested font family is not installed
 */
export class FontUnavailableError extends CaptionError {
  override readonly statusCode = 400;

  constructor(
    readonly requested: string,
    readonly availableFonts: string[]
  ) {
    super(`Font '${requested}' not available.`);
  }
}

/**
 * Caption or video could not be fetched
 */
export class SourceRetrievalError extends CaptionError {
  override readonly statusCode = 502;
}

/**
 * Caption content that cannot be used as requested
 */
export class FormatError extends CaptionError {
  override readonly statusCode = 400;
}

/**
 * Output file could not be written
 */
export class PersistenceError extends CaptionError {
  override readonly statusCode = 500;
}

/**
 * Converts anything thrown inside the pipeline into the single structured
 * error returned for a request
 */
export function toCaptionFailure(error: unknown): CaptionFailure {
  if (error instanceof FontUnavailableError) {
    return { error: error.message, availableFonts: error.availableFonts };
  }
  if (error instanceof Error) {
    return { error: error.message };
  }
  return { error: 'Unknown error' };
}

/**
 * HTTP status for a thrown value
 */
export function statusCodeFor(error: unknown): number {
  return error instanceof CaptionError ? error.statusCode : 500;
}
