import { rgbToAssColor } from './colorCodec';
import { FontUnavailableError } from './errors';
import { resolveFontSize } from './styleOptions';
import { ResolvedStyleOptions, VideoResolution } from './types';
import { FontSnapshot } from '../fonts/fontCatalog';

export const STYLES_FORMAT_LINE =
  'Format: Name, Fontname, Fontsize, PrimaryColour, SecondaryColour, OutlineColour, BackColour, ' +
  'Bold, Italic, Underline, StrikeOut, ScaleX, ScaleY, Spacing, Angle, BorderStyle, Outline, ' +
  'Shadow, Alignment, MarginL, MarginR, MarginV, Encoding';

export const EVENTS_FORMAT_LINE =
  'Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text';

/** Every event carries its own \an override */
const PLACEHOLDER_ALIGNMENT = 5;

/** ASS BorderStyle 3 draws an opaque box filled with BackColour */
const OPAQUE_BOX_BORDER_STYLE = 3;

const flag = (value: boolean): string => (value ? '1' : '0');

/**
 * Throws FontUnavailableError unless the requested family is installed
 */
export function assertFontAvailable(fontFamily: string, fonts: FontSnapshot): void {
  if (!fonts.hasFont(fontFamily)) {
    throw new FontUnavailableError(fontFamily, fonts.availableFontNames());
  }
}

/**
 * Builds the single "Default" style line
 * @param options - Resolved style options
 * @param resolution - Effective video resolution (drives the default font size)
 * @param fonts - Font catalog snapshot
 * @returns "Style: Default,..." with 23 fields
 */
export function buildStyleLine(
  options: ResolvedStyleOptions,
  resolution: VideoResolution,
  fonts: FontSnapshot
): string {
  assertFontAvailable(options.fontFamily, fonts);

  const lineColor = rgbToAssColor(options.lineColor);
  const fields: Array<string | number> = [
    'Default',
    fonts.resolveAssFamily(options.fontFamily),
    resolveFontSize(options, resolution.height),
    lineColor,
    lineColor,
    rgbToAssColor(options.outlineColor),
    rgbToAssColor(options.backColor),
    flag(options.bold),
    flag(options.italic),
    flag(options.underline),
    flag(options.strikeout),
    options.scaleX,
    options.scaleY,
    options.spacing,
    options.angle,
    options.box ? OPAQUE_BOX_BORDER_STYLE : options.borderStyle,
    options.outlineWidth,
    options.shadowOffset,
    PLACEHOLDER_ALIGNMENT,
    options.marginL,
    options.marginR,
    options.marginV,
    0,
  ];

  return `Style: ${fields.join(',')}`;
}

/**
 * Generates the ASS header: script info, the Default style and the events format line
 */
export function generateAssHeader(
  options: ResolvedStyleOptions,
  resolution: VideoResolution,
  fonts: FontSnapshot
): string {
  const styleLine = buildStyleLine(options, resolution, fonts);

  return [
    '[Script Info]',
    'ScriptType: v4.00+',
    `PlayResX: ${resolution.width}`,
    `PlayResY: ${resolution.height}`,
    'ScaledBorderAndShadow: yes',
    '',
    '[V4+ Styles]',
    STYLES_FORMAT_LINE,
    styleLine,
    '',
    '[Events]',
    EVENTS_FORMAT_LINE,
    '',
  ].join('\n');
}
