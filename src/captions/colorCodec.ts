const FALLBACK_ASS_COLOR = '&H00FFFFFF';
const HEX_COLOR_PATTERN = /^[0-9a-fA-F]{6}$/;

/**
 * Converts an RGB hex color to the ASS color encoding (&HAABBGGRR)
 * @param rgbColor - Color such as "#FF8800" or "FF8800"
 * @returns ASS color with an opaque alpha byte, or opaque white for malformed input
 */
export function rgbToAssColor(rgbColor: string): string {
  const hex = rgbColor.replace(/^#/, '');
  if (!HEX_COLOR_PATTERN.test(hex)) {
    return FALLBACK_ASS_COLOR;
  }

  const red = hex.slice(0, 2);
  const green = hex.slice(2, 4);
  const blue = hex.slice(4, 6);

  return `&H00${blue}${green}${red}`.toUpperCase();
}
