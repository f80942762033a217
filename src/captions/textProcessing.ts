import { ReplaceRule } from './types';

/** ASS hard line break */
export const ASS_LINE_BREAK = '\\N';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Applies find/replace rules in order, matching case-insensitively
 * @param text - Caption text
 * @param rules - Replace rules; empty find strings are ignored
 * @returns Text with every occurrence of each find string replaced
 */
export function applyReplacements(text: string, rules: ReplaceRule[]): string {
  return rules.reduce((current, rule) => {
    if (!rule.find) return current;
    const pattern = new RegExp(escapeRegExp(rule.find), 'gi');
    return current.replace(pattern, () => rule.replace);
  }, text);
}

/**
 * Applies replacements, then the optional uppercase transform
 */
export function processSubtitleText(text: string, rules: ReplaceRule[], allCaps: boolean): string {
  const replaced = applyReplacements(text, rules);
  return allCaps ? replaced.toUpperCase() : replaced;
}

/**
 * Groups items into consecutive chunks of at most `size`; a size of 0 keeps one chunk
 */
export function chunk<T>(items: T[], size: number): T[][] {
  if (size <= 0) {
    return items.length > 0 ? [items] : [];
  }

  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Splits text into lines of at most `maxWordsPerLine` whitespace-separated words
 * @param text - Text to split
 * @param maxWordsPerLine - Words per line; 0 disables splitting
 * @returns Lines in reading order
 */
export function splitLines(text: string, maxWordsPerLine: number): string[] {
  if (maxWordsPerLine <= 0) {
    return [text];
  }

  const words = text.split(/\s+/).filter((word) => word);
  return chunk(words, maxWordsPerLine).map((line) => line.join(' '));
}
