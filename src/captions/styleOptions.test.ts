import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  normalizeOptionKeys,
  normalizeStyleOptions,
  parseReplaceRules,
  resolveFontSize,
} from './styleOptions';
import { ValidationError } from './errors';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('normalizeOptionKeys', () => {
  it('should replace hyphens with underscores', () => {
    expect(normalizeOptionKeys({ 'font-family': 'Roboto', 'max-words-per-line': 3 })).toEqual({
      font_family: 'Roboto',
      max_words_per_line: 3,
    });
  });

  it('should merge highlight_color into word_color with a warning', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(normalizeOptionKeys({ 'highlight-color': '#00FF00', word_color: '#FF0000' })).toEqual({
      word_color: '#00FF00',
    });
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('normalizeStyleOptions', () => {
  it('should apply defaults for an empty settings object', () => {
    const options = normalizeStyleOptions({});

    expect(options).toEqual({
      fontFamily: 'Arial',
      fontSize: undefined,
      lineColor: '#FFFFFF',
      wordColor: '#FFFF00',
      backColor: '#000000',
      outlineColor: '#000000',
      bold: false,
      italic: false,
      underline: false,
      strikeout: false,
      scaleX: 100,
      scaleY: 100,
      spacing: 0,
      angle: 0,
      borderStyle: 1,
      outlineWidth: 2,
      shadowOffset: 0,
      box: false,
      marginL: 20,
      marginR: 20,
      marginV: 20,
      position: 'middle_center',
      alignment: 'center',
      x: undefined,
      y: undefined,
      allCaps: false,
      maxWordsPerLine: 0,
      style: 'classic',
    });
  });

  it('should treat missing settings as empty', () => {
    expect(normalizeStyleOptions(undefined).fontFamily).toBe('Arial');
  });

  it('should read hyphenated keys and numeric strings', () => {
    const options = normalizeStyleOptions({
      'font-size': '48',
      'max-words-per-line': 3,
      'all-caps': true,
      style: 'Karaoke',
      position: 'TOP_LEFT',
    });

    expect(options.fontSize).toBe(48);
    expect(options.maxWordsPerLine).toBe(3);
    expect(options.allCaps).toBe(true);
    expect(options.style).toBe('karaoke');
    expect(options.position).toBe('top_left');
  });

  it('should prefer back_color over box_color', () => {
    expect(normalizeStyleOptions({ box_color: '#111111' }).backColor).toBe('#111111');
    expect(normalizeStyleOptions({ box_color: '#111111', back_color: '#222222' }).backColor).toBe(
      '#222222'
    );
  });

  it('should reject a settings value that is not an object', () => {
    expect(() => normalizeStyleOptions('bold')).toThrow("'settings' should be a dictionary.");
    expect(() => normalizeStyleOptions([])).toThrow(ValidationError);
  });

  it('should reject malformed values', () => {
    expect(() => normalizeStyleOptions({ bold: 'yes' })).toThrow("'bold' must be a boolean.");
    expect(() => normalizeStyleOptions({ font_size: 'big' })).toThrow("'font_size' must be a number.");
    expect(() => normalizeStyleOptions({ position: 'center' })).toThrow(ValidationError);
    expect(() => normalizeStyleOptions({ alignment: 'justify' })).toThrow(ValidationError);
    expect(() => normalizeStyleOptions({ max_words_per_line: -1 })).toThrow(ValidationError);
    expect(() => normalizeStyleOptions({ max_words_per_line: 1.5 })).toThrow(ValidationError);
  });
});

describe('resolveFontSize', () => {
  it('should default to 5% of the video height', () => {
    expect(resolveFontSize(normalizeStyleOptions({}), 1080)).toBe(54);
    expect(resolveFontSize(normalizeStyleOptions({}), 288)).toBe(14);
  });

  it('should keep an explicit size', () => {
    expect(resolveFontSize(normalizeStyleOptions({ font_size: 30 }), 1080)).toBe(30);
  });
});

describe('parseReplaceRules', () => {
  it('should return valid rules and skip invalid entries', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const rules = parseReplaceRules([
      { find: 'um', replace: '' },
      { find: 'x' },
      'oops',
      { find: 'colour', replace: 'color' },
    ]);

    expect(rules).toEqual([
      { find: 'um', replace: '' },
      { find: 'colour', replace: 'color' },
    ]);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('should return no rules when replace is absent', () => {
    expect(parseReplaceRules(undefined)).toEqual([]);
  });

  it('should reject a replace value that is not a list', () => {
    expect(() => parseReplaceRules({ find: 'a', replace: 'b' })).toThrow(ValidationError);
  });
});
